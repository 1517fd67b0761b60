export * from './member-request.dto';
export * from './member-list-query.dto';
