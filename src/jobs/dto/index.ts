export * from './bulk-delete.dto';
export * from './job-accepted.dto';
export * from './limits';
export * from './member-import.dto';
