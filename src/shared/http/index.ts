export * from './request-context';
export * from './persistence-exception.filter';
export * from './rate-limit.guard';
