export * from './jobs.module';
export * from './jobs.service';
export * from './job-state';
export * from './interfaces';
