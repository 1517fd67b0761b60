export * from './job.interface';
