export * from './audit-event.interface';
