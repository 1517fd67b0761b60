/**
 * @fileoverview Audit Barrel Export
 */

export * from './audit.module';
export * from './audit-emitter.service';
export * from './audit-log.repository';
export * from './interfaces';
