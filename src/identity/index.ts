/**
 * @fileoverview Identity Barrel Export
 */

export * from './identity.module';
export * from './interfaces';
export * from './account-lockout';
