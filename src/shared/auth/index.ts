/**
 * @fileoverview Shared Auth Barrel Export
 */

export * from './auth.module';
export * from './jwt.strategy';
export * from './permissions.guard';
export * from './interfaces';
