/**
 * @fileoverview Persistence Barrel Export
 */

export * from './persistence.errors';
export * from './dynamodb-error.translator';
export * from './unique-key.ledger';
