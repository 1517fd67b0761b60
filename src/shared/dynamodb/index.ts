/**
 * @fileoverview Shared DynamoDB Barrel Export
 */

export * from './dynamodb.module';
export * from './dynamodb.provider';
