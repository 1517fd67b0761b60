/**
 * @fileoverview Shared DynamoDB Module
 */

import { Global, Module } from '@nestjs/common';
import { DynamoDbProvider } from './dynamodb.provider';
import { UniqueKeyLedger } from '../persistence/unique-key.ledger';

@Global()
@Module({
    providers: [DynamoDbProvider, UniqueKeyLedger],
    exports: [DynamoDbProvider, UniqueKeyLedger],
})
export class SharedDynamoDbModule { }
