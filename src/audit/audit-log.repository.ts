/**
 * @fileoverview Audit Log Repository
 *
 * Append-only DynamoDB sink for the audit emitter.
 */

import { Injectable } from '@nestjs/common';
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import { translateWriteError } from '../shared/persistence';
import { AuditLogEntry, AuditSink } from './interfaces';

@Injectable()
export class AuditLogRepository implements AuditSink {
    constructor(private dynamo: DynamoDbProvider) { }

    /**
     * Writes one entry; an existing id is never overwritten.
     */
    async append(entry: AuditLogEntry): Promise<void> {
        try {
            await this.dynamo.getClient().send(new PutCommand({
                TableName: this.dynamo.table(TABLES.auditLogs),
                Item: entry,
                ConditionExpression: 'attribute_not_exists(id)',
            }));
        } catch (error) {
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }
}
