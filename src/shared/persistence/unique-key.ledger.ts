/**
 * @fileoverview Unique Key Ledger
 *
 * DynamoDB has no secondary unique indexes, so every unique value is
 * reserved as its own item in the `unique_keys` table. Repositories put the
 * reservation in the same transaction as the entity write; the
 * `attribute_not_exists` condition makes concurrent writers of the same
 * value fail at the storage layer.
 */

import { Injectable } from '@nestjs/common';
import { GetCommand, TransactWriteCommand, TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DynamoDbProvider, TABLES } from '../dynamodb/dynamodb.provider';
import { translateReadError, translateWriteError, WriteGuard } from './dynamodb-error.translator';

export type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/** One reserved value, e.g. `{ namespace: 'member', field: 'email', value: 'jane@example.com' }` */
export interface UniqueKeyRef {
    namespace: string;
    field: string;
    value: string;
}

/** A transaction item plus what a failed condition on it means */
export interface GuardedItem {
    item: TransactItem;
    guard: WriteGuard;
}

const uniqueKeyRecordSchema = z.object({
    uniqueKey: z.string(),
    ownerId: z.string(),
});

@Injectable()
export class UniqueKeyLedger {
    constructor(private dynamo: DynamoDbProvider) { }

    keyOf(ref: UniqueKeyRef): string {
        return `${ref.namespace}#${ref.field}#${ref.value}`;
    }

    /**
     * Returns the id of the record holding the value, or null when free.
     */
    async findOwner(ref: UniqueKeyRef): Promise<string | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.dynamo.table(TABLES.uniqueKeys),
                Key: { uniqueKey: this.keyOf(ref) },
                ConsistentRead: true,
            }));
            if (!result.Item) return null;
            return uniqueKeyRecordSchema.parse(result.Item).ownerId;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    reserve(ref: UniqueKeyRef, ownerId: string): GuardedItem {
        return {
            item: {
                Put: {
                    TableName: this.dynamo.table(TABLES.uniqueKeys),
                    Item: {
                        uniqueKey: this.keyOf(ref),
                        ownerId,
                        namespace: ref.namespace,
                        field: ref.field,
                    },
                    ConditionExpression: 'attribute_not_exists(uniqueKey)',
                },
            },
            guard: { kind: 'unique', field: ref.field, value: ref.value },
        };
    }

    release(ref: UniqueKeyRef, ownerId: string): GuardedItem {
        return {
            item: {
                Delete: {
                    TableName: this.dynamo.table(TABLES.uniqueKeys),
                    Key: { uniqueKey: this.keyOf(ref) },
                    ConditionExpression: 'ownerId = :owner',
                    ExpressionAttributeValues: { ':owner': ownerId },
                },
            },
            guard: { kind: 'none' },
        };
    }

    /**
     * Items that move a reservation from one value to another. Empty when the
     * value did not change.
     */
    swap(previous: UniqueKeyRef, next: UniqueKeyRef, ownerId: string): GuardedItem[] {
        if (this.keyOf(previous) === this.keyOf(next)) return [];
        return [this.release(previous, ownerId), this.reserve(next, ownerId)];
    }

    /**
     * Sends the items as one all-or-nothing transaction and translates a
     * cancellation through the items' guards.
     */
    async transact(items: GuardedItem[]): Promise<void> {
        try {
            await this.dynamo.getClient().send(new TransactWriteCommand({
                TransactItems: items.map((entry) => entry.item),
            }));
        } catch (error) {
            throw translateWriteError(error, items.map((entry) => entry.guard));
        }
    }
}
