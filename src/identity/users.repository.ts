/**
 * @fileoverview Users Repository
 *
 * DynamoDB storage for authentication principals.
 *
 * @remarks
 * Username and email are each reserved in the unique key ledger under the
 * `user` namespace, in the same transaction as the user item.
 *
 * Login bookkeeping never rewrites the whole item: failures are counted
 * with `ADD` and the lock is set or cleared by conditional updates, so
 * parallel attempts cannot overwrite each other's counts.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { GetCommand, UpdateCommand, UpdateCommandInput } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import {
    EntityNotFoundError,
    GuardedItem,
    translateReadError,
    translateWriteError,
    UniqueKeyLedger,
    UniqueKeyRef,
} from '../shared/persistence';
import { User, UserStore, UserUniqueField } from './interfaces';

const userRecordSchema = z.object({
    id: z.string(),
    username: z.string(),
    email: z.string(),
    passwordHash: z.string(),
    roleIds: z.array(z.string()),
    enabled: z.boolean(),
    accountLocked: z.boolean(),
    failedLoginAttempts: z.number().int(),
    lockoutEndTime: z.string().nullable(),
    lastLoginDate: z.string().nullable(),
    createdAt: z.string(),
    updatedAt: z.string(),
    createdBy: z.string(),
    updatedBy: z.string(),
});

const NAMESPACE = 'user';
const ENTITY_TYPE = 'User';
const UNIQUE_FIELDS: readonly UserUniqueField[] = ['username', 'email'];

@Injectable()
export class UsersRepository implements UserStore {
    private readonly logger = new Logger(UsersRepository.name);

    constructor(
        private dynamo: DynamoDbProvider,
        private ledger: UniqueKeyLedger,
    ) { }

    private get tableName(): string {
        return this.dynamo.table(TABLES.users);
    }

    private keyOf(field: UserUniqueField, user: User): UniqueKeyRef {
        return { namespace: NAMESPACE, field, value: user[field] };
    }

    async findById(id: string): Promise<User | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.tableName,
                Key: { id },
                ConsistentRead: true,
            }));
            return result.Item ? userRecordSchema.parse(result.Item) : null;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async findByField(field: UserUniqueField, value: string): Promise<User | null> {
        const ownerId = await this.ledger.findOwner({ namespace: NAMESPACE, field, value });
        return ownerId ? this.findById(ownerId) : null;
    }

    async findAll(): Promise<User[]> {
        try {
            const items = await this.dynamo.scanAll(TABLES.users);
            return items.map((item) => userRecordSchema.parse(item));
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async save(user: User, previous: User | null): Promise<User> {
        const items: GuardedItem[] = [];

        if (previous) {
            const update = this.changedAttributes(user, previous);
            if (update) {
                items.push({
                    item: { Update: { TableName: this.tableName, Key: { id: user.id }, ...update } },
                    guard: { kind: 'exists', entityType: ENTITY_TYPE, id: user.id },
                });
            }
            for (const field of UNIQUE_FIELDS) {
                items.push(...this.ledger.swap(this.keyOf(field, previous), this.keyOf(field, user), user.id));
            }
        } else {
            items.push({
                item: {
                    Put: {
                        TableName: this.tableName,
                        Item: user,
                        ConditionExpression: 'attribute_not_exists(id)',
                    },
                },
                guard: { kind: 'none' },
            });
            for (const field of UNIQUE_FIELDS) {
                items.push(this.ledger.reserve(this.keyOf(field, user), user.id));
            }
        }

        if (items.length > 0) {
            await this.ledger.transact(items);
        }
        this.logger.log({ msg: previous ? 'User updated' : 'User created', userId: user.id });
        return user;
    }

    async deleteById(id: string): Promise<void> {
        const existing = await this.findById(id);
        if (!existing) {
            throw new EntityNotFoundError('User', id);
        }

        await this.ledger.transact([
            {
                item: {
                    Delete: {
                        TableName: this.tableName,
                        Key: { id },
                        ConditionExpression: 'attribute_exists(id)',
                    },
                },
                guard: { kind: 'exists', entityType: 'User', id },
            },
            ...UNIQUE_FIELDS.map((field) => this.ledger.release(this.keyOf(field, existing), id)),
        ]);
        this.logger.log({ msg: 'User deleted', userId: id });
    }

    /* ---------------------------------------------------------------------- */
    /*                              Login bookkeeping                          */
    /* ---------------------------------------------------------------------- */

    async incrementFailedLogins(id: string): Promise<User> {
        const attributes = await this.update(id, {
            UpdateExpression: 'ADD failedLoginAttempts :one',
            ConditionExpression: 'attribute_exists(id)',
            ExpressionAttributeValues: { ':one': 1 },
            ReturnValues: 'ALL_NEW',
        });
        if (!attributes) {
            throw new EntityNotFoundError(ENTITY_TYPE, id);
        }
        return userRecordSchema.parse(attributes);
    }

    async lockAccount(id: string, lockoutEndTime: string): Promise<boolean> {
        const attributes = await this.update(id, {
            UpdateExpression: 'SET accountLocked = :true, lockoutEndTime = :end',
            ConditionExpression: 'attribute_exists(id) AND accountLocked = :false',
            ExpressionAttributeValues: { ':true': true, ':false': false, ':end': lockoutEndTime },
            ReturnValues: 'UPDATED_NEW',
        });
        if (attributes) {
            this.logger.warn({ msg: 'User locked', userId: id, lockoutEndTime });
        }
        return attributes !== null;
    }

    async clearExpiredLock(id: string, lockoutEndTime: string): Promise<boolean> {
        const attributes = await this.update(id, {
            UpdateExpression: 'SET accountLocked = :false, failedLoginAttempts = :zero, lockoutEndTime = :null',
            ConditionExpression: 'accountLocked = :true AND lockoutEndTime = :end',
            ExpressionAttributeValues: { ':true': true, ':false': false, ':zero': 0, ':null': null, ':end': lockoutEndTime },
            ReturnValues: 'UPDATED_NEW',
        });
        return attributes !== null;
    }

    async recordLoginSuccess(id: string, lastLoginDate: string): Promise<User | null> {
        const attributes = await this.update(id, {
            UpdateExpression: 'SET failedLoginAttempts = :zero, lockoutEndTime = :null, lastLoginDate = :now',
            ConditionExpression: 'attribute_exists(id) AND accountLocked = :false AND enabled = :true',
            ExpressionAttributeValues: { ':false': false, ':true': true, ':zero': 0, ':null': null, ':now': lastLoginDate },
            ReturnValues: 'ALL_NEW',
        });
        return attributes ? userRecordSchema.parse(attributes) : null;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    /**
     * Sends one conditional update. Returns null when the condition failed.
     */
    private async update(
        id: string,
        input: Omit<UpdateCommandInput, 'TableName' | 'Key'>,
    ): Promise<Record<string, unknown> | null> {
        try {
            const result = await this.dynamo.getClient().send(new UpdateCommand({
                TableName: this.tableName,
                Key: { id },
                ...input,
            }));
            return result.Attributes ?? {};
        } catch (error) {
            if (error instanceof ConditionalCheckFailedException) {
                return null;
            }
            throw translateWriteError(error, [{ kind: 'exists', entityType: ENTITY_TYPE, id }]);
        }
    }

    /**
     * SET clause for the attributes that differ from `previous`, or null
     * when nothing changed.
     */
    private changedAttributes(
        user: User,
        previous: User,
    ): Required<Pick<UpdateCommandInput, 'UpdateExpression' | 'ConditionExpression' | 'ExpressionAttributeNames' | 'ExpressionAttributeValues'>> | null {
        const before = new Map<string, unknown>(Object.entries(previous));
        const changed = Object.entries(user).filter(([field, value]) => (
            field !== 'id' && JSON.stringify(before.get(field)) !== JSON.stringify(value)
        ));
        if (changed.length === 0) return null;

        const names: Record<string, string> = {};
        const values: Record<string, unknown> = {};
        const assignments = changed.map(([field, value], i) => {
            names[`#a${i}`] = field;
            values[`:a${i}`] = value;
            return `#a${i} = :a${i}`;
        });
        return {
            UpdateExpression: `SET ${assignments.join(', ')}`,
            ConditionExpression: 'attribute_exists(id)',
            ExpressionAttributeNames: names,
            ExpressionAttributeValues: values,
        };
    }
}
