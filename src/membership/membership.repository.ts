/**
 * @fileoverview Members Repository
 *
 * Data access layer for member records in DynamoDB.
 *
 * @remarks
 * Every write goes through a transaction with the unique key ledger: the
 * member item and its `member#email#<value>` reservation succeed or fail
 * together. A lost race surfaces as UniqueConstraintViolationError.
 */

import { Injectable, Logger } from '@nestjs/common';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import {
    EntityNotFoundError,
    GuardedItem,
    translateReadError,
    UniqueKeyLedger,
    UniqueKeyRef,
} from '../shared/persistence';
import { Member, MemberStore, MemberUniqueField } from './interfaces';

/* -------------------------------------------------------------------------- */
/*                              Record Schema                                  */
/* -------------------------------------------------------------------------- */

const memberRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
    phoneNumber: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
    createdBy: z.string(),
    updatedBy: z.string(),
});

/** Ledger namespace for member reservations */
const NAMESPACE = 'member';

/* -------------------------------------------------------------------------- */
/*                              Repository Implementation                      */
/* -------------------------------------------------------------------------- */

@Injectable()
export class MembershipRepository implements MemberStore {
    private readonly logger = new Logger(MembershipRepository.name);

    constructor(
        private dynamo: DynamoDbProvider,
        private ledger: UniqueKeyLedger,
    ) { }

    private get tableName(): string {
        return this.dynamo.table(TABLES.members);
    }

    private emailKey(email: string): UniqueKeyRef {
        return { namespace: NAMESPACE, field: 'email', value: email };
    }

    /**
     * Retrieves a member by id with a strongly consistent read.
     */
    async findById(id: string): Promise<Member | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.tableName,
                Key: { id },
                ConsistentRead: true,
            }));
            return result.Item ? memberRecordSchema.parse(result.Item) : null;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    /**
     * Resolves a unique value through the ledger, then loads the owner.
     */
    async findByField(field: MemberUniqueField, value: string): Promise<Member | null> {
        const ownerId = await this.ledger.findOwner({ namespace: NAMESPACE, field, value });
        return ownerId ? this.findById(ownerId) : null;
    }

    /**
     * Reads the whole table.
     *
     * @remarks
     * Scan is expensive at scale; listing sorts and filters in memory.
     */
    async findAll(): Promise<Member[]> {
        try {
            const items = await this.dynamo.scanAll(TABLES.members);
            return items.map((item) => memberRecordSchema.parse(item));
        } catch (error) {
            throw translateReadError(error);
        }
    }

    /**
     * Inserts or replaces a member together with its email reservation.
     */
    async save(member: Member, previous: Member | null): Promise<Member> {
        const items: GuardedItem[] = [];

        if (previous === null) {
            items.push({
                item: {
                    Put: {
                        TableName: this.tableName,
                        Item: member,
                        ConditionExpression: 'attribute_not_exists(id)',
                    },
                },
                guard: { kind: 'none' },
            });
            items.push(this.ledger.reserve(this.emailKey(member.email), member.id));
        } else {
            items.push({
                item: {
                    Put: {
                        TableName: this.tableName,
                        Item: member,
                        ConditionExpression: 'attribute_exists(id)',
                    },
                },
                guard: { kind: 'exists', entityType: 'Member', id: member.id },
            });
            items.push(...this.ledger.swap(this.emailKey(previous.email), this.emailKey(member.email), member.id));
        }

        await this.ledger.transact(items);
        this.logger.log({ msg: previous ? 'Member updated' : 'Member created', memberId: member.id });
        return member;
    }

    /**
     * Deletes a member and releases its email.
     */
    async deleteById(id: string): Promise<void> {
        const existing = await this.findById(id);
        if (!existing) {
            throw new EntityNotFoundError('Member', id);
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
                guard: { kind: 'exists', entityType: 'Member', id },
            },
            this.ledger.release(this.emailKey(existing.email), id),
        ]);
        this.logger.log({ msg: 'Member deleted', memberId: id });
    }
}
