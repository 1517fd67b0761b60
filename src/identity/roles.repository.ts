/**
 * @fileoverview Roles Repository
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
import { Role, RoleStore } from './interfaces';

const roleRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    permissions: z.array(z.string()),
    createdAt: z.string(),
    updatedAt: z.string(),
    createdBy: z.string(),
    updatedBy: z.string(),
});

const NAMESPACE = 'role';

@Injectable()
export class RolesRepository implements RoleStore {
    private readonly logger = new Logger(RolesRepository.name);

    constructor(
        private dynamo: DynamoDbProvider,
        private ledger: UniqueKeyLedger,
    ) { }

    private get tableName(): string {
        return this.dynamo.table(TABLES.roles);
    }

    private nameKey(name: string): UniqueKeyRef {
        return { namespace: NAMESPACE, field: 'name', value: name };
    }

    async findById(id: string): Promise<Role | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.tableName,
                Key: { id },
                ConsistentRead: true,
            }));
            return result.Item ? roleRecordSchema.parse(result.Item) : null;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async findByName(name: string): Promise<Role | null> {
        const ownerId = await this.ledger.findOwner(this.nameKey(name));
        return ownerId ? this.findById(ownerId) : null;
    }

    /**
     * Looks up each id; a principal usually holds one or two roles.
     */
    async findByIds(ids: readonly string[]): Promise<Role[]> {
        const roles = await Promise.all([...new Set(ids)].map((id) => this.findById(id)));
        return roles.filter((role): role is Role => role !== null);
    }

    async findAll(): Promise<Role[]> {
        try {
            const items = await this.dynamo.scanAll(TABLES.roles);
            return items.map((item) => roleRecordSchema.parse(item));
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async save(role: Role, previous: Role | null): Promise<Role> {
        const items: GuardedItem[] = [{
            item: {
                Put: {
                    TableName: this.tableName,
                    Item: role,
                    ConditionExpression: previous ? 'attribute_exists(id)' : 'attribute_not_exists(id)',
                },
            },
            guard: previous ? { kind: 'exists', entityType: 'Role', id: role.id } : { kind: 'none' },
        }];
        if (previous) {
            items.push(...this.ledger.swap(this.nameKey(previous.name), this.nameKey(role.name), role.id));
        } else {
            items.push(this.ledger.reserve(this.nameKey(role.name), role.id));
        }

        await this.ledger.transact(items);
        this.logger.log({ msg: previous ? 'Role updated' : 'Role created', roleId: role.id, name: role.name });
        return role;
    }

    async deleteById(id: string): Promise<void> {
        const existing = await this.findById(id);
        if (!existing) {
            throw new EntityNotFoundError('Role', id);
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
                guard: { kind: 'exists', entityType: 'Role', id },
            },
            this.ledger.release(this.nameKey(existing.name), id),
        ]);
        this.logger.log({ msg: 'Role deleted', roleId: id, name: existing.name });
    }
}
