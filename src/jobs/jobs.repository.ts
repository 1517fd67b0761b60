/**
 * @fileoverview Jobs Repository
 *
 * DynamoDB storage for background jobs.
 *
 * @remarks
 * Progress and status writes are conditional on the status the writer last
 * saw, so a worker never overwrites a concurrent cancel.
 */

import { Injectable } from '@nestjs/common';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { DeleteCommand, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import { translateReadError, translateWriteError } from '../shared/persistence';
import { Job, JOB_STATUSES, JOB_TYPES, JobStatus, JobStore } from './interfaces';

const resultItemSchema = z.object({
    itemId: z.string(),
    itemDescription: z.string(),
    errorMessage: z.string().optional(),
});

const jobRecordSchema = z.object({
    id: z.string(),
    type: z.enum(JOB_TYPES),
    status: z.enum(JOB_STATUSES),
    userId: z.string(),
    username: z.string(),
    totalItems: z.number(),
    processedItems: z.number(),
    successfulItems: z.number(),
    failedItems: z.number(),
    progress: z.number(),
    createdAt: z.string(),
    startedAt: z.string().nullable(),
    completedAt: z.string().nullable(),
    errorMessage: z.string().nullable(),
    successfulResults: z.array(resultItemSchema),
    failedResults: z.array(resultItemSchema),
});

@Injectable()
export class JobsRepository implements JobStore {
    constructor(private dynamo: DynamoDbProvider) { }

    private get tableName(): string {
        return this.dynamo.table(TABLES.jobs);
    }

    async findById(id: string): Promise<Job | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.tableName,
                Key: { id },
                ConsistentRead: true,
            }));
            return result.Item ? jobRecordSchema.parse(result.Item) : null;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async findByUserId(userId: string): Promise<Job[]> {
        const jobs = await this.findAll();
        return jobs
            .filter((job) => job.userId === userId)
            .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }

    async findAll(): Promise<Job[]> {
        try {
            const items = await this.dynamo.scanAll(TABLES.jobs);
            return items.map((item) => jobRecordSchema.parse(item));
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async insert(job: Job): Promise<Job> {
        try {
            await this.dynamo.getClient().send(new PutCommand({
                TableName: this.tableName,
                Item: job,
                ConditionExpression: 'attribute_not_exists(id)',
            }));
            return job;
        } catch (error) {
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }

    async replaceIfStatus(job: Job, expected: JobStatus): Promise<boolean> {
        try {
            await this.dynamo.getClient().send(new PutCommand({
                TableName: this.tableName,
                Item: job,
                ConditionExpression: '#status = :expected',
                ExpressionAttributeNames: { '#status': 'status' },
                ExpressionAttributeValues: { ':expected': expected },
            }));
            return true;
        } catch (error) {
            if (error instanceof ConditionalCheckFailedException) {
                return false;
            }
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }

    async deleteById(id: string): Promise<void> {
        try {
            await this.dynamo.getClient().send(new DeleteCommand({
                TableName: this.tableName,
                Key: { id },
            }));
        } catch (error) {
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }
}
