/**
 * @fileoverview Jobs Repository Tests
 */

import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbProvider } from '../shared/dynamodb';
import { DependencyUnavailableError } from '../shared/persistence';
import { Job } from './interfaces';
import { JobsRepository } from './jobs.repository';

describe('JobsRepository', () => {
    let send: jest.Mock;
    let scanAll: jest.Mock;
    let repository: JobsRepository;

    const job = (id: string, userId: string, createdAt: string): Job => ({
        id,
        type: 'BULK_DELETE',
        status: 'IN_PROGRESS',
        userId,
        username: userId,
        totalItems: 1,
        processedItems: 0,
        successfulItems: 0,
        failedItems: 0,
        progress: 0,
        createdAt,
        startedAt: createdAt,
        completedAt: null,
        errorMessage: null,
        successfulResults: [],
        failedResults: [{ itemId: 'mem-9', itemDescription: 'Member ID: mem-9', errorMessage: 'Member mem-9 not found' }],
    });

    beforeEach(() => {
        send = jest.fn();
        scanAll = jest.fn();
        const dynamo = {
            getClient: () => ({ send }),
            table: (name: string) => `test_${name}`,
            scanAll,
        } as unknown as DynamoDbProvider;
        repository = new JobsRepository(dynamo);
    });

    it('should list a user\'s jobs newest first', async () => {
        const older = job('job-1', 'alice', '2026-03-01T09:00:00.000Z');
        const newer = job('job-2', 'alice', '2026-03-01T10:00:00.000Z');
        scanAll.mockResolvedValue([older, job('job-3', 'bob', '2026-03-01T11:00:00.000Z'), newer]);

        await expect(repository.findByUserId('alice')).resolves.toEqual([newer, older]);
    });

    it('should guard replacements on the expected status', async () => {
        send.mockResolvedValue({});
        const next = job('job-1', 'alice', '2026-03-01T09:00:00.000Z');

        await expect(repository.replaceIfStatus(next, 'IN_PROGRESS')).resolves.toBe(true);

        const command: PutCommand = send.mock.calls[0][0];
        expect(command.input).toMatchObject({
            TableName: 'test_jobs',
            ConditionExpression: '#status = :expected',
            ExpressionAttributeNames: { '#status': 'status' },
            ExpressionAttributeValues: { ':expected': 'IN_PROGRESS' },
        });
    });

    it('should report a status that moved on', async () => {
        send.mockRejectedValue(new ConditionalCheckFailedException({ message: 'failed', $metadata: {} }));

        await expect(repository.replaceIfStatus(job('job-1', 'alice', '2026-03-01T09:00:00.000Z'), 'IN_PROGRESS'))
            .resolves.toBe(false);
    });

    it('should translate throttling into an unavailable store', async () => {
        const throttled = Object.assign(new Error('slow down'), { name: 'ThrottlingException' });
        send.mockRejectedValue(throttled);

        await expect(repository.findById('job-1')).rejects.toBeInstanceOf(DependencyUnavailableError);
    });
});
