/**
 * @fileoverview Members Repository Tests
 */

import { Logger } from '@nestjs/common';
import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { GetCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbProvider } from '../shared/dynamodb';
import { EntityNotFoundError, UniqueKeyLedger, UniqueConstraintViolationError } from '../shared/persistence';
import { Member } from './interfaces';
import { MembershipRepository } from './membership.repository';

describe('MembershipRepository', () => {
    let send: jest.Mock;
    let scanAll: jest.Mock;
    let repository: MembershipRepository;

    const jane: Member = {
        id: 'mem-1',
        name: 'Jane Doe',
        email: 'jane@example.com',
        phoneNumber: '9876543210',
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
        createdBy: 'admin',
        updatedBy: 'admin',
    };

    beforeEach(() => {
        send = jest.fn();
        scanAll = jest.fn();
        const dynamo = {
            getClient: () => ({ send }),
            table: (name: string) => name,
            scanAll,
        } as unknown as DynamoDbProvider;
        repository = new MembershipRepository(dynamo, new UniqueKeyLedger(dynamo));
        jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should read members with a consistent read', async () => {
        send.mockResolvedValue({ Item: jane });

        await expect(repository.findById('mem-1')).resolves.toEqual(jane);

        const command: GetCommand = send.mock.calls[0][0];
        expect(command.input).toEqual({ TableName: 'members', Key: { id: 'mem-1' }, ConsistentRead: true });
    });

    it('should resolve a unique email through the ledger', async () => {
        send
            .mockResolvedValueOnce({ Item: { uniqueKey: 'member#email#jane@example.com', ownerId: 'mem-1' } })
            .mockResolvedValueOnce({ Item: jane });

        await expect(repository.findByField('email', 'jane@example.com')).resolves.toEqual(jane);

        const ledgerRead: GetCommand = send.mock.calls[0][0];
        expect(ledgerRead.input.Key).toEqual({ uniqueKey: 'member#email#jane@example.com' });
    });

    it('should parse every scanned item', async () => {
        const john = { ...jane, id: 'mem-2', email: 'john@example.com' };
        scanAll.mockResolvedValue([jane, john]);

        await expect(repository.findAll()).resolves.toEqual([jane, john]);
        expect(scanAll).toHaveBeenCalledWith('members');
    });

    it('should insert the member and reserve its email in one transaction', async () => {
        send.mockResolvedValue({});

        await repository.save(jane, null);

        const command: TransactWriteCommand = send.mock.calls[0][0];
        expect(command.input.TransactItems).toEqual([
            { Put: { TableName: 'members', Item: jane, ConditionExpression: 'attribute_not_exists(id)' } },
            {
                Put: {
                    TableName: 'unique_keys',
                    Item: { uniqueKey: 'member#email#jane@example.com', ownerId: 'mem-1', namespace: 'member', field: 'email' },
                    ConditionExpression: 'attribute_not_exists(uniqueKey)',
                },
            },
        ]);
    });

    it('should move the reservation when the email changes', async () => {
        send.mockResolvedValue({});
        const next = { ...jane, email: 'jane.doe@example.com' };

        await repository.save(next, jane);

        const items = send.mock.calls[0][0].input.TransactItems;
        expect(items).toHaveLength(3);
        expect(items[1].Delete.Key).toEqual({ uniqueKey: 'member#email#jane@example.com' });
        expect(items[2].Put.Item.uniqueKey).toBe('member#email#jane.doe@example.com');
    });

    it('should only replace the item when the email is unchanged', async () => {
        send.mockResolvedValue({});

        await repository.save({ ...jane, name: 'Jane Smith' }, jane);

        expect(send.mock.calls[0][0].input.TransactItems).toHaveLength(1);
    });

    it('should surface a lost email race as a constraint violation', async () => {
        send.mockRejectedValue(new TransactionCanceledException({
            message: 'Transaction cancelled',
            $metadata: {},
            CancellationReasons: [{ Code: 'None' }, { Code: 'ConditionalCheckFailed' }],
        }));

        await expect(repository.save(jane, null)).rejects.toBeInstanceOf(UniqueConstraintViolationError);
    });

    it('should delete the member and release its email', async () => {
        send.mockResolvedValueOnce({ Item: jane }).mockResolvedValueOnce({});

        await repository.deleteById('mem-1');

        const items = send.mock.calls[1][0].input.TransactItems;
        expect(items[0].Delete).toEqual({
            TableName: 'members',
            Key: { id: 'mem-1' },
            ConditionExpression: 'attribute_exists(id)',
        });
        expect(items[1].Delete.ConditionExpression).toBe('ownerId = :owner');
    });

    it('should throw when deleting an unknown member', async () => {
        send.mockResolvedValue({});

        await expect(repository.deleteById('missing')).rejects.toBeInstanceOf(EntityNotFoundError);
    });
});
