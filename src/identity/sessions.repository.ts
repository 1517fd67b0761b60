/**
 * @fileoverview Sessions Repository
 *
 * DynamoDB storage for refresh-token sessions. Rotation and revocation are
 * conditional updates, so two refreshes presenting the same secret cannot
 * both succeed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { GetCommand, PutCommand, UpdateCommand, UpdateCommandInput } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import { translateReadError, translateWriteError } from '../shared/persistence';
import { Session, SessionRenewal, SessionStore } from './interfaces';

const sessionRecordSchema = z.object({
    id: z.string(),
    userId: z.string(),
    tokenHash: z.string(),
    accessTokenId: z.string(),
    accessTokenExpiresAt: z.number().int(),
    deviceInfo: z.string(),
    ipAddress: z.string().nullable(),
    issuedAt: z.string(),
    lastUsedAt: z.string(),
    expiresAt: z.string(),
    revoked: z.boolean(),
});

@Injectable()
export class SessionsRepository implements SessionStore {
    private readonly logger = new Logger(SessionsRepository.name);

    constructor(private dynamo: DynamoDbProvider) { }

    private get tableName(): string {
        return this.dynamo.table(TABLES.sessions);
    }

    async create(session: Session): Promise<Session> {
        try {
            await this.dynamo.getClient().send(new PutCommand({
                TableName: this.tableName,
                Item: session,
                ConditionExpression: 'attribute_not_exists(id)',
            }));
        } catch (error) {
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
        this.logger.log({ msg: 'Session created', sessionId: session.id, userId: session.userId });
        return session;
    }

    async findById(id: string): Promise<Session | null> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.tableName,
                Key: { id },
                ConsistentRead: true,
            }));
            return result.Item ? sessionRecordSchema.parse(result.Item) : null;
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async findByUser(userId: string): Promise<Session[]> {
        try {
            const items = await this.dynamo.scanAll(TABLES.sessions);
            return items
                .map((item) => sessionRecordSchema.parse(item))
                .filter((session) => session.userId === userId);
        } catch (error) {
            throw translateReadError(error);
        }
    }

    async renew(id: string, expectedHash: string, renewal: SessionRenewal): Promise<boolean> {
        return this.conditionalUpdate(id, {
            UpdateExpression: 'SET tokenHash = :hash, accessTokenId = :jti, accessTokenExpiresAt = :jtiExp, '
                + 'lastUsedAt = :used, expiresAt = :exp',
            ConditionExpression: 'tokenHash = :expected AND revoked = :false',
            ExpressionAttributeValues: {
                ':hash': renewal.tokenHash,
                ':jti': renewal.accessTokenId,
                ':jtiExp': renewal.accessTokenExpiresAt,
                ':used': renewal.lastUsedAt,
                ':exp': renewal.expiresAt,
                ':expected': expectedHash,
                ':false': false,
            },
        });
    }

    async revoke(id: string): Promise<boolean> {
        const revoked = await this.conditionalUpdate(id, {
            UpdateExpression: 'SET revoked = :true',
            ConditionExpression: 'attribute_exists(id) AND revoked = :false',
            ExpressionAttributeValues: { ':true': true, ':false': false },
        });
        if (revoked) {
            this.logger.log({ msg: 'Session revoked', sessionId: id });
        }
        return revoked;
    }

    private async conditionalUpdate(
        id: string,
        expression: Pick<UpdateCommandInput, 'UpdateExpression' | 'ConditionExpression' | 'ExpressionAttributeValues'>,
    ): Promise<boolean> {
        try {
            await this.dynamo.getClient().send(new UpdateCommand({
                TableName: this.tableName,
                Key: { id },
                ...expression,
            }));
            return true;
        } catch (error) {
            if (error instanceof ConditionalCheckFailedException) {
                return false;
            }
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }
}
