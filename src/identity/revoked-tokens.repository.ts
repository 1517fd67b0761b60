/**
 * @fileoverview Revoked Tokens Repository
 *
 * Logout denylist. Items carry `expiresAt` (epoch seconds) as the table's
 * TTL attribute, so DynamoDB drops them once the token could no longer be
 * used anyway.
 */

import { Injectable } from '@nestjs/common';
import { GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbProvider, TABLES } from '../shared/dynamodb';
import { translateReadError, translateWriteError } from '../shared/persistence';
import { RevokedToken, RevokedTokenStore } from './interfaces';

@Injectable()
export class RevokedTokensRepository implements RevokedTokenStore {
    constructor(private dynamo: DynamoDbProvider) { }

    async revoke(token: RevokedToken): Promise<void> {
        try {
            await this.dynamo.getClient().send(new PutCommand({
                TableName: this.dynamo.table(TABLES.revokedTokens),
                Item: token,
            }));
        } catch (error) {
            throw translateWriteError(error, [{ kind: 'none' }]);
        }
    }

    async isRevoked(jti: string): Promise<boolean> {
        try {
            const result = await this.dynamo.getClient().send(new GetCommand({
                TableName: this.dynamo.table(TABLES.revokedTokens),
                Key: { jti },
                ConsistentRead: true,
            }));
            return result.Item !== undefined;
        } catch (error) {
            throw translateReadError(error);
        }
    }
}
