/**
 * @fileoverview DynamoDB Client Provider
 *
 * Shared document client for every repository.
 *
 * @remarks
 * Credential handling:
 * - Local: Uses environment-configured endpoint with any credentials
 * - Production: AWS SDK auto-resolves credentials from IAM Task Role
 */

import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, ScanCommand } from '@aws-sdk/lib-dynamodb';

/** Logical table names; the configured prefix is prepended at runtime */
export const TABLES = {
    members: 'members',
    users: 'users',
    roles: 'roles',
    uniqueKeys: 'unique_keys',
    auditLogs: 'audit_logs',
    jobs: 'jobs',
    revokedTokens: 'revoked_tokens',
    sessions: 'sessions',
} as const;

export type TableName = typeof TABLES[keyof typeof TABLES];

@Injectable()
export class DynamoDbProvider implements OnModuleDestroy {
    private readonly client: DynamoDBClient;
    private readonly docClient: DynamoDBDocumentClient;
    private readonly prefix: string;

    /**
     * @remarks
     * The endpoint is optional and only used for local development with
     * DynamoDB Local.
     */
    constructor(private configService: ConfigService) {
        const endpoint = this.configService.get<string>('DYNAMODB_ENDPOINT');
        const region = this.configService.get<string>('AWS_REGION') || 'us-east-1';
        this.prefix = this.configService.get<string>('TABLE_PREFIX') ?? '';

        this.client = new DynamoDBClient({
            region,
            ...(endpoint && { endpoint }),
        });

        this.docClient = DynamoDBDocumentClient.from(this.client, {
            marshallOptions: { removeUndefinedValues: true },
        });
    }

    getClient(): DynamoDBDocumentClient {
        return this.docClient;
    }

    /** Physical name of a logical table */
    table(name: TableName): string {
        return `${this.prefix}${name}`;
    }

    /**
     * Reads every item of a table, following pagination to the end.
     *
     * @remarks
     * Full scans are only used for small tables and admin listings.
     */
    async scanAll(name: TableName): Promise<Record<string, unknown>[]> {
        const items: Record<string, unknown>[] = [];
        let lastKey: Record<string, unknown> | undefined;

        do {
            const result = await this.docClient.send(new ScanCommand({
                TableName: this.table(name),
                ...(lastKey && { ExclusiveStartKey: lastKey }),
            }));
            items.push(...(result.Items ?? []));
            lastKey = result.LastEvaluatedKey;
        } while (lastKey);

        return items;
    }

    onModuleDestroy(): void {
        this.client.destroy();
    }
}
