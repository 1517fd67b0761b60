/**
 * Seed script for local development
 * Creates the DynamoDB tables, the built-in roles, one account per role and a few members
 */

import {
    CreateTableCommand,
    DescribeTableCommand,
    DynamoDBClient,
    ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import * as bcrypt from 'bcryptjs';

// Configuration
const DYNAMODB_ENDPOINT = process.env.DYNAMODB_ENDPOINT || 'http://localhost:8000';
const AWS_REGION = process.env.AWS_REGION || 'us-east-1';
const TABLE_PREFIX = process.env.TABLE_PREFIX ?? '';
const SEED_PASSWORD = process.env.SEED_PASSWORD || 'Local!Pass1';

// Clients - DynamoDB Local doesn't validate credentials, use dummy values
const dynamoClient = new DynamoDBClient({
    region: AWS_REGION,
    endpoint: DYNAMODB_ENDPOINT,
    credentials: {
        accessKeyId: 'local',
        secretAccessKey: 'local',
    },
});
const docClient = DynamoDBDocumentClient.from(dynamoClient);

const SEEDED_AT = new Date().toISOString();
const stamp = {
    createdAt: SEEDED_AT,
    updatedAt: SEEDED_AT,
    createdBy: 'system',
    updatedBy: 'system',
};

// Table name -> hash key
const tables: Record<string, string> = {
    members: 'id',
    users: 'id',
    roles: 'id',
    unique_keys: 'uniqueKey',
    audit_logs: 'id',
    jobs: 'id',
    revoked_tokens: 'jti',
    sessions: 'id',
};

const roles = [
    { id: 'role-admin', name: 'ADMIN', description: 'Full access', permissions: ['system:admin'] },
    { id: 'role-user', name: 'USER', description: 'Member maintenance', permissions: ['member:create', 'member:read', 'member:update'] },
    { id: 'role-viewer', name: 'VIEWER', description: 'Read-only access', permissions: ['member:read'] },
];

const mockMembers = [
    { id: 'mem-001', name: 'John Doe', email: 'john.doe@example.com', phoneNumber: '9876500101' },
    { id: 'mem-002', name: 'Jane Smith', email: 'jane.smith@example.com', phoneNumber: '9876500102' },
    { id: 'mem-003', name: "Bob O'Neil", email: 'bob.oneil@example.com', phoneNumber: '9876500103' },
    { id: 'mem-004', name: 'Alice Johnson', email: 'alice.johnson@example.com', phoneNumber: '9876500104' },
    { id: 'mem-005', name: 'Charlie Brown', email: 'charlie.brown@example.com', phoneNumber: '9876500105' },
];

function table(name: string): string {
    return `${TABLE_PREFIX}${name}`;
}

/**
 * Puts an entity and its unique key reservations in one transaction.
 * Skips the entity when a reservation already exists.
 */
async function putReserved(
    tableName: string,
    item: Record<string, unknown> & { id: string },
    namespace: string,
    unique: Record<string, string>,
): Promise<boolean> {
    try {
        await docClient.send(new TransactWriteCommand({
            TransactItems: [
                {
                    Put: {
                        TableName: table(tableName),
                        Item: item,
                        ConditionExpression: 'attribute_not_exists(id)',
                    },
                },
                ...Object.entries(unique).map(([field, value]) => ({
                    Put: {
                        TableName: table('unique_keys'),
                        Item: { uniqueKey: `${namespace}#${field}#${value}`, ownerId: item.id, namespace, field },
                        ConditionExpression: 'attribute_not_exists(uniqueKey)',
                    },
                })),
            ],
        }));
        return true;
    } catch (error) {
        if (error instanceof Error && error.name === 'TransactionCanceledException') {
            return false;
        }
        throw error;
    }
}

async function createTables(): Promise<void> {
    console.log('Creating DynamoDB tables...');

    for (const [name, hashKey] of Object.entries(tables)) {
        try {
            await dynamoClient.send(new DescribeTableCommand({ TableName: table(name) }));
            console.log(`   ${table(name)} already exists`);
            continue;
        } catch (error) {
            if (!(error instanceof ResourceNotFoundException)) throw error;
        }

        await dynamoClient.send(new CreateTableCommand({
            TableName: table(name),
            KeySchema: [{ AttributeName: hashKey, KeyType: 'HASH' }],
            AttributeDefinitions: [{ AttributeName: hashKey, AttributeType: 'S' }],
            BillingMode: 'PAY_PER_REQUEST',
        }));
        console.log(`   ${table(name)} created`);
    }
}

async function seedIdentity(): Promise<void> {
    console.log('Seeding roles and accounts...');

    for (const role of roles) {
        const created = await putReserved('roles', { ...role, ...stamp }, 'role', { name: role.name });
        console.log(`   ${created ? 'Added' : 'Kept'} role ${role.name}`);
    }

    const accounts = [
        { id: 'user-admin', username: 'admin', roleIds: ['role-admin'] },
        { id: 'user-demo', username: 'demo', roleIds: ['role-user'] },
        { id: 'user-viewer', username: 'viewer', roleIds: ['role-viewer'] },
    ];
    const passwordHash = await bcrypt.hash(SEED_PASSWORD, 10);

    for (const account of accounts) {
        const user = {
            ...account,
            email: `${account.username}@example.com`,
            passwordHash,
            enabled: true,
            accountLocked: false,
            failedLoginAttempts: 0,
            lockoutEndTime: null,
            lastLoginDate: null,
            ...stamp,
        };
        const created = await putReserved('users', user, 'user', { username: user.username, email: user.email });
        console.log(`   ${created ? 'Added' : 'Kept'} user ${user.username}`);
    }
}

async function seedMembers(): Promise<void> {
    console.log('Seeding members...');

    for (const member of mockMembers) {
        const created = await putReserved('members', { ...member, ...stamp }, 'member', { email: member.email });
        console.log(`   ${created ? 'Added' : 'Kept'}: ${member.name}`);
    }
}

async function main(): Promise<void> {
    console.log('\nMember Directory Seed Script\n');

    try {
        await createTables();
        await seedIdentity();
        await seedMembers();

        console.log('\nSeeding complete!\n');
        console.log('Next steps:');
        console.log('  1. npm run start');
        console.log('  2. curl "http://localhost:3000/members" -H "Authorization: Bearer $(npm run --silent token:admin)"');
        console.log('');
    } catch (error) {
        console.error('\nSeeding failed:', error);
        process.exit(1);
    }
}

void main();
