/**
 * @fileoverview Shared test records
 */

import { Role, User } from '../../src/identity/interfaces';

const STAMP = {
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    createdBy: 'system',
    updatedBy: 'system',
};

export const ADMIN_ROLE_RECORD: Role = {
    id: 'role-admin',
    name: 'ADMIN',
    description: 'Full access',
    permissions: ['system:admin'],
    ...STAMP,
};

export const USER_ROLE_RECORD: Role = {
    id: 'role-user',
    name: 'USER',
    description: 'Member self-service',
    permissions: ['member:create', 'member:read', 'member:update'],
    ...STAMP,
};

export const VIEWER_ROLE_RECORD: Role = {
    id: 'role-viewer',
    name: 'VIEWER',
    description: 'Read-only',
    permissions: ['member:read'],
    ...STAMP,
};

/**
 * Enabled, unlocked user. The password hash is filled in by the caller.
 */
export function userRecord(id: string, username: string, roleIds: string[], passwordHash = 'unused'): User {
    return {
        id,
        username,
        email: `${username}@example.com`,
        passwordHash,
        roleIds,
        enabled: true,
        accountLocked: false,
        failedLoginAttempts: 0,
        lockoutEndTime: null,
        lastLoginDate: null,
        ...STAMP,
    };
}
