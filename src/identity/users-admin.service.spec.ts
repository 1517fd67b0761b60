/**
 * @fileoverview User Administration Service Tests
 */

import { Logger } from '@nestjs/common';
import { InMemoryRoleStore, InMemoryUserStore } from '../../test/fakes/in-memory-identity.stores';
import { ADMIN_ROLE_RECORD, USER_ROLE_RECORD, VIEWER_ROLE_RECORD, userRecord } from '../../test/fakes/fixtures';
import { AuditEmitter } from '../audit/audit-emitter.service';
import {
    EntityAssembler,
    FieldValidator,
    PermissionEvaluator,
    RequestContext,
    RequestPipeline,
    UniquenessChecker,
} from '../pipeline';
import { UsersAdminService } from './users-admin.service';

describe('UsersAdminService', () => {
    const NOW = new Date('2026-03-01T10:00:00.000Z');

    let roles: InMemoryRoleStore;
    let users: InMemoryUserStore;
    let service: UsersAdminService;

    const asUser = (username: string, permissions: string[]): RequestContext => ({
        principal: { username, roles: [{ name: 'CUSTOM', permissions }] },
        ipAddress: null,
    });
    const root = asUser('root', ['system:admin']);

    beforeEach(() => {
        roles = new InMemoryRoleStore();
        users = new InMemoryUserStore();
        for (const role of [ADMIN_ROLE_RECORD, USER_ROLE_RECORD, VIEWER_ROLE_RECORD]) {
            roles.roles.set(role.id, role);
        }
        for (const user of [
            userRecord('user-root', 'root', [ADMIN_ROLE_RECORD.id]),
            userRecord('user-alice', 'alice', [USER_ROLE_RECORD.id]),
            userRecord('user-bob', 'bob', [USER_ROLE_RECORD.id]),
        ]) {
            users.users.set(user.id, user);
        }
        const pipeline = new RequestPipeline(
            new FieldValidator(),
            new UniquenessChecker(),
            new PermissionEvaluator(),
            { record: jest.fn() } as unknown as AuditEmitter,
        );
        service = new UsersAdminService(users, roles, pipeline, new EntityAssembler({ now: () => NOW }));
        jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should page users by username without password hashes', async () => {
        const page = await service.listUsers(0, 2);

        expect(page.content.map((user) => user.username)).toEqual(['alice', 'bob']);
        expect(page.totalElements).toBe(3);
        expect(page.content[0]).not.toHaveProperty('passwordHash');
    });

    describe('status changes', () => {
        it('should disable and re-enable an account', async () => {
            const disabled = await service.disableUser('user-alice', root);
            expect(disabled.ok && disabled.value.enabled).toBe(false);

            const enabled = await service.enableUser('user-alice', root);
            expect(enabled.ok && enabled.value.enabled).toBe(true);
            expect(users.users.get('user-alice')?.updatedBy).toBe('root');
        });

        it('should not let an administrator disable themselves', async () => {
            const result = await service.disableUser('user-root', root);

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'Cannot disable your own account' },
            });
        });

        it('should clear a lock and the failure counter', async () => {
            const alice = userRecord('user-alice', 'alice', [USER_ROLE_RECORD.id]);
            users.users.set(alice.id, {
                ...alice,
                accountLocked: true,
                failedLoginAttempts: 5,
                lockoutEndTime: '2026-03-01T10:30:00.000Z',
            });

            const result = await service.unlockUser('user-alice', root);

            expect(result.ok).toBe(true);
            expect(users.users.get('user-alice')).toMatchObject({
                accountLocked: false,
                failedLoginAttempts: 0,
                lockoutEndTime: null,
            });
        });

        it('should check the permission before looking up the target', async () => {
            const result = await service.enableUser('missing', asUser('alice', ['user:read']));

            expect(result).toEqual({ ok: false, error: { kind: 'FORBIDDEN', requiredPermission: 'user:update' } });
        });
    });

    describe('roles', () => {
        it('should add roles and keep the ones already held', async () => {
            const result = await service.assignRoles('user-alice', { roleIds: [VIEWER_ROLE_RECORD.id, USER_ROLE_RECORD.id] }, root);

            expect(result.ok && result.value.roleIds).toEqual([USER_ROLE_RECORD.id, VIEWER_ROLE_RECORD.id]);
        });

        it('should report an unknown role id', async () => {
            const result = await service.assignRoles('user-alice', { roleIds: ['role-ghost'] }, root);

            expect(result).toEqual({ ok: false, error: { kind: 'NOT_FOUND', entityType: 'Role', id: 'role-ghost' } });
        });

        it('should require at least one role id', async () => {
            const result = await service.assignRoles('user-alice', { roleIds: [] }, root);

            expect(result).toEqual({
                ok: false,
                error: { kind: 'VALIDATION_FAILED', fieldErrors: { roleIds: 'Role ids must contain at least 1 item(s)' } },
            });
        });

        it('should remove the listed roles', async () => {
            const result = await service.removeRoles('user-bob', { roleIds: [USER_ROLE_RECORD.id] }, root);

            expect(result.ok && result.value.roleIds).toEqual([]);
        });

        it('should keep ADMIN on the last administrator', async () => {
            const result = await service.removeRoles('user-root', { roleIds: [ADMIN_ROLE_RECORD.id] }, asUser('alice', ['user:update']));

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'Cannot remove ADMIN role from the last admin' },
            });
        });

        it('should allow removing ADMIN while another administrator remains', async () => {
            const second = userRecord('user-sam', 'sam', [ADMIN_ROLE_RECORD.id]);
            users.users.set(second.id, second);

            const result = await service.removeRoles('user-sam', { roleIds: [ADMIN_ROLE_RECORD.id] }, root);

            expect(result.ok && result.value.roleIds).toEqual([]);
        });
    });

    describe('deleteUser', () => {
        it('should delete another account', async () => {
            const result = await service.deleteUser('user-bob', root);

            expect(result.ok).toBe(true);
            expect(users.users.has('user-bob')).toBe(false);
        });

        it('should refuse self deletion', async () => {
            const result = await service.deleteUser('user-root', root);

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'Cannot delete your own account' },
            });
        });

        it('should refuse to delete the last administrator', async () => {
            const result = await service.deleteUser('user-root', asUser('alice', ['user:delete']));

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'Cannot delete the last admin' },
            });
            expect(users.users.has('user-root')).toBe(true);
        });
    });
});
