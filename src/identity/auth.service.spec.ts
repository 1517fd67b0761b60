/**
 * @fileoverview Auth Service Tests
 */

import { HttpException, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcryptjs';
import * as jwt from 'jsonwebtoken';
import {
    InMemoryRevokedTokenStore,
    InMemoryRoleStore,
    InMemorySessionStore,
    InMemoryUserStore,
} from '../../test/fakes/in-memory-identity.stores';
import { ADMIN_ROLE_RECORD, USER_ROLE_RECORD, userRecord } from '../../test/fakes/fixtures';
import { AuditEmitter } from '../audit/audit-emitter.service';
import { AuditEvent } from '../audit/interfaces';
import {
    EntityAssembler,
    FieldValidator,
    PermissionEvaluator,
    RequestContext,
    RequestPipeline,
    UniquenessChecker,
} from '../pipeline';
import { AuthenticatedUser } from '../shared/auth/interfaces';
import { Clock } from '../shared/clock';
import { AuthService } from './auth.service';
import { LOCKOUT_DURATION_MS } from './account-lockout';
import { User } from './interfaces';
import { PrincipalResolverService } from './principal-resolver.service';
import { SessionsService } from './sessions.service';

describe('AuthService', () => {
    const PASSWORD = 'Str0ng!Pass';
    const START = new Date('2026-03-01T10:00:00.000Z');
    const CHROME_ON_WINDOWS = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 '
        + '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

    let now: Date;
    let users: InMemoryUserStore;
    let roles: InMemoryRoleStore;
    let revoked: InMemoryRevokedTokenStore;
    let sessions: InMemorySessionStore;
    let audits: AuditEvent[];
    let service: AuthService;

    const anonymous: RequestContext = { principal: null, ipAddress: '10.0.0.9' };

    beforeEach(() => {
        now = START;
        const clock: Clock = { now: () => now };
        users = new InMemoryUserStore();
        roles = new InMemoryRoleStore();
        revoked = new InMemoryRevokedTokenStore();
        sessions = new InMemorySessionStore();
        roles.roles.set(ADMIN_ROLE_RECORD.id, ADMIN_ROLE_RECORD);
        roles.roles.set(USER_ROLE_RECORD.id, USER_ROLE_RECORD);

        audits = [];
        const emitter = { record: jest.fn((event: AuditEvent) => { audits.push(event); }) } as unknown as AuditEmitter;
        const pipeline = new RequestPipeline(
            new FieldValidator(),
            new UniquenessChecker(),
            new PermissionEvaluator(),
            emitter,
        );
        const config = new ConfigService({
            JWT_SECRET: 'test-secret',
            JWT_ISSUER: 'http://localhost:3000',
            JWT_EXPIRES_IN_SECONDS: 900,
            REFRESH_TOKEN_TTL_SECONDS: 3600,
            MAX_SESSIONS_PER_USER: 5,
        });

        service = new AuthService(
            users,
            roles,
            revoked,
            clock,
            pipeline,
            new EntityAssembler(clock),
            new PrincipalResolverService(users, roles, revoked, clock),
            new SessionsService(sessions, revoked, clock, config),
            emitter,
            config,
        );
        jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
        jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    const storeUser = async (username: string, roleIds: string[] = [USER_ROLE_RECORD.id]) => {
        const user = userRecord(`user-${username}`, username, roleIds, await bcrypt.hash(PASSWORD, 4));
        users.users.set(user.id, user);
        return user;
    };

    const jtiOf = (token: string): string => {
        const claims = jwt.decode(token);
        return typeof claims === 'object' && claims && typeof claims.jti === 'string' ? claims.jti : '';
    };

    const principalOf = (user: User, accessToken: string): AuthenticatedUser => ({
        userId: user.id,
        username: user.username,
        email: user.email,
        roles: [],
        tokenId: jtiOf(accessToken),
    });

    describe('registerUser', () => {
        it('should create an enabled account holding the USER role', async () => {
            const result = await service.registerUser(
                { username: ' Alice ', email: 'Alice@Example.com', password: PASSWORD },
                anonymous,
            );

            expect(result.ok).toBe(true);
            if (!result.ok) return;
            expect(result.value).toMatchObject({
                username: 'alice',
                email: 'alice@example.com',
                roleIds: [USER_ROLE_RECORD.id],
                enabled: true,
                accountLocked: false,
                failedLoginAttempts: 0,
                createdBy: 'alice',
            });
            expect(result.value).not.toHaveProperty('passwordHash');

            const stored = users.users.get(result.value.id);
            expect(stored && await bcrypt.compare(PASSWORD, stored.passwordHash)).toBe(true);
            expect(audits[0]).toMatchObject({ action: 'REGISTER_USER', status: 'SUCCESS', principal: 'anonymous' });
        });

        it('should reject a taken username regardless of case', async () => {
            await storeUser('alice');

            const result = await service.registerUser(
                { username: 'ALICE', email: 'other@example.com', password: PASSWORD },
                anonymous,
            );

            expect(result).toEqual({ ok: false, error: { kind: 'CONFLICT', field: 'username', value: 'alice' } });
        });

        it('should reject a weak password with every failed rule', async () => {
            const result = await service.registerUser(
                { username: 'bob', email: 'bob@example.com', password: 'short' },
                anonymous,
            );

            expect(result.ok).toBe(false);
            if (result.ok || result.error.kind !== 'VALIDATION_FAILED') return;
            expect(result.error.fieldErrors.password).toBe(
                'Password must be at least 8 characters, must contain at least one uppercase letter, '
                + 'must contain at least one number, '
                + 'must contain at least one special character (!@#$%^&*()_+-=[]{}|;:,.<>?)',
            );
            expect(users.users.size).toBe(0);
        });
    });

    describe('login', () => {
        it('should issue a signed token with a fresh token id', async () => {
            const alice = await storeUser('alice');

            const response = await service.login({ username: 'Alice', password: PASSWORD }, anonymous);

            const claims = jwt.verify(response.accessToken, 'test-secret', { issuer: 'http://localhost:3000' });
            expect(claims).toMatchObject({ sub: alice.id, username: 'alice' });
            expect(typeof claims === 'object' && typeof claims.jti === 'string').toBe(true);
            expect(response).toMatchObject({
                tokenType: 'Bearer',
                expiresIn: 900,
                user: {
                    id: alice.id,
                    username: 'alice',
                    roles: ['USER'],
                    permissions: ['member:create', 'member:read', 'member:update'],
                },
            });
            expect(users.users.get(alice.id)?.lastLoginDate).toBe(START.toISOString());
        });

        it('should open a session tied to the access token and the device', async () => {
            const alice = await storeUser('alice');

            const response = await service.login({ username: 'alice', password: PASSWORD }, anonymous, CHROME_ON_WINDOWS);

            const [sessionId, secret] = response.refreshToken.split('.');
            expect(secret.length).toBeGreaterThan(0);
            expect(sessions.sessions.get(sessionId)).toMatchObject({
                userId: alice.id,
                accessTokenId: jtiOf(response.accessToken),
                deviceInfo: 'Chrome on Windows',
                ipAddress: '10.0.0.9',
                issuedAt: '2026-03-01T10:00:00.000Z',
                expiresAt: '2026-03-01T11:00:00.000Z',
                revoked: false,
            });
        });

        it('should answer unknown users and wrong passwords the same way', async () => {
            await storeUser('alice');

            await expect(service.login({ username: 'nobody', password: PASSWORD }, anonymous))
                .rejects.toThrow(new UnauthorizedException('Invalid username or password'));
            await expect(service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous))
                .rejects.toThrow(new UnauthorizedException('Invalid username or password'));
        });

        it('should reject a disabled account', async () => {
            const alice = await storeUser('alice');
            users.users.set(alice.id, { ...alice, enabled: false });

            await expect(service.login({ username: 'alice', password: PASSWORD }, anonymous))
                .rejects.toThrow('Account is disabled');
        });

        it('should lock after five failures and refuse even the right password', async () => {
            const alice = await storeUser('alice');

            for (let attempt = 0; attempt < 5; attempt++) {
                await expect(service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous))
                    .rejects.toBeInstanceOf(UnauthorizedException);
            }
            expect(users.users.get(alice.id)).toMatchObject({
                accountLocked: true,
                failedLoginAttempts: 5,
                lockoutEndTime: new Date(START.getTime() + LOCKOUT_DURATION_MS).toISOString(),
            });

            const locked = service.login({ username: 'alice', password: PASSWORD }, anonymous);
            await expect(locked).rejects.toBeInstanceOf(HttpException);
            await expect(locked).rejects.toMatchObject({
                status: 423,
                response: {
                    statusCode: 423,
                    message: 'Account is locked',
                    lockoutEndTime: '2026-03-01T10:30:00.000Z',
                },
            });
            expect(users.users.get(alice.id)?.failedLoginAttempts).toBe(5);
        });

        it('should count every one of several parallel failures and lock', async () => {
            const alice = await storeUser('alice');

            const attempts = await Promise.allSettled(Array.from({ length: 5 }, () => (
                service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous)
            )));

            expect(attempts.every((attempt) => attempt.status === 'rejected')).toBe(true);
            expect(users.users.get(alice.id)).toMatchObject({
                accountLocked: true,
                failedLoginAttempts: 5,
                lockoutEndTime: '2026-03-01T10:30:00.000Z',
            });
            await expect(service.login({ username: 'alice', password: PASSWORD }, anonymous))
                .rejects.toMatchObject({ status: 423 });
        });

        it('should keep role changes made while the password was being checked', async () => {
            const alice = await storeUser('alice');
            users.users.set(alice.id, { ...alice, roleIds: [ADMIN_ROLE_RECORD.id] });
            jest.spyOn(users, 'findByField').mockResolvedValue(alice);

            const response = await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            expect(users.users.get(alice.id)?.roleIds).toEqual([ADMIN_ROLE_RECORD.id]);
            expect(response.user.roles).toEqual(['ADMIN']);
        });

        it('should refuse a login when the account was disabled while the password was being checked', async () => {
            const alice = await storeUser('alice');
            users.users.set(alice.id, { ...alice, enabled: false });
            jest.spyOn(users, 'findByField').mockResolvedValue(alice);

            await expect(service.login({ username: 'alice', password: PASSWORD }, anonymous))
                .rejects.toThrow('Account is disabled');
            expect(users.users.get(alice.id)).toMatchObject({ enabled: false, lastLoginDate: null });
        });

        it('should let the user back in once the lock expires', async () => {
            const alice = await storeUser('alice');
            for (let attempt = 0; attempt < 5; attempt++) {
                await expect(service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous))
                    .rejects.toBeInstanceOf(UnauthorizedException);
            }

            now = new Date(START.getTime() + LOCKOUT_DURATION_MS + 1);
            await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            expect(users.users.get(alice.id)).toMatchObject({
                accountLocked: false,
                failedLoginAttempts: 0,
                lockoutEndTime: null,
                lastLoginDate: now.toISOString(),
            });
        });

        it('should restart the count from one after an expired lock', async () => {
            const alice = await storeUser('alice');
            users.users.set(alice.id, {
                ...alice,
                accountLocked: true,
                failedLoginAttempts: 5,
                lockoutEndTime: START.toISOString(),
            });

            now = new Date(START.getTime() + 1);
            await expect(service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous))
                .rejects.toBeInstanceOf(UnauthorizedException);

            expect(users.users.get(alice.id)).toMatchObject({
                accountLocked: false,
                failedLoginAttempts: 1,
                lockoutEndTime: null,
            });
        });

        it('should audit each attempt with its outcome', async () => {
            await storeUser('alice');

            await expect(service.login({ username: 'alice', password: 'Wr0ng!Pass' }, anonymous)).rejects.toThrow();
            await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            expect(audits.map((event) => [event.action, event.status, event.details.outcome])).toEqual([
                ['LOGIN', 'FAILURE', 'bad_password'],
                ['LOGIN', 'SUCCESS', 'success'],
            ]);
        });
    });

    describe('refresh', () => {
        it('should rotate the refresh token and retire the previous access token', async () => {
            await storeUser('alice');
            const first = await service.login({ username: 'alice', password: PASSWORD }, anonymous, CHROME_ON_WINDOWS);

            now = new Date(START.getTime() + 60_000);
            const second = await service.refresh(first.refreshToken, anonymous);

            expect(second.refreshToken).not.toBe(first.refreshToken);
            expect(second.refreshToken.split('.')[0]).toBe(first.refreshToken.split('.')[0]);
            expect(jtiOf(second.accessToken)).not.toBe(jtiOf(first.accessToken));
            expect(second.user.username).toBe('alice');
            await expect(revoked.isRevoked(jtiOf(first.accessToken))).resolves.toBe(true);
            await expect(revoked.isRevoked(jtiOf(second.accessToken))).resolves.toBe(false);
            expect(audits[audits.length - 1]).toMatchObject({ action: 'REFRESH_TOKEN', status: 'SUCCESS' });
        });

        it('should end the session when an already rotated token comes back', async () => {
            await storeUser('alice');
            const first = await service.login({ username: 'alice', password: PASSWORD }, anonymous);
            const second = await service.refresh(first.refreshToken, anonymous);

            await expect(service.refresh(first.refreshToken, anonymous))
                .rejects.toThrow(new UnauthorizedException('Invalid or expired refresh token'));
            await expect(service.refresh(second.refreshToken, anonymous))
                .rejects.toBeInstanceOf(UnauthorizedException);
            await expect(revoked.isRevoked(jtiOf(second.accessToken))).resolves.toBe(true);
            expect(audits[audits.length - 1]).toMatchObject({
                action: 'REFRESH_TOKEN',
                status: 'FAILURE',
                details: { outcome: 'rejected' },
            });
        });

        it('should let only one of two parallel refreshes with the same token through', async () => {
            await storeUser('alice');
            const first = await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            const outcomes = await Promise.allSettled([
                service.refresh(first.refreshToken, anonymous),
                service.refresh(first.refreshToken, anonymous),
            ]);

            expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['fulfilled', 'rejected']);
        });

        it('should refuse a refresh for an account disabled since login', async () => {
            const alice = await storeUser('alice');
            const first = await service.login({ username: 'alice', password: PASSWORD }, anonymous);
            const current = users.users.get(alice.id);
            if (current) users.users.set(alice.id, { ...current, enabled: false });

            await expect(service.refresh(first.refreshToken, anonymous))
                .rejects.toThrow('Invalid or expired refresh token');
            expect(sessions.sessions.get(first.refreshToken.split('.')[0])?.revoked).toBe(true);
            expect(audits[audits.length - 1]).toMatchObject({
                action: 'REFRESH_TOKEN',
                status: 'FAILURE',
                details: { outcome: 'inactive_user' },
            });
        });

        it('should refuse a refresh token past its lifetime', async () => {
            await storeUser('alice');
            const first = await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            now = new Date(START.getTime() + 3600 * 1000);
            await expect(service.refresh(first.refreshToken, anonymous))
                .rejects.toBeInstanceOf(UnauthorizedException);
        });
    });

    describe('logout', () => {
        it('should revoke the presented token until it expires', async () => {
            const principal: AuthenticatedUser = {
                userId: 'user-alice',
                username: 'alice',
                email: 'alice@example.com',
                roles: [],
                tokenId: 'jti-1',
                tokenExpiresAt: 1_800_000_000,
            };

            await service.logout(principal, anonymous);

            expect(revoked.tokens.get('jti-1')).toEqual({ jti: 'jti-1', userId: 'user-alice', expiresAt: 1_800_000_000 });
            await expect(revoked.isRevoked('jti-1')).resolves.toBe(true);
            expect(audits[0]).toMatchObject({ action: 'LOGOUT', principal: 'alice', status: 'SUCCESS' });
        });

        it('should end the session that issued the token', async () => {
            const alice = await storeUser('alice');
            const response = await service.login({ username: 'alice', password: PASSWORD }, anonymous);

            await service.logout(principalOf(alice, response.accessToken), anonymous);

            await expect(service.refresh(response.refreshToken, anonymous)).rejects.toBeInstanceOf(UnauthorizedException);
        });
    });

    describe('logoutAll', () => {
        it('should end the sessions on every device', async () => {
            const alice = await storeUser('alice');
            const office = await service.login({ username: 'alice', password: PASSWORD }, anonymous);
            const home = await service.login(
                { username: 'alice', password: PASSWORD },
                { principal: null, ipAddress: '10.0.0.10' },
            );

            const result = await service.logoutAll(principalOf(alice, home.accessToken), anonymous);

            expect(result).toEqual({ revokedSessions: 2 });
            await expect(revoked.isRevoked(jtiOf(office.accessToken))).resolves.toBe(true);
            await expect(revoked.isRevoked(jtiOf(home.accessToken))).resolves.toBe(true);
            expect([...sessions.sessions.values()].every((session) => session.revoked)).toBe(true);
            expect(audits[audits.length - 1]).toMatchObject({
                action: 'LOGOUT_ALL',
                principal: 'alice',
                details: { revokedSessions: 2 },
            });
        });
    });

    describe('changePassword', () => {
        const NEW_PASSWORD = 'N3w!Passw0rd';

        it('should store the new password and sign out everywhere', async () => {
            const alice = await storeUser('alice');
            const response = await service.login({ username: 'alice', password: PASSWORD }, anonymous);
            const principal = principalOf(alice, response.accessToken);

            const result = await service.changePassword(
                principal,
                { currentPassword: PASSWORD, newPassword: NEW_PASSWORD },
                { principal, ipAddress: '10.0.0.9' },
            );

            expect(result.ok).toBe(true);
            if (!result.ok) return;
            expect(result.value).not.toHaveProperty('passwordHash');
            const stored = users.users.get(alice.id);
            expect(stored && await bcrypt.compare(NEW_PASSWORD, stored.passwordHash)).toBe(true);
            await expect(revoked.isRevoked(principal.tokenId ?? '')).resolves.toBe(true);
            await expect(service.refresh(response.refreshToken, anonymous)).rejects.toBeInstanceOf(UnauthorizedException);
            expect(audits.find((event) => event.action === 'CHANGE_PASSWORD')).toMatchObject({
                status: 'SUCCESS',
                entityId: alice.id,
                principal: 'alice',
            });
        });

        it('should refuse a wrong current password', async () => {
            const alice = await storeUser('alice');
            const principal = principalOf(alice, '');

            const result = await service.changePassword(
                principal,
                { currentPassword: 'Wr0ng!Pass', newPassword: NEW_PASSWORD },
                { principal, ipAddress: null },
            );

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'Current password is incorrect' },
            });
            expect(users.users.get(alice.id)?.passwordHash).toBe(alice.passwordHash);
        });

        it('should refuse a new password equal to the current one', async () => {
            const alice = await storeUser('alice');
            const principal = principalOf(alice, '');

            const result = await service.changePassword(
                principal,
                { currentPassword: PASSWORD, newPassword: PASSWORD },
                { principal, ipAddress: null },
            );

            expect(result).toEqual({
                ok: false,
                error: { kind: 'PRECONDITION_FAILED', reason: 'New password must be different from current password' },
            });
        });

        it('should apply the password policy to the new password', async () => {
            const alice = await storeUser('alice');
            const principal = principalOf(alice, '');

            const result = await service.changePassword(
                principal,
                { currentPassword: '', newPassword: 'weak' },
                { principal, ipAddress: null },
            );

            expect(result.ok).toBe(false);
            if (result.ok || result.error.kind !== 'VALIDATION_FAILED') return;
            expect(Object.keys(result.error.fieldErrors).sort()).toEqual(['currentPassword', 'newPassword']);
            expect(result.error.fieldErrors.currentPassword).toBe('Current password is required');
        });
    });

    describe('me', () => {
        it('should list role names and sorted effective permissions', () => {
            const summary = service.me({
                userId: 'user-root',
                username: 'root',
                email: 'root@example.com',
                roles: [
                    { name: 'EDITOR', permissions: ['member:update', 'member:read'] },
                    { name: 'VIEWER', permissions: ['member:read'] },
                ],
            });

            expect(summary).toEqual({
                id: 'user-root',
                username: 'root',
                email: 'root@example.com',
                roles: ['EDITOR', 'VIEWER'],
                permissions: ['member:read', 'member:update'],
            });
        });
    });
});
