/**
 * @fileoverview Auth Service
 *
 * Self-service registration, login with lockout, token refresh, logout,
 * password changes and the current principal.
 *
 * @remarks
 * Registration and password changes are pipeline operations with no
 * required permission. Login, refresh and logout are outside the pipeline
 * but report to the same audit emitter.
 */

import {
    HttpException,
    Inject,
    Injectable,
    Logger,
    UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcryptjs';
import * as jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { Counter } from 'prom-client';
import { AuditEmitter } from '../audit/audit-emitter.service';
import {
    effectivePermissions,
    EntityAssembler,
    err,
    normalizeIdentity,
    notFound,
    ok,
    PipelineError,
    preconditionFailed,
    RequestContext,
    RequestPipeline,
    Result,
    textOf,
    UniqueLookup,
    ANONYMOUS,
} from '../pipeline';
import { DEFAULT_ISSUER, LOCAL_DEV_SECRET } from '../shared/auth/jwt.strategy';
import { AuthenticatedUser, JwtPayload, ResolvedPrincipal } from '../shared/auth/interfaces';
import { Clock, CLOCK } from '../shared/clock';
import { hasExpiredLock, isLocked, lockoutEndFrom, shouldLock } from './account-lockout';
import { AuthResponseDto, ChangePasswordDto, LoginDto, PrincipalSummaryDto, RegisterUserDto } from './dto';
import {
    DEFAULT_ROLE,
    REVOKED_TOKEN_STORE,
    RevokedTokenStore,
    ROLE_STORE,
    RoleStore,
    toUserView,
    User,
    USER_STORE,
    UserStore,
    UserUniqueField,
    UserView,
} from './interfaces';
import { PrincipalResolverService } from './principal-resolver.service';
import { IssuedAccessToken, SessionsService } from './sessions.service';

const loginCounter = new Counter({
    name: 'member_directory_login_attempts_total',
    help: 'Login attempts by outcome',
    labelNames: ['outcome'],
});

/** bcrypt work factor */
const SALT_ROUNDS = 10;

/** 423 Locked; @nestjs/common has no HttpStatus member for it */
const LOCKED_STATUS = 423;

/** Same response for unknown users and wrong passwords */
const INVALID_CREDENTIALS = 'Invalid username or password';

type LoginOutcome = 'success' | 'unknown_user' | 'bad_password' | 'locked' | 'disabled';

/** Passwords are hashed as typed, without trimming */
function verbatim(rawValue: unknown): string {
    return typeof rawValue === 'string' ? rawValue : '';
}

interface PasswordChange {
    previous: User;
    next: User;
}

/** Signed access token plus what its session records about it */
interface SignedAccessToken extends IssuedAccessToken {
    token: string;
}

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);
    private readonly secret: string;
    private readonly issuer: string;
    private readonly expiresInSeconds: number;

    constructor(
        @Inject(USER_STORE) private readonly users: UserStore,
        @Inject(ROLE_STORE) private readonly roles: RoleStore,
        @Inject(REVOKED_TOKEN_STORE) private readonly revokedTokens: RevokedTokenStore,
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly pipeline: RequestPipeline,
        private readonly assembler: EntityAssembler,
        private readonly principals: PrincipalResolverService,
        private readonly sessions: SessionsService,
        private readonly audit: AuditEmitter,
        configService: ConfigService,
    ) {
        this.secret = configService.get<string>('JWT_SECRET') || LOCAL_DEV_SECRET;
        this.issuer = configService.get<string>('JWT_ISSUER') || DEFAULT_ISSUER;
        this.expiresInSeconds = configService.get<number>('JWT_EXPIRES_IN_SECONDS') ?? 3600;
    }

    private readonly userOwner: UniqueLookup = async (field, value) => {
        const fieldName: UserUniqueField = field === 'username' ? 'username' : 'email';
        const owner = await this.users.findByField(fieldName, value);
        return owner?.id ?? null;
    };

    /* ---------------------------------------------------------------------- */
    /*                              Registration                               */
    /* ---------------------------------------------------------------------- */

    /**
     * Creates an enabled account holding the default role.
     */
    async registerUser(dto: RegisterUserDto, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        const username = normalizeIdentity(textOf(dto.username));
        const email = normalizeIdentity(textOf(dto.email));

        return this.pipeline.run<User, UserView>({
            action: 'REGISTER_USER',
            entityType: 'User',
            requiredPermission: null,
            fields: {
                username: { value: dto.username, rules: 'username' },
                email: { value: dto.email, rules: 'email' },
                password: { value: dto.password, rules: 'password' },
            },
            uniqueFields: [
                { field: 'username', value: username, lookup: this.userOwner },
                { field: 'email', value: email, lookup: this.userOwner },
            ],
            assemble: async (actor) => {
                const defaultRole = await this.roles.findByName(DEFAULT_ROLE);
                if (!defaultRole) {
                    this.logger.warn({ msg: 'Default role missing; registering without roles', role: DEFAULT_ROLE });
                }
                const passwordHash = await bcrypt.hash(verbatim(dto.password), SALT_ROUNDS);
                return ok(this.assembler.create(uuidv4(), {
                    username,
                    email,
                    passwordHash,
                    roleIds: defaultRole ? [defaultRole.id] : [],
                    enabled: true,
                    accountLocked: false,
                    failedLoginAttempts: 0,
                    lockoutEndTime: null,
                    lastLoginDate: null,
                }, actor ?? username));
            },
            persist: async (user) => toUserView(await this.users.save(user, null)),
            idOf: (user) => user.id,
            details: { username },
        }, context);
    }

    /* ---------------------------------------------------------------------- */
    /*                              Login & Logout                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Verifies credentials and issues an access token with a session
     * refresh token.
     *
     * @remarks
     * A locked account is rejected with 423 before the password is checked,
     * and the attempt does not extend the lock.
     *
     * @param userAgent - Describes the device in the session list
     * @throws UnauthorizedException for unknown users, wrong passwords and disabled accounts
     * @throws HttpException 423 while the account is locked
     */
    async login(dto: LoginDto, context: RequestContext, userAgent?: string): Promise<AuthResponseDto> {
        const username = normalizeIdentity(dto.username);
        const user = await this.users.findByField('username', username);

        if (!user) {
            this.reportLogin(username, null, context, 'unknown_user');
            throw new UnauthorizedException(INVALID_CREDENTIALS);
        }

        const now = this.clock.now();
        if (isLocked(user, now)) {
            this.reportLogin(username, user.id, context, 'locked');
            throw this.lockedError(user.lockoutEndTime);
        }
        if (hasExpiredLock(user, now) && user.lockoutEndTime !== null) {
            await this.users.clearExpiredLock(user.id, user.lockoutEndTime);
        }
        if (!user.enabled) {
            this.reportLogin(username, user.id, context, 'disabled');
            throw new UnauthorizedException('Account is disabled');
        }

        const matches = await bcrypt.compare(dto.password, user.passwordHash);
        if (!matches) {
            const counted = await this.users.incrementFailedLogins(user.id);
            const lockedNow = shouldLock(counted.failedLoginAttempts)
                && await this.users.lockAccount(user.id, lockoutEndFrom(now));
            this.reportLogin(username, user.id, context, 'bad_password', {
                failedLoginAttempts: counted.failedLoginAttempts,
                accountLocked: lockedNow || counted.accountLocked,
            });
            throw new UnauthorizedException(INVALID_CREDENTIALS);
        }

        const loggedIn = await this.users.recordLoginSuccess(user.id, now.toISOString());
        if (!loggedIn) {
            // Locked or disabled between the read above and the write
            const current = await this.users.findById(user.id);
            if (current && isLocked(current, now)) {
                this.reportLogin(username, user.id, context, 'locked');
                throw this.lockedError(current.lockoutEndTime);
            }
            this.reportLogin(username, user.id, context, 'disabled');
            throw new UnauthorizedException('Account is disabled');
        }
        this.reportLogin(username, user.id, context, 'success');

        const access = this.sign(loggedIn);
        const refreshToken = await this.sessions.open(loggedIn.id, access, {
            ipAddress: context.ipAddress,
            userAgent,
        });
        return this.respond(loggedIn, access, refreshToken);
    }

    /**
     * Trades a refresh token for a new access token and a rotated refresh
     * token.
     *
     * @throws UnauthorizedException when the token is not usable or the
     * account can no longer sign in
     */
    async refresh(refreshToken: string, context: RequestContext): Promise<AuthResponseDto> {
        const session = await this.sessions.redeem(refreshToken).catch((error: unknown) => {
            this.reportRefresh(null, null, context, 'rejected');
            throw error;
        });

        const user = await this.users.findById(session.userId);
        if (!user || !user.enabled || isLocked(user, this.clock.now())) {
            await this.sessions.revoke(session.userId, session.id);
            this.reportRefresh(user?.username ?? null, session.userId, context, 'inactive_user');
            throw new UnauthorizedException('Invalid or expired refresh token');
        }

        const access = this.sign(user);
        const rotated = await this.sessions.rotate(session, access).catch((error: unknown) => {
            this.reportRefresh(user.username, user.id, context, 'rejected');
            throw error;
        });
        this.reportRefresh(user.username, user.id, context, 'success');
        return this.respond(user, access, rotated);
    }

    /**
     * Revokes the presented token until it would have expired, and ends the
     * session it belongs to.
     */
    async logout(user: AuthenticatedUser, context: RequestContext): Promise<void> {
        await this.revokePresentedToken(user);
        if (user.tokenId) {
            await this.sessions.revokeByAccessToken(user.userId, user.tokenId);
        }
        this.recordAccountEvent('LOGOUT', user, context, {});
    }

    /**
     * Ends every session of the caller, on all devices.
     */
    async logoutAll(user: AuthenticatedUser, context: RequestContext): Promise<{ revokedSessions: number }> {
        const revokedSessions = await this.sessions.revokeAll(user.userId);
        await this.revokePresentedToken(user);
        this.recordAccountEvent('LOGOUT_ALL', user, context, { revokedSessions });
        return { revokedSessions };
    }

    /* ---------------------------------------------------------------------- */
    /*                              Password                                   */
    /* ---------------------------------------------------------------------- */

    /**
     * Replaces the caller's password after checking the current one, then
     * signs the account out everywhere.
     */
    async changePassword(
        user: AuthenticatedUser,
        dto: ChangePasswordDto,
        context: RequestContext,
    ): Promise<Result<UserView, PipelineError>> {
        return this.pipeline.run<PasswordChange, UserView>({
            action: 'CHANGE_PASSWORD',
            entityType: 'User',
            entityId: user.userId,
            requiredPermission: null,
            fields: {
                currentPassword: { value: dto.currentPassword, rules: 'currentPassword' },
                newPassword: { value: dto.newPassword, rules: 'password' },
            },
            assemble: async (actor) => {
                const previous = await this.users.findById(user.userId);
                if (!previous) return err(notFound('User', user.userId));

                const currentPassword = verbatim(dto.currentPassword);
                const newPassword = verbatim(dto.newPassword);
                if (!await bcrypt.compare(currentPassword, previous.passwordHash)) {
                    return err(preconditionFailed('Current password is incorrect'));
                }
                if (await bcrypt.compare(newPassword, previous.passwordHash)) {
                    return err(preconditionFailed('New password must be different from current password'));
                }
                const passwordHash = await bcrypt.hash(newPassword, SALT_ROUNDS);
                return ok({ previous, next: this.assembler.update(previous, { passwordHash }, actor) });
            },
            persist: async ({ previous, next }) => {
                await this.users.save(next, previous);
                await this.sessions.revokeAll(next.id);
                await this.revokePresentedToken(user);
                return toUserView(next);
            },
        }, context);
    }

    me(user: AuthenticatedUser): PrincipalSummaryDto {
        return this.summaryOf(user);
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    private sign(user: User): SignedAccessToken {
        const payload: JwtPayload = { sub: user.id, username: user.username };
        const jti = uuidv4();
        const token = jwt.sign(payload, this.secret, {
            algorithm: 'HS256',
            expiresIn: this.expiresInSeconds,
            issuer: this.issuer,
            jwtid: jti,
        });
        const expiresAt = Math.floor(this.clock.now().getTime() / 1000) + this.expiresInSeconds;
        return { token, jti, expiresAt };
    }

    private async respond(user: User, access: SignedAccessToken, refreshToken: string): Promise<AuthResponseDto> {
        const principal = await this.principals.principalOf(user);
        return {
            accessToken: access.token,
            refreshToken,
            tokenType: 'Bearer',
            expiresIn: this.expiresInSeconds,
            user: this.summaryOf(principal),
        };
    }

    private async revokePresentedToken(user: AuthenticatedUser): Promise<void> {
        if (!user.tokenId) return;
        const expiresAt = user.tokenExpiresAt
            ?? Math.floor(this.clock.now().getTime() / 1000) + this.expiresInSeconds;
        await this.revokedTokens.revoke({ jti: user.tokenId, userId: user.userId, expiresAt });
    }

    private recordAccountEvent(
        action: string,
        user: AuthenticatedUser,
        context: RequestContext,
        details: Record<string, unknown>,
    ): void {
        this.audit.record({
            action,
            entityType: 'User',
            entityId: user.userId,
            principal: user.username,
            ipAddress: context.ipAddress,
            status: 'SUCCESS',
            details,
        });
    }

    private lockedError(lockoutEndTime: string | null): HttpException {
        return new HttpException(
            { statusCode: LOCKED_STATUS, message: 'Account is locked', lockoutEndTime },
            LOCKED_STATUS,
        );
    }

    private summaryOf(principal: ResolvedPrincipal): PrincipalSummaryDto {
        return {
            id: principal.userId,
            username: principal.username,
            email: principal.email,
            roles: principal.roles.map((role) => role.name),
            permissions: [...effectivePermissions(principal.roles)].sort(),
        };
    }

    private reportLogin(
        username: string,
        userId: string | null,
        context: RequestContext,
        outcome: LoginOutcome,
        details: Record<string, unknown> = {},
    ): void {
        loginCounter.inc({ outcome });
        if (outcome !== 'success') {
            this.logger.warn({ msg: 'Login rejected', username, outcome });
        }
        this.audit.record({
            action: 'LOGIN',
            entityType: 'User',
            entityId: userId,
            principal: username || ANONYMOUS,
            ipAddress: context.ipAddress,
            status: outcome === 'success' ? 'SUCCESS' : 'FAILURE',
            ...(outcome !== 'success' && { errorMessage: `Login rejected: ${outcome}` }),
            details: { outcome, ...details },
        });
    }

    private reportRefresh(
        username: string | null,
        userId: string | null,
        context: RequestContext,
        outcome: 'success' | 'rejected' | 'inactive_user',
    ): void {
        if (outcome !== 'success') {
            this.logger.warn({ msg: 'Refresh rejected', userId, outcome });
        }
        this.audit.record({
            action: 'REFRESH_TOKEN',
            entityType: 'User',
            entityId: userId,
            principal: username ?? ANONYMOUS,
            ipAddress: context.ipAddress,
            status: outcome === 'success' ? 'SUCCESS' : 'FAILURE',
            ...(outcome !== 'success' && { errorMessage: `Refresh rejected: ${outcome}` }),
            details: { outcome },
        });
    }
}
