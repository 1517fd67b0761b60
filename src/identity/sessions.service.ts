/**
 * @fileoverview Sessions Service
 *
 * Refresh-token sessions: opened at login, rotated on every refresh,
 * listed and revoked by their owner.
 *
 * @remarks
 * - A refresh token is `<sessionId>.<secret>`. Only the SHA-256 of the
 *   secret is stored.
 * - Every refresh replaces the secret. Presenting a secret that was already
 *   rotated away revokes the session, since only a copied token can do that.
 * - Each session tracks the newest access token issued for it; revoking the
 *   session puts that token on the revocation list, and issuing a newer one
 *   revokes the older.
 * - At most MAX_SESSIONS_PER_USER sessions stay active; the oldest is revoked
 *   to make room.
 */

import { Inject, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Clock, CLOCK } from '../shared/clock';
import { describeDevice } from './device-info';
import {
    REVOKED_TOKEN_STORE,
    RevokedTokenStore,
    Session,
    SESSION_STORE,
    SessionStore,
    SessionView,
} from './interfaces';

/** Access token just signed for a session */
export interface IssuedAccessToken {
    jti: string;
    /** Epoch seconds */
    expiresAt: number;
}

/** Where a login came from */
export interface ClientInfo {
    ipAddress: string | null;
    userAgent: string | undefined;
}

const INVALID_REFRESH_TOKEN = 'Invalid or expired refresh token';

function hashSecret(secret: string): string {
    return createHash('sha256').update(secret).digest('hex');
}

function newSecret(): string {
    return randomBytes(32).toString('base64url');
}

function parseRefreshToken(token: string): { sessionId: string; secret: string } | null {
    const parts = token.split('.');
    if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
    return { sessionId: parts[0], secret: parts[1] };
}

@Injectable()
export class SessionsService {
    private readonly logger = new Logger(SessionsService.name);
    private readonly ttlMs: number;
    private readonly maxSessions: number;

    constructor(
        @Inject(SESSION_STORE) private readonly sessions: SessionStore,
        @Inject(REVOKED_TOKEN_STORE) private readonly revokedTokens: RevokedTokenStore,
        @Inject(CLOCK) private readonly clock: Clock,
        configService: ConfigService,
    ) {
        this.ttlMs = (configService.get<number>('REFRESH_TOKEN_TTL_SECONDS') ?? 7 * 24 * 60 * 60) * 1000;
        this.maxSessions = configService.get<number>('MAX_SESSIONS_PER_USER') ?? 5;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Login & Refresh                            */
    /* ---------------------------------------------------------------------- */

    /**
     * Starts a session for a fresh login, or renews the caller's existing
     * session from the same device and address.
     *
     * @returns The refresh token to hand to the client
     */
    async open(userId: string, access: IssuedAccessToken, client: ClientInfo): Promise<string> {
        const now = this.clock.now();
        const deviceInfo = describeDevice(client.userAgent);
        const active = await this.activeSessions(userId, now);

        const sameDevice = active.find((session) => (
            session.deviceInfo === deviceInfo && session.ipAddress === client.ipAddress
        ));
        if (sameDevice) {
            const renewed = await this.renew(sameDevice, access);
            if (renewed) {
                this.logger.log({ msg: 'Session reused', sessionId: sameDevice.id, userId, deviceInfo });
                return renewed;
            }
        }

        const overflow = active.length - this.maxSessions + 1;
        if (overflow > 0) {
            const oldest = [...active].sort((a, b) => a.issuedAt.localeCompare(b.issuedAt)).slice(0, overflow);
            for (const session of oldest) {
                await this.terminate(session);
            }
            this.logger.warn({ msg: 'Session limit reached; oldest revoked', userId, revoked: oldest.length });
        }

        const secret = newSecret();
        const session = await this.sessions.create({
            id: uuidv4(),
            userId,
            tokenHash: hashSecret(secret),
            accessTokenId: access.jti,
            accessTokenExpiresAt: access.expiresAt,
            deviceInfo,
            ipAddress: client.ipAddress,
            issuedAt: now.toISOString(),
            lastUsedAt: now.toISOString(),
            expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
            revoked: false,
        });
        return `${session.id}.${secret}`;
    }

    /**
     * Resolves a presented refresh token to its live session.
     *
     * @throws UnauthorizedException for malformed, unknown, expired, revoked
     * or already rotated tokens
     */
    async redeem(refreshToken: string): Promise<Session> {
        const parsed = parseRefreshToken(refreshToken);
        const session = parsed ? await this.sessions.findById(parsed.sessionId) : null;
        if (!parsed || !session || session.revoked || !this.isUnexpired(session, this.clock.now())) {
            throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
        }

        if (hashSecret(parsed.secret) !== session.tokenHash) {
            await this.terminate(session);
            this.logger.warn({ msg: 'Rotated refresh token presented; session revoked', sessionId: session.id, userId: session.userId });
            throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
        }
        return session;
    }

    /**
     * Rotates the refresh secret of a redeemed session.
     *
     * @throws UnauthorizedException when a concurrent refresh or revocation won
     */
    async rotate(session: Session, access: IssuedAccessToken): Promise<string> {
        const rotated = await this.renew(session, access);
        if (!rotated) {
            throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
        }
        return rotated;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Management                                 */
    /* ---------------------------------------------------------------------- */

    /**
     * Active sessions, newest activity first. `currentTokenId` marks the
     * session the caller is using.
     */
    async list(userId: string, currentTokenId?: string): Promise<SessionView[]> {
        const active = await this.activeSessions(userId, this.clock.now());
        return active
            .sort((a, b) => b.lastUsedAt.localeCompare(a.lastUsedAt))
            .map((session) => ({
                id: session.id,
                deviceInfo: session.deviceInfo,
                ipAddress: session.ipAddress,
                issuedAt: session.issuedAt,
                lastUsedAt: session.lastUsedAt,
                expiresAt: session.expiresAt,
                current: currentTokenId !== undefined && session.accessTokenId === currentTokenId,
            }));
    }

    /**
     * Revokes one of the caller's own sessions.
     *
     * @returns Whether it was the session the caller is using
     * @throws NotFoundException for unknown sessions and other users' sessions
     */
    async revoke(userId: string, sessionId: string, currentTokenId?: string): Promise<boolean> {
        const session = await this.sessions.findById(sessionId);
        if (!session || session.userId !== userId) {
            throw new NotFoundException('Session not found');
        }
        await this.terminate(session);
        return currentTokenId !== undefined && session.accessTokenId === currentTokenId;
    }

    /**
     * Revokes every session of a user, with their access tokens.
     *
     * @returns Number of sessions revoked
     */
    async revokeAll(userId: string): Promise<number> {
        const active = await this.activeSessions(userId, this.clock.now());
        let revoked = 0;
        for (const session of active) {
            if (await this.terminate(session)) revoked++;
        }
        this.logger.log({ msg: 'All sessions revoked', userId, revoked });
        return revoked;
    }

    /**
     * Ends the session that issued the given access token, if any.
     */
    async revokeByAccessToken(userId: string, tokenId: string): Promise<void> {
        const active = await this.activeSessions(userId, this.clock.now());
        const session = active.find((candidate) => candidate.accessTokenId === tokenId);
        if (session) {
            await this.terminate(session);
        }
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    private async activeSessions(userId: string, now: Date): Promise<Session[]> {
        const sessions = await this.sessions.findByUser(userId);
        return sessions.filter((session) => !session.revoked && this.isUnexpired(session, now));
    }

    private isUnexpired(session: Session, now: Date): boolean {
        return Date.parse(session.expiresAt) > now.getTime();
    }

    /**
     * Swaps in a new secret and access token; the replaced access token is
     * revoked. Returns null when the stored secret changed underneath.
     */
    private async renew(session: Session, access: IssuedAccessToken): Promise<string | null> {
        const now = this.clock.now();
        const secret = newSecret();
        const renewed = await this.sessions.renew(session.id, session.tokenHash, {
            tokenHash: hashSecret(secret),
            accessTokenId: access.jti,
            accessTokenExpiresAt: access.expiresAt,
            lastUsedAt: now.toISOString(),
            expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
        });
        if (!renewed) return null;

        await this.revokeAccessToken(session);
        return `${session.id}.${secret}`;
    }

    /** Revokes the session and its current access token */
    private async terminate(session: Session): Promise<boolean> {
        const revoked = await this.sessions.revoke(session.id);
        await this.revokeAccessToken(session);
        return revoked;
    }

    private async revokeAccessToken(session: Session): Promise<void> {
        await this.revokedTokens.revoke({
            jti: session.accessTokenId,
            userId: session.userId,
            expiresAt: session.accessTokenExpiresAt,
        });
    }
}
