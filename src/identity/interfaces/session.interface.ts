/**
 * @fileoverview Session Interfaces
 */

/**
 * One signed-in device, created at login and renewed by each refresh.
 *
 * @remarks
 * - tokenHash: SHA-256 of the current refresh secret; the secret itself is
 *   only ever held by the client
 * - accessTokenId: `jti` of the newest access token issued for the session,
 *   revoked together with the session
 * - One active session per user, device and address; a new login from the
 *   same place renews it
 */
export interface Session {
    id: string;
    userId: string;
    tokenHash: string;
    accessTokenId: string;
    /** Epoch seconds */
    accessTokenExpiresAt: number;
    deviceInfo: string;
    ipAddress: string | null;
    issuedAt: string;
    lastUsedAt: string;
    expiresAt: string;
    revoked: boolean;
}

/** Session fields replaced when a refresh secret is rotated */
export type SessionRenewal = Pick<Session, 'tokenHash' | 'accessTokenId' | 'accessTokenExpiresAt' | 'lastUsedAt' | 'expiresAt'>;

/** Session as listed to its owner */
export interface SessionView {
    id: string;
    deviceInfo: string;
    ipAddress: string | null;
    issuedAt: string;
    lastUsedAt: string;
    expiresAt: string;
    current: boolean;
}

export interface SessionStore {
    create(session: Session): Promise<Session>;
    findById(id: string): Promise<Session | null>;
    findByUser(userId: string): Promise<Session[]>;
    /**
     * Applies the renewal only while `expectedHash` is still the session's
     * refresh hash and the session is not revoked.
     *
     * @returns false when another refresh or a revocation got there first
     */
    renew(id: string, expectedHash: string, renewal: SessionRenewal): Promise<boolean>;
    /** @returns false when the session was missing or already revoked */
    revoke(id: string): Promise<boolean>;
}

export const SESSION_STORE = Symbol('SESSION_STORE');
