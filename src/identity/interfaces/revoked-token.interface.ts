/**
 * @fileoverview Revoked Token Interfaces
 */

/** Access token revoked by logout; kept until it would have expired */
export interface RevokedToken {
    jti: string;
    userId: string;
    /** Epoch seconds; DynamoDB TTL attribute */
    expiresAt: number;
}

export interface RevokedTokenStore {
    revoke(token: RevokedToken): Promise<void>;
    isRevoked(jti: string): Promise<boolean>;
}

export const REVOKED_TOKEN_STORE = Symbol('REVOKED_TOKEN_STORE');
