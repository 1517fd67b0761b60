/**
 * @fileoverview JWT Payload Interface
 */

/**
 * Claims of access tokens issued by the auth service.
 */
export interface JwtPayload {
    /** Subject claim - user id */
    sub: string;

    /** Username at issue time (display only; the user is re-resolved per request) */
    username: string;

    /** Token id, used for revocation on logout */
    jti?: string;

    /** Standard JWT claims */
    iss?: string;
    iat?: number;
    exp?: number;
}
