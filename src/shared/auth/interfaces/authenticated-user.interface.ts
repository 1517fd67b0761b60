/**
 * @fileoverview Authenticated User
 */

import { RoleGrant } from '../../../pipeline/authorization/permission-evaluator';

/**
 * Principal resolved from a user record and its roles.
 */
export interface ResolvedPrincipal {
    userId: string;
    username: string;
    email: string;
    /** Roles looked up by id, with their raw permission tokens */
    roles: RoleGrant[];
}

/**
 * User context attached to authenticated requests after JWT validation.
 *
 * @remarks
 * Populated by JwtStrategy.validate() and available via `@Request() req.user`.
 */
export interface AuthenticatedUser extends ResolvedPrincipal {
    /** `jti` of the presented token */
    tokenId?: string;
    /** `exp` of the presented token, epoch seconds */
    tokenExpiresAt?: number;
}
