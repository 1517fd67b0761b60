/**
 * @fileoverview Principal Resolver contract
 *
 * Implemented by the identity vertical; consumed by the JWT strategy so the
 * shared auth layer never touches user storage directly.
 */

import { ResolvedPrincipal } from './authenticated-user.interface';

export interface PrincipalResolver {
    /**
     * Loads an active principal. Returns null for unknown, disabled or
     * currently locked users.
     */
    resolve(userId: string): Promise<ResolvedPrincipal | null>;

    /** True when the token id was revoked by logout */
    isRevoked(tokenId: string): Promise<boolean>;
}

export const PRINCIPAL_RESOLVER = Symbol('PRINCIPAL_RESOLVER');
