/**
 * @fileoverview Principal Resolver
 *
 * Loads the user behind a token and its roles by explicit id lookup. Role
 * and status changes therefore apply on the next request, without re-login.
 */

import { Inject, Injectable } from '@nestjs/common';
import { Clock, CLOCK } from '../shared/clock';
import { PrincipalResolver, ResolvedPrincipal } from '../shared/auth/interfaces';
import { isLocked } from './account-lockout';
import {
    REVOKED_TOKEN_STORE,
    RevokedTokenStore,
    ROLE_STORE,
    RoleStore,
    User,
    USER_STORE,
    UserStore,
} from './interfaces';

@Injectable()
export class PrincipalResolverService implements PrincipalResolver {
    constructor(
        @Inject(USER_STORE) private readonly users: UserStore,
        @Inject(ROLE_STORE) private readonly roles: RoleStore,
        @Inject(REVOKED_TOKEN_STORE) private readonly revokedTokens: RevokedTokenStore,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    async resolve(userId: string): Promise<ResolvedPrincipal | null> {
        const user = await this.users.findById(userId);
        if (!user || !user.enabled || isLocked(user, this.clock.now())) {
            return null;
        }
        return this.principalOf(user);
    }

    /**
     * Builds the principal for a user already known to be active.
     */
    async principalOf(user: User): Promise<ResolvedPrincipal> {
        const roles = await this.roles.findByIds(user.roleIds);
        return {
            userId: user.id,
            username: user.username,
            email: user.email,
            roles: roles.map((role) => ({ name: role.name, permissions: role.permissions })),
        };
    }

    isRevoked(tokenId: string): Promise<boolean> {
        return this.revokedTokens.isRevoked(tokenId);
    }
}
