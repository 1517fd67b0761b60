/**
 * @fileoverview Permission Guard
 *
 * NestJS guard for read-only and administrative endpoints that bypass the
 * request pipeline. Mutating endpoints authorize inside the pipeline instead,
 * after validation.
 *
 * @example
 * ```typescript
 * @RequirePermissions('member:read')
 * @UseGuards(AuthGuard('jwt'), PermissionsGuard)
 * async listMembers() { ... }
 * ```
 */

import { Injectable, CanActivate, ExecutionContext, SetMetadata } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Permission } from '../../pipeline/authorization/permission';
import { PermissionEvaluator } from '../../pipeline/authorization/permission-evaluator';
import { AuthenticatedUser } from './interfaces';

/* -------------------------------------------------------------------------- */
/*                              Decorator & Metadata                           */
/* -------------------------------------------------------------------------- */

/** Metadata key for storing required permissions */
export const PERMISSIONS_KEY = 'permissions';

/**
 * Declares the permissions a handler requires. All listed permissions must
 * be granted.
 */
export const RequirePermissions = (...permissions: Permission[]) => SetMetadata(PERMISSIONS_KEY, permissions);

/* -------------------------------------------------------------------------- */
/*                              Guard Implementation                           */
/* -------------------------------------------------------------------------- */

@Injectable()
export class PermissionsGuard implements CanActivate {
    constructor(
        private reflector: Reflector,
        private evaluator: PermissionEvaluator,
    ) { }

    /**
     * @remarks
     * 1. No @RequirePermissions() metadata: allow
     * 2. No authenticated user: deny
     * 3. Otherwise every required permission must be granted by some role
     */
    canActivate(context: ExecutionContext): boolean {
        const required = this.reflector.getAllAndOverride<Permission[] | undefined>(PERMISSIONS_KEY, [
            context.getHandler(),
            context.getClass(),
        ]);

        if (!required || required.length === 0) {
            return true;
        }

        const request = context.switchToHttp().getRequest<{ user?: AuthenticatedUser }>();
        const user = request.user;

        if (!user) {
            return false;
        }

        return required.every((permission) => this.evaluator.authorize(user.roles, permission));
    }
}
