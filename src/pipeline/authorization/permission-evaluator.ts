/**
 * @fileoverview Permission Evaluator
 *
 * Decides whether a set of roles grants a permission.
 *
 * @remarks
 * A principal is authorized when ANY role holds the required permission or
 * {@link SUPER_ADMIN}. Unknown tokens stored on a role are skipped and never
 * match, not even against an identical unknown requirement.
 */

import { Injectable } from '@nestjs/common';
import { Permission, parsePermission, SUPER_ADMIN } from './permission';

/** The part of a role the evaluator reads */
export interface RoleGrant {
    name: string;
    permissions: readonly string[];
}

/**
 * Collects the effective permissions of a role set.
 */
export function effectivePermissions(roles: readonly RoleGrant[]): Set<Permission> {
    const granted = new Set<Permission>();
    for (const role of roles) {
        for (const token of role.permissions) {
            const permission = parsePermission(token);
            if (permission) granted.add(permission);
        }
    }
    return granted;
}

@Injectable()
export class PermissionEvaluator {
    authorize(roles: readonly RoleGrant[], required: Permission): boolean {
        const granted = effectivePermissions(roles);
        return granted.has(SUPER_ADMIN) || granted.has(required);
    }
}
