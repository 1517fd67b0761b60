/**
 * @fileoverview Permission Tokens
 *
 * Closed set of `resource:action` tokens plus the `system:admin` wildcard.
 * Tokens are stored as plain strings on roles; {@link parsePermission} is
 * the only way back into the typed set.
 */

export const RESOURCES = ['member', 'user', 'role'] as const;
export const ACTIONS = ['create', 'read', 'update', 'delete'] as const;

export type Resource = typeof RESOURCES[number];
export type Action = typeof ACTIONS[number];

/** Implies every other permission, including ones added later */
export const SUPER_ADMIN = 'system:admin';

export type ResourcePermission = `${Resource}:${Action}`;
export type Permission = ResourcePermission | typeof SUPER_ADMIN;

/** Every resource permission, super-admin excluded */
export const RESOURCE_PERMISSIONS: readonly ResourcePermission[] = RESOURCES.flatMap(
    (resource) => ACTIONS.map((action): ResourcePermission => `${resource}:${action}`),
);

/** Every declared permission, super-admin last */
export const ALL_PERMISSIONS: readonly Permission[] = [...RESOURCE_PERMISSIONS, SUPER_ADMIN];

const KNOWN = new Set<string>(ALL_PERMISSIONS);

function isPermission(token: string): token is Permission {
    return KNOWN.has(token);
}

/**
 * Parses a stored token. Case and surrounding whitespace are ignored.
 *
 * @returns The permission, or null for unknown tokens
 */
export function parsePermission(token: string): Permission | null {
    const normalized = token.trim().toLowerCase();
    return isPermission(normalized) ? normalized : null;
}

export function formatPermission(permission: Permission): string {
    return permission;
}

/** Tokens that {@link parsePermission} rejects */
export function unknownPermissions(tokens: readonly string[]): string[] {
    return tokens.filter((token) => parsePermission(token) === null);
}
