/**
 * @fileoverview Role Interfaces
 */

import { Stamped } from '../../pipeline/assembly/entity-assembler';

/**
 * Named permission set.
 *
 * @remarks
 * - name: Upper-case, unique across roles
 * - permissions: Raw tokens; unknown tokens are ignored at evaluation
 */
export interface Role extends Stamped {
    name: string;
    description: string;
    permissions: string[];
}

/** Roles every deployment relies on; never deletable */
export const PROTECTED_ROLES: readonly string[] = ['ADMIN', 'USER'];

export const ADMIN_ROLE = 'ADMIN';

/** Role granted on self-service registration */
export const DEFAULT_ROLE = 'USER';

export interface RoleStore {
    findById(id: string): Promise<Role | null>;
    /** Exact match on an upper-cased name */
    findByName(name: string): Promise<Role | null>;
    /** Missing ids are left out of the result */
    findByIds(ids: readonly string[]): Promise<Role[]>;
    findAll(): Promise<Role[]>;
    save(role: Role, previous: Role | null): Promise<Role>;
    /** @throws EntityNotFoundError when no role has the id */
    deleteById(id: string): Promise<void>;
}

export const ROLE_STORE = Symbol('ROLE_STORE');
