/**
 * @fileoverview Roles Service
 *
 * Role administration. Every mutation is a pipeline operation.
 *
 * @remarks
 * - Names are stored upper-case and unique.
 * - Permission tokens are validated against the known set, normalized and
 *   de-duplicated before storage.
 * - ADMIN and USER cannot be renamed or deleted; a role still held by a
 *   user cannot be deleted.
 */

import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
    ALL_PERMISSIONS,
    EntityAssembler,
    err,
    FieldInput,
    notFound,
    ok,
    parsePermission,
    Permission,
    PipelineError,
    preconditionFailed,
    RequestContext,
    RequestPipeline,
    Result,
    textOf,
    UniqueFieldCheck,
    UniqueLookup,
} from '../pipeline';
import { RoleRequestDto } from './dto';
import { PROTECTED_ROLES, Role, ROLE_STORE, RoleStore, USER_STORE, UserStore } from './interfaces';

const ENTITY_TYPE = 'Role';

/** Upper-cased, trimmed role name */
export function normalizeRoleName(raw: unknown): string {
    return textOf(raw).toUpperCase();
}

/** Known tokens in canonical form, first occurrence wins */
export function normalizePermissions(raw: unknown): string[] {
    if (!Array.isArray(raw)) return [];
    const permissions = new Set<Permission>();
    for (const token of raw) {
        if (typeof token !== 'string') continue;
        const permission = parsePermission(token);
        if (permission) permissions.add(permission);
    }
    return [...permissions];
}

interface RoleChange {
    previous: Role;
    next: Role;
}

@Injectable()
export class RolesService {
    constructor(
        @Inject(ROLE_STORE) private readonly roles: RoleStore,
        @Inject(USER_STORE) private readonly users: UserStore,
        private readonly pipeline: RequestPipeline,
        private readonly assembler: EntityAssembler,
    ) { }

    private readonly nameOwner: UniqueLookup = async (_field, value) => {
        const owner = await this.roles.findByName(value);
        return owner?.id ?? null;
    };

    async listRoles(): Promise<Role[]> {
        const roles = await this.roles.findAll();
        return roles.sort((a, b) => a.name.localeCompare(b.name));
    }

    listPermissions(): string[] {
        return [...ALL_PERMISSIONS];
    }

    async getRole(id: string): Promise<Role> {
        const role = await this.roles.findById(id);
        if (!role) {
            throw new NotFoundException(`${ENTITY_TYPE} not found`);
        }
        return role;
    }

    async createRole(dto: RoleRequestDto, context: RequestContext): Promise<Result<Role, PipelineError>> {
        const name = normalizeRoleName(dto.name);

        return this.pipeline.run<Role, Role>({
            action: 'CREATE_ROLE',
            entityType: ENTITY_TYPE,
            requiredPermission: 'role:create',
            fields: {
                name: { value: dto.name, rules: 'roleName' },
                description: { value: dto.description, rules: 'description' },
                permissions: { value: dto.permissions, rules: 'permissions' },
            },
            uniqueFields: [{ field: 'name', value: name, lookup: this.nameOwner }],
            assemble: async (actor) => ok(this.assembler.create(uuidv4(), {
                name,
                description: textOf(dto.description),
                permissions: normalizePermissions(dto.permissions),
            }, actor)),
            persist: (role) => this.roles.save(role, null),
            idOf: (role) => role.id,
            details: { name },
        }, context);
    }

    /**
     * Partial update: only the fields present in the body are validated and
     * changed.
     */
    async updateRole(id: string, dto: RoleRequestDto, context: RequestContext): Promise<Result<Role, PipelineError>> {
        const fields: Record<string, FieldInput> = {};
        const uniqueFields: UniqueFieldCheck[] = [];
        const changes: Partial<Pick<Role, 'name' | 'description' | 'permissions'>> = {};

        if (dto.name !== undefined) {
            fields.name = { value: dto.name, rules: 'roleName' };
            changes.name = normalizeRoleName(dto.name);
            uniqueFields.push({ field: 'name', value: changes.name, lookup: this.nameOwner, excludeId: id });
        }
        if (dto.description !== undefined) {
            fields.description = { value: dto.description, rules: 'description' };
            changes.description = textOf(dto.description);
        }
        if (dto.permissions !== undefined) {
            fields.permissions = { value: dto.permissions, rules: 'permissions' };
            changes.permissions = normalizePermissions(dto.permissions);
        }

        return this.pipeline.run<RoleChange, Role>({
            action: 'UPDATE_ROLE',
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'role:update',
            fields,
            uniqueFields,
            assemble: async (actor) => {
                const previous = await this.roles.findById(id);
                if (!previous) return err(notFound(ENTITY_TYPE, id));
                if (changes.name !== undefined && changes.name !== previous.name && PROTECTED_ROLES.includes(previous.name)) {
                    return err(preconditionFailed(`Built-in role ${previous.name} cannot be renamed`));
                }
                return ok({ previous, next: this.assembler.update(previous, changes, actor) });
            },
            persist: ({ previous, next }) => this.roles.save(next, previous),
            details: { changed: Object.keys(changes) },
        }, context);
    }

    async deleteRole(id: string, context: RequestContext): Promise<Result<Role, PipelineError>> {
        return this.pipeline.run<Role, Role>({
            action: 'DELETE_ROLE',
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'role:delete',
            fields: {},
            assemble: async () => {
                const role = await this.roles.findById(id);
                if (!role) return err(notFound(ENTITY_TYPE, id));
                if (PROTECTED_ROLES.includes(role.name)) {
                    return err(preconditionFailed(`Built-in role ${role.name} cannot be deleted`));
                }
                const holders = (await this.users.findAll()).filter((user) => user.roleIds.includes(id));
                if (holders.length > 0) {
                    return err(preconditionFailed(`Role ${role.name} is assigned to ${holders.length} user(s)`));
                }
                return ok(role);
            },
            persist: async (role) => {
                await this.roles.deleteById(role.id);
                return role;
            },
        }, context);
    }
}
