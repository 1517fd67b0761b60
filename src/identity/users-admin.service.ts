/**
 * @fileoverview User Administration Service
 *
 * Account status and role membership changes made by administrators.
 *
 * @remarks
 * Guard rails, checked during assembly once the caller is authorized:
 * - An administrator cannot disable, delete or strip roles from their own account.
 * - The last holder of the ADMIN role cannot lose it, by removal or deletion.
 */

import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import {
    AssemblyFailure,
    EntityAssembler,
    err,
    FieldInput,
    notFound,
    ok,
    PipelineError,
    preconditionFailed,
    RequestContext,
    RequestPipeline,
    Result,
} from '../pipeline';
import { Page, paginate } from '../shared/pagination';
import { clearLock } from './account-lockout';
import { RoleIdsDto } from './dto';
import {
    ADMIN_ROLE,
    ROLE_STORE,
    RoleStore,
    toUserView,
    User,
    USER_STORE,
    UserStore,
    UserView,
} from './interfaces';

const ENTITY_TYPE = 'User';

type UserChanges = Partial<Pick<User, 'enabled' | 'roleIds' | 'accountLocked' | 'failedLoginAttempts' | 'lockoutEndTime'>>;

interface UserChange {
    previous: User;
    next: User;
}

/** Role ids from an already validated body */
function roleIdsOf(raw: unknown): string[] {
    if (!Array.isArray(raw)) return [];
    return [...new Set(raw.filter((id): id is string => typeof id === 'string').map((id) => id.trim()))];
}

@Injectable()
export class UsersAdminService {
    constructor(
        @Inject(USER_STORE) private readonly users: UserStore,
        @Inject(ROLE_STORE) private readonly roles: RoleStore,
        private readonly pipeline: RequestPipeline,
        private readonly assembler: EntityAssembler,
    ) { }

    /* ---------------------------------------------------------------------- */
    /*                              Reads                                      */
    /* ---------------------------------------------------------------------- */

    async listUsers(page: number, size: number): Promise<Page<UserView>> {
        const users = await this.users.findAll();
        const sorted = users
            .sort((a, b) => a.username.localeCompare(b.username))
            .map(toUserView);
        return paginate(sorted, page, size);
    }

    async getUser(id: string): Promise<UserView> {
        const user = await this.users.findById(id);
        if (!user) {
            throw new NotFoundException(`${ENTITY_TYPE} not found`);
        }
        return toUserView(user);
    }

    /* ---------------------------------------------------------------------- */
    /*                              Status                                     */
    /* ---------------------------------------------------------------------- */

    enableUser(id: string, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        return this.modify('ENABLE_USER', id, context, async () => ok({ enabled: true }));
    }

    disableUser(id: string, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        return this.modify('DISABLE_USER', id, context, async (user, actor) => (
            user.username === actor
                ? err(preconditionFailed('Cannot disable your own account'))
                : ok({ enabled: false })
        ));
    }

    /**
     * Clears an active or expired lock and the failure counter.
     */
    unlockUser(id: string, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        return this.modify('UNLOCK_USER', id, context, async (user) => {
            const { accountLocked, failedLoginAttempts, lockoutEndTime } = clearLock(user);
            return ok({ accountLocked, failedLoginAttempts, lockoutEndTime });
        });
    }

    /* ---------------------------------------------------------------------- */
    /*                              Roles                                      */
    /* ---------------------------------------------------------------------- */

    /**
     * Adds roles to a user; roles already held are kept.
     */
    assignRoles(id: string, dto: RoleIdsDto, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        const requested = roleIdsOf(dto.roleIds);

        return this.modify('ASSIGN_ROLES', id, context, async (user) => {
            const found = await this.roles.findByIds(requested);
            const missing = requested.find((roleId) => !found.some((role) => role.id === roleId));
            if (missing !== undefined) {
                return err(notFound('Role', missing));
            }
            return ok({ roleIds: [...new Set([...user.roleIds, ...requested])] });
        }, { roleIds: { value: dto.roleIds, rules: 'roleIds' } }, { roleIds: requested });
    }

    removeRoles(id: string, dto: RoleIdsDto, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        const requested = roleIdsOf(dto.roleIds);

        return this.modify('REMOVE_ROLES', id, context, async (user, actor) => {
            if (user.username === actor) {
                return err(preconditionFailed('Cannot remove roles from your own account'));
            }
            const adminRoleId = await this.adminRoleId();
            if (adminRoleId && requested.includes(adminRoleId) && user.roleIds.includes(adminRoleId)
                && await this.isLastAdmin(adminRoleId)) {
                return err(preconditionFailed('Cannot remove ADMIN role from the last admin'));
            }
            return ok({ roleIds: user.roleIds.filter((roleId) => !requested.includes(roleId)) });
        }, { roleIds: { value: dto.roleIds, rules: 'roleIds' } }, { roleIds: requested });
    }

    /* ---------------------------------------------------------------------- */
    /*                              Deletion                                   */
    /* ---------------------------------------------------------------------- */

    async deleteUser(id: string, context: RequestContext): Promise<Result<UserView, PipelineError>> {
        return this.pipeline.run<User, UserView>({
            action: 'DELETE_USER',
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'user:delete',
            fields: {},
            assemble: async (actor) => {
                const user = await this.users.findById(id);
                if (!user) return err(notFound(ENTITY_TYPE, id));
                if (user.username === actor) {
                    return err(preconditionFailed('Cannot delete your own account'));
                }
                const adminRoleId = await this.adminRoleId();
                if (adminRoleId && user.roleIds.includes(adminRoleId) && await this.isLastAdmin(adminRoleId)) {
                    return err(preconditionFailed('Cannot delete the last admin'));
                }
                return ok(user);
            },
            persist: async (user) => {
                await this.users.deleteById(user.id);
                return toUserView(user);
            },
        }, context);
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    /**
     * Runs a `user:update` operation that loads the target and applies the
     * changes returned by `decide`.
     */
    private modify(
        action: string,
        id: string,
        context: RequestContext,
        decide: (user: User, actor: string | null) => Promise<Result<UserChanges, AssemblyFailure>>,
        fields: Record<string, FieldInput> = {},
        details: Record<string, unknown> = {},
    ): Promise<Result<UserView, PipelineError>> {
        return this.pipeline.run<UserChange, UserView>({
            action,
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'user:update',
            fields,
            assemble: async (actor) => {
                const previous = await this.users.findById(id);
                if (!previous) return err(notFound(ENTITY_TYPE, id));
                const decision = await decide(previous, actor);
                if (!decision.ok) return decision;
                return ok({ previous, next: this.assembler.update(previous, decision.value, actor) });
            },
            persist: async ({ previous, next }) => toUserView(await this.users.save(next, previous)),
            details,
        }, context);
    }

    private async adminRoleId(): Promise<string | null> {
        const role = await this.roles.findByName(ADMIN_ROLE);
        return role?.id ?? null;
    }

    private async isLastAdmin(adminRoleId: string): Promise<boolean> {
        const admins = (await this.users.findAll()).filter((user) => user.roleIds.includes(adminRoleId));
        return admins.length <= 1;
    }
}
