/**
 * @fileoverview Membership Service
 *
 * Member operations. Mutations run through the request pipeline; reads go
 * straight to the store behind the controller's permission guard.
 */

import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
    EntityAssembler,
    err,
    FieldInput,
    normalizeIdentity,
    notFound,
    ok,
    PipelineError,
    RequestContext,
    RequestPipeline,
    Result,
    textOf,
    UniqueLookup,
} from '../pipeline';
import { clampPageSize, paginate } from '../shared/pagination';
import { MemberListQueryDto, MemberRequestDto } from './dto';
import {
    Member,
    MEMBER_STORE,
    MemberFields,
    MemberListQuery,
    MemberPage,
    MemberSort,
    MemberSortField,
    MemberStore,
    SORTABLE_MEMBER_FIELDS,
} from './interfaces';

const ENTITY_TYPE = 'Member';

const DEFAULT_SORT: MemberSort = { field: 'name', direction: 'asc' };

/** An update carries the stored record so the email reservation can move */
interface MemberChange {
    previous: Member;
    next: Member;
}

function isSortField(value: string): value is MemberSortField {
    return SORTABLE_MEMBER_FIELDS.some((field) => field === value);
}

/**
 * Parses `field[,asc|desc]`. Unknown fields fall back to the default sort.
 */
export function parseMemberSort(raw: string | undefined): MemberSort {
    if (!raw) return DEFAULT_SORT;
    const [field, direction] = raw.split(',').map((part) => part.trim());
    if (!isSortField(field)) return DEFAULT_SORT;
    return { field, direction: direction === 'desc' ? 'desc' : 'asc' };
}

/**
 * Applies defaults and the page size cap to a validated query.
 */
export function toMemberListQuery(dto: MemberListQueryDto): MemberListQuery {
    const search = dto.search?.trim();
    return {
        page: dto.page ?? 0,
        size: clampPageSize(dto.size),
        sort: parseMemberSort(dto.sort),
        ...(search ? { search } : {}),
    };
}

@Injectable()
export class MembershipService {
    constructor(
        @Inject(MEMBER_STORE) private readonly store: MemberStore,
        private readonly pipeline: RequestPipeline,
        private readonly assembler: EntityAssembler,
    ) { }

    private readonly emailOwner: UniqueLookup = async (_field, value) => {
        const owner = await this.store.findByField('email', value);
        return owner?.id ?? null;
    };

    private draftOf(dto: MemberRequestDto): MemberFields {
        return {
            name: textOf(dto.name),
            email: normalizeIdentity(textOf(dto.email)),
            phoneNumber: textOf(dto.phoneNumber),
        };
    }

    private fieldsOf(dto: MemberRequestDto): Record<string, FieldInput> {
        return {
            name: { value: dto.name, rules: 'name' },
            email: { value: dto.email, rules: 'email' },
            phoneNumber: { value: dto.phoneNumber, rules: 'phoneNumber' },
        };
    }

    async registerMember(dto: MemberRequestDto, context: RequestContext): Promise<Result<Member, PipelineError>> {
        const draft = this.draftOf(dto);

        return this.pipeline.run<Member, Member>({
            action: 'CREATE_MEMBER',
            entityType: ENTITY_TYPE,
            requiredPermission: 'member:create',
            fields: this.fieldsOf(dto),
            uniqueFields: [{ field: 'email', value: draft.email, lookup: this.emailOwner }],
            assemble: async (actor) => ok(this.assembler.create(uuidv4(), draft, actor)),
            persist: (member) => this.store.save(member, null),
            idOf: (member) => member.id,
        }, context);
    }

    /**
     * Replaces name, email and phone number of an existing member.
     */
    async updateMember(
        id: string,
        dto: MemberRequestDto,
        context: RequestContext,
    ): Promise<Result<Member, PipelineError>> {
        const draft = this.draftOf(dto);

        return this.pipeline.run<MemberChange, Member>({
            action: 'UPDATE_MEMBER',
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'member:update',
            fields: this.fieldsOf(dto),
            uniqueFields: [{ field: 'email', value: draft.email, lookup: this.emailOwner, excludeId: id }],
            assemble: async (actor) => {
                const previous = await this.store.findById(id);
                if (!previous) return err(notFound(ENTITY_TYPE, id));
                return ok({ previous, next: this.assembler.update(previous, draft, actor) });
            },
            persist: ({ previous, next }) => this.store.save(next, previous),
        }, context);
    }

    async deleteMember(id: string, context: RequestContext): Promise<Result<Member, PipelineError>> {
        return this.pipeline.run<Member, Member>({
            action: 'DELETE_MEMBER',
            entityType: ENTITY_TYPE,
            entityId: id,
            requiredPermission: 'member:delete',
            fields: {},
            assemble: async () => {
                const existing = await this.store.findById(id);
                return existing ? ok(existing) : err(notFound(ENTITY_TYPE, id));
            },
            persist: async (member) => {
                await this.store.deleteById(member.id);
                return member;
            },
        }, context);
    }

    async getMember(id: string): Promise<Member> {
        const member = await this.store.findById(id);
        if (!member) {
            throw new NotFoundException(`${ENTITY_TYPE} not found`);
        }
        return member;
    }

    /**
     * Filters, sorts and pages the directory.
     *
     * @remarks
     * Ties on the sort field are broken by id so pages are stable.
     */
    async listMembers(query: MemberListQuery): Promise<MemberPage> {
        const all = await this.store.findAll();
        const needle = query.search?.toLowerCase();
        const matching = needle
            ? all.filter((member) =>
                member.name.toLowerCase().includes(needle)
                || member.email.includes(needle)
                || member.phoneNumber.includes(needle))
            : all;

        const { field, direction } = query.sort;
        const factor = direction === 'asc' ? 1 : -1;
        const sorted = [...matching].sort((a, b) => {
            const byField = a[field].localeCompare(b[field]);
            return byField !== 0 ? byField * factor : a.id.localeCompare(b.id);
        });

        return paginate(sorted, query.page, query.size);
    }
}
