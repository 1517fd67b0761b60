/**
 * @fileoverview Member Interfaces
 *
 * Canonical member record and the store contract the service depends on.
 */

import { Stamped } from '../../pipeline/assembly/entity-assembler';

/**
 * Member record as stored in DynamoDB.
 *
 * @remarks
 * - id: Partition key (HASH), UUID v4
 * - email: Stored lowercased and trimmed; unique across all members
 * - phoneNumber: Exactly 10 digits, first digit 6-9
 */
export interface Member extends Stamped {
    name: string;
    email: string;
    phoneNumber: string;
}

/** Fields a caller supplies on register or update */
export type MemberFields = Pick<Member, 'name' | 'email' | 'phoneNumber'>;

/** Unique fields of a member */
export type MemberUniqueField = 'email';

/**
 * Persistence contract for members.
 *
 * @remarks
 * Implementations MUST enforce email uniqueness at the storage layer and
 * throw UniqueConstraintViolationError when a write loses.
 */
export interface MemberStore {
    findById(id: string): Promise<Member | null>;

    /** Exact match on an already-normalized value */
    findByField(field: MemberUniqueField, value: string): Promise<Member | null>;

    findAll(): Promise<Member[]>;

    /**
     * Inserts when `previous` is null, otherwise replaces `previous`.
     */
    save(member: Member, previous: Member | null): Promise<Member>;

    /** @throws EntityNotFoundError when no member has the id */
    deleteById(id: string): Promise<void>;
}

export const MEMBER_STORE = Symbol('MEMBER_STORE');
