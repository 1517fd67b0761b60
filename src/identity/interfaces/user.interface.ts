/**
 * @fileoverview User Interfaces
 */

import { Stamped } from '../../pipeline/assembly/entity-assembler';

/**
 * Authentication principal as stored in DynamoDB.
 *
 * @remarks
 * - username, email: Stored lowercased and trimmed; each unique across users
 * - roleIds: Raw role ids, resolved by an explicit lookup
 * - failedLoginAttempts >= 5 implies accountLocked with lockoutEndTime set
 */
export interface User extends Stamped {
    username: string;
    email: string;
    passwordHash: string;
    roleIds: string[];
    enabled: boolean;
    accountLocked: boolean;
    failedLoginAttempts: number;
    lockoutEndTime: string | null;
    lastLoginDate: string | null;
}

/** User without credentials, as returned over HTTP */
export type UserView = Omit<User, 'passwordHash'>;

export type UserUniqueField = 'username' | 'email';

/**
 * Persistence contract for users.
 *
 * @remarks
 * Implementations MUST enforce username and email uniqueness at the storage
 * layer and throw UniqueConstraintViolationError when a write loses.
 */
export interface UserStore {
    findById(id: string): Promise<User | null>;
    findByField(field: UserUniqueField, value: string): Promise<User | null>;
    findAll(): Promise<User[]>;
    /**
     * Inserts when `previous` is null. Otherwise writes only the attributes
     * that differ from `previous`, so concurrent login bookkeeping survives.
     */
    save(user: User, previous: User | null): Promise<User>;
    /** @throws EntityNotFoundError when no user has the id */
    deleteById(id: string): Promise<void>;

    /* Login bookkeeping: each call is a single atomic write on the stored item */

    /**
     * Adds one failed attempt and returns the user as stored afterwards.
     * @throws EntityNotFoundError when no user has the id
     */
    incrementFailedLogins(id: string): Promise<User>;
    /** Locks until `lockoutEndTime`; false when the account was already locked */
    lockAccount(id: string, lockoutEndTime: string): Promise<boolean>;
    /** Clears the lock only while it still ends at `lockoutEndTime` */
    clearExpiredLock(id: string, lockoutEndTime: string): Promise<boolean>;
    /**
     * Resets the counter and stamps the login time. Returns null, writing
     * nothing, when the account is locked or disabled.
     */
    recordLoginSuccess(id: string, lastLoginDate: string): Promise<User | null>;
}

export const USER_STORE = Symbol('USER_STORE');

export function toUserView(user: User): UserView {
    const { passwordHash: _passwordHash, ...view } = user;
    return view;
}
