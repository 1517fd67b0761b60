/**
 * @fileoverview Account Lockout
 *
 * Pure lockout rules applied on every login attempt.
 *
 * @remarks
 * - MAX_FAILED_ATTEMPTS consecutive failures lock the account for
 *   LOCKOUT_DURATION_MS.
 * - The lock clears passively: once `now > lockoutEndTime` the account is
 *   treated as unlocked and the next attempt proceeds normally. There is no
 *   background sweep.
 * - A successful login resets the counter and clears the lock.
 *
 * The store applies these decisions with atomic updates; nothing here
 * reads and rewrites a whole user.
 */

import { User } from './interfaces';

export const MAX_FAILED_ATTEMPTS = 5;
export const LOCKOUT_DURATION_MS = 30 * 60 * 1000;

type LockoutState = Pick<User, 'accountLocked' | 'failedLoginAttempts' | 'lockoutEndTime'>;

/**
 * True while a lock is in force. A lock without an end time never expires.
 */
export function isLocked(user: LockoutState, now: Date): boolean {
    if (!user.accountLocked) return false;
    if (user.lockoutEndTime === null) return true;
    return now.getTime() <= Date.parse(user.lockoutEndTime);
}

/**
 * True once the stored failure count reaches the threshold.
 */
export function shouldLock(failedLoginAttempts: number): boolean {
    return failedLoginAttempts >= MAX_FAILED_ATTEMPTS;
}

/**
 * End of a lock that starts at `now`.
 */
export function lockoutEndFrom(now: Date): string {
    return new Date(now.getTime() + LOCKOUT_DURATION_MS).toISOString();
}

/**
 * True when a timed lock is still recorded but has run out.
 */
export function hasExpiredLock(user: LockoutState, now: Date): boolean {
    return user.accountLocked && user.lockoutEndTime !== null && !isLocked(user, now);
}

/**
 * Administrative unlock.
 */
export function clearLock<T extends LockoutState>(user: T): T {
    return { ...user, accountLocked: false, failedLoginAttempts: 0, lockoutEndTime: null };
}
