/**
 * @fileoverview Clock abstraction
 *
 * Injected wherever "now" decides an outcome (lockout expiry, audit stamps,
 * job retention) so tests can pin time.
 */

export interface Clock {
    now(): Date;
}

/** Injection token for the process clock */
export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
    now: () => new Date(),
};
