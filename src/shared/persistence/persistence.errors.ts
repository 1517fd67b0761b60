/**
 * @fileoverview Persistence Errors
 *
 * Storage-neutral exceptions raised by repositories. The request pipeline
 * maps each of them onto a terminal state.
 */

/**
 * A write was rejected because another record already owns the value.
 *
 * @remarks
 * Raised by the storage-level guard, not by the pipeline's pre-check, so it
 * is the authoritative signal when two writers race for the same value.
 */
export class UniqueConstraintViolationError extends Error {
    constructor(
        readonly field: string,
        readonly value: string,
    ) {
        super(`Unique constraint violated on ${field}`);
        this.name = 'UniqueConstraintViolationError';
    }
}

/**
 * The backing store could not be reached or refused the call (throttling,
 * timeouts, network failure).
 */
export class DependencyUnavailableError extends Error {
    constructor(
        readonly dependency: string,
        readonly cause?: unknown,
    ) {
        super(`Dependency unavailable: ${dependency}`);
        this.name = 'DependencyUnavailableError';
    }
}

/** A conditional write expected an existing record that is gone. */
export class EntityNotFoundError extends Error {
    constructor(
        readonly entityType: string,
        readonly id: string,
    ) {
        super(`${entityType} ${id} not found`);
        this.name = 'EntityNotFoundError';
    }
}
