/**
 * @fileoverview DynamoDB Error Translator
 *
 * Converts AWS SDK exceptions into persistence errors. Each item of a
 * conditional write carries a {@link WriteGuard} describing what a failed
 * condition on that item means.
 */

import {
    ConditionalCheckFailedException,
    TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
    DependencyUnavailableError,
    EntityNotFoundError,
    UniqueConstraintViolationError,
} from './persistence.errors';

/**
 * Meaning of a failed condition on one write item.
 * - `unique`: the item reserves a unique value
 * - `exists`: the item requires the entity to exist
 */
export type WriteGuard =
    | { kind: 'unique'; field: string; value: string }
    | { kind: 'exists'; entityType: string; id: string }
    | { kind: 'none' };

/** SDK error names that mean the service, not the request, is at fault */
const UNAVAILABLE_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'ServiceUnavailable',
    'InternalServerError',
    'TimeoutError',
]);

/** Node socket error codes */
const NETWORK_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
]);

/** Cancellation reason codes that mean capacity or contention */
const UNAVAILABLE_REASON_CODES = new Set([
    'ThrottlingError',
    'ProvisionedThroughputExceeded',
    'RequestLimitExceeded',
]);

export const DYNAMODB_DEPENDENCY = 'dynamodb';

function errorCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function guardError(guard: WriteGuard | undefined): Error | null {
    if (!guard) return null;
    switch (guard.kind) {
        case 'unique':
            return new UniqueConstraintViolationError(guard.field, guard.value);
        case 'exists':
            return new EntityNotFoundError(guard.entityType, guard.id);
        case 'none':
            return null;
    }
}

/**
 * Returns true when the error means the store itself is unreachable.
 */
export function isUnavailableError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (UNAVAILABLE_ERROR_NAMES.has(error.name)) return true;
    const code = errorCode(error);
    return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

/**
 * Translates an error thrown by a DynamoDB write.
 *
 * @param error - Whatever the SDK threw
 * @param guards - One guard per item, in the order the items were sent
 * @returns A persistence error, or the original error when it has no mapping
 */
export function translateWriteError(error: unknown, guards: WriteGuard[]): unknown {
    if (error instanceof TransactionCanceledException) {
        const reasons = error.CancellationReasons ?? [];

        // A unique-key item that conflicted with a concurrent transaction lost the same race
        for (let i = 0; i < reasons.length; i++) {
            const code = reasons[i].Code;
            const guard = guards[i];
            if (code === 'ConditionalCheckFailed' || (code === 'TransactionConflict' && guard?.kind === 'unique')) {
                const translated = guardError(guard);
                if (translated) return translated;
            }
        }

        if (reasons.some((reason) => reason.Code !== undefined && UNAVAILABLE_REASON_CODES.has(reason.Code))) {
            return new DependencyUnavailableError(DYNAMODB_DEPENDENCY, error);
        }
        if (reasons.some((reason) => reason.Code === 'TransactionConflict')) {
            return new DependencyUnavailableError(DYNAMODB_DEPENDENCY, error);
        }
        return error;
    }

    if (error instanceof ConditionalCheckFailedException) {
        return guardError(guards[0]) ?? error;
    }

    return translateReadError(error);
}

/**
 * Translates an error thrown by a DynamoDB read.
 */
export function translateReadError(error: unknown): unknown {
    if (isUnavailableError(error)) {
        return new DependencyUnavailableError(DYNAMODB_DEPENDENCY, error);
    }
    return error;
}
