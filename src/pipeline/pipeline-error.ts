/**
 * @fileoverview Pipeline Errors and States
 */

import { FieldErrors } from './validation/field-validator';
import { Permission } from './authorization/permission';

/**
 * Terminal failure of a pipeline run, keyed by the state it ended in.
 *
 * @remarks
 * FORBIDDEN carries the required permission for logs and audit only; the
 * HTTP mapping never echoes it.
 */
export type PipelineError =
    | { kind: 'VALIDATION_FAILED'; fieldErrors: FieldErrors }
    | { kind: 'CONFLICT'; field: string; value: string }
    | { kind: 'FORBIDDEN'; requiredPermission: Permission }
    | { kind: 'NOT_FOUND'; entityType: string; id: string }
    | { kind: 'PRECONDITION_FAILED'; reason: string }
    | { kind: 'DEPENDENCY_UNAVAILABLE'; dependency: string }
    | { kind: 'PERSIST_FAILED'; reason: string };

export type PipelineFailureState = PipelineError['kind'];

export type PipelineState =
    | 'RECEIVED'
    | 'VALIDATING'
    | 'UNIQUENESS_CHECKING'
    | 'AUTHORIZING'
    | 'ASSEMBLING'
    | 'PERSISTING'
    | 'COMPLETED'
    | PipelineFailureState;

/**
 * One-line description used for audit entries and logs.
 */
export function describePipelineError(error: PipelineError): string {
    switch (error.kind) {
        case 'VALIDATION_FAILED':
            return `Validation failed: ${Object.values(error.fieldErrors).join('; ')}`;
        case 'CONFLICT':
            return `Duplicate ${error.field}`;
        case 'FORBIDDEN':
            return `Missing permission ${error.requiredPermission}`;
        case 'NOT_FOUND':
            return `${error.entityType} ${error.id} not found`;
        case 'PRECONDITION_FAILED':
            return error.reason;
        case 'DEPENDENCY_UNAVAILABLE':
            return `Dependency unavailable: ${error.dependency}`;
        case 'PERSIST_FAILED':
            return `Persist failed: ${error.reason}`;
    }
}

/** Failures an operation's assembly step may report */
export type AssemblyFailure = Extract<PipelineError, { kind: 'NOT_FOUND' | 'PRECONDITION_FAILED' }>;

export function notFound(entityType: string, id: string): AssemblyFailure {
    return { kind: 'NOT_FOUND', entityType, id };
}

export function preconditionFailed(reason: string): AssemblyFailure {
    return { kind: 'PRECONDITION_FAILED', reason };
}
