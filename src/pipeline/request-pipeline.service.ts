/**
 * @fileoverview Request Pipeline
 *
 * Orchestrates every mutating operation through a fixed sequence of stages:
 *
 * ```
 * RECEIVED → VALIDATING → UNIQUENESS_CHECKING → AUTHORIZING → ASSEMBLING → PERSISTING → COMPLETED
 * ```
 *
 * @remarks
 * - Cheapest checks run first, so a malformed request never costs a lookup.
 * - Authorization runs after the uniqueness check and before anything is
 *   loaded, so a caller without permission never learns whether a target id
 *   exists.
 * - Each run ends in exactly one terminal state and emits exactly one audit
 *   event. Audit failures are contained here and never change the outcome.
 * - Expected failures come back as {@link Result} values; nothing is retried.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Counter, Histogram } from 'prom-client';
import { AuditEmitter } from '../audit/audit-emitter.service';
import {
    DependencyUnavailableError,
    EntityNotFoundError,
    UniqueConstraintViolationError,
} from '../shared/persistence';
import { Permission } from './authorization/permission';
import { PermissionEvaluator, RoleGrant } from './authorization/permission-evaluator';
import { AssemblyFailure, describePipelineError, PipelineError, PipelineState } from './pipeline-error';
import { err, ok, Result } from './result';
import { UniqueLookup, UniquenessChecker } from './uniqueness/uniqueness-checker';
import { FieldInput, FieldValidator } from './validation/field-validator';

const pipelineCounter = new Counter({
    name: 'member_directory_pipeline_runs_total',
    help: 'Pipeline runs by action and terminal state',
    labelNames: ['action', 'state'],
});

const pipelineDuration = new Histogram({
    name: 'member_directory_pipeline_duration_seconds',
    help: 'Pipeline run latency',
    labelNames: ['action'],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
});

/** Principal name recorded when the caller is not authenticated */
export const ANONYMOUS = 'anonymous';

/** The part of the authenticated user the pipeline reads */
export interface Principal {
    username: string;
    roles: readonly RoleGrant[];
}

/** Per-request inputs supplied by the HTTP layer */
export interface RequestContext {
    principal: Principal | null;
    ipAddress: string | null;
}

/** One unique value to pre-check */
export interface UniqueFieldCheck {
    field: string;
    /** Already normalized */
    value: string;
    lookup: UniqueLookup;
    /** Record allowed to hold the value */
    excludeId?: string;
}

/**
 * Declarative description of one mutating operation.
 *
 * @typeParam TEntity - Record produced by assembly and handed to persist
 * @typeParam TResult - Value returned to the caller on success
 */
export interface PipelineOperation<TEntity, TResult> {
    /** Audit action, e.g. `CREATE_MEMBER` */
    action: string;
    entityType: string;
    /** Target id for operations on an existing record */
    entityId?: string;
    /** Null only for self-service operations open to anonymous callers */
    requiredPermission: Permission | null;
    fields: Record<string, FieldInput>;
    uniqueFields?: UniqueFieldCheck[];
    /**
     * Builds the record to persist. May load the target; returns a failure
     * when it is missing or a business rule forbids the change.
     */
    assemble(actor: string | null): Promise<Result<TEntity, AssemblyFailure>>;
    persist(entity: TEntity): Promise<TResult>;
    /** Id recorded in the audit entry once the entity exists */
    idOf?(entity: TEntity): string;
    /** Extra audit details; never include secrets */
    details?: Record<string, unknown>;
}

/** Terminal state plus whatever the audit entry needs */
interface RunOutcome<TResult> {
    result: Result<TResult, PipelineError>;
    entityId: string | null;
}

@Injectable()
export class RequestPipeline {
    private readonly logger = new Logger(RequestPipeline.name);

    constructor(
        private readonly validator: FieldValidator,
        private readonly uniqueness: UniquenessChecker,
        private readonly evaluator: PermissionEvaluator,
        private readonly audit: AuditEmitter,
    ) { }

    /**
     * Runs an operation to a terminal state.
     */
    async run<TEntity, TResult>(
        operation: PipelineOperation<TEntity, TResult>,
        context: RequestContext,
    ): Promise<Result<TResult, PipelineError>> {
        const stopTimer = pipelineDuration.startTimer({ action: operation.action });
        const outcome = await this.execute(operation, context);
        stopTimer();

        const state: PipelineState = outcome.result.ok ? 'COMPLETED' : outcome.result.error.kind;
        pipelineCounter.inc({ action: operation.action, state });
        this.emitAudit(operation, context, outcome);

        return outcome.result;
    }

    private async execute<TEntity, TResult>(
        operation: PipelineOperation<TEntity, TResult>,
        context: RequestContext,
    ): Promise<RunOutcome<TResult>> {
        let state: PipelineState = 'RECEIVED';
        let entityId = operation.entityId ?? null;

        const transition = (next: PipelineState): void => {
            this.logger.debug({ msg: 'Pipeline transition', action: operation.action, from: state, to: next });
            state = next;
        };
        const fail = (error: PipelineError): RunOutcome<TResult> => {
            transition(error.kind);
            return { result: err(error), entityId };
        };

        transition('VALIDATING');
        const fieldErrors = this.validator.validateAll(operation.fields);
        if (Object.keys(fieldErrors).length > 0) {
            return fail({ kind: 'VALIDATION_FAILED', fieldErrors });
        }

        transition('UNIQUENESS_CHECKING');
        for (const check of operation.uniqueFields ?? []) {
            let unique: boolean;
            try {
                unique = await this.uniqueness.isUnique(check.lookup, check.field, check.value, check.excludeId);
            } catch (error) {
                return fail(this.dependencyFailure(operation.action, error));
            }
            if (!unique) {
                return fail({ kind: 'CONFLICT', field: check.field, value: check.value });
            }
        }

        transition('AUTHORIZING');
        const required = operation.requiredPermission;
        if (required !== null) {
            const principal = context.principal;
            if (!principal || !this.evaluator.authorize(principal.roles, required)) {
                return fail({ kind: 'FORBIDDEN', requiredPermission: required });
            }
        }

        transition('ASSEMBLING');
        let assembled: Result<TEntity, AssemblyFailure>;
        try {
            assembled = await operation.assemble(context.principal?.username ?? null);
        } catch (error) {
            return fail(this.unexpectedFailure(operation.action, error));
        }
        if (!assembled.ok) {
            return fail(assembled.error);
        }
        const entity = assembled.value;
        if (operation.idOf) {
            entityId = operation.idOf(entity);
        }

        transition('PERSISTING');
        let value: TResult;
        try {
            value = await operation.persist(entity);
        } catch (error) {
            return fail(this.persistFailure(operation.action, error));
        }

        transition('COMPLETED');
        return { result: ok(value), entityId };
    }

    private dependencyFailure(action: string, error: unknown): PipelineError {
        const dependency = error instanceof DependencyUnavailableError ? error.dependency : 'unknown';
        this.logger.warn({ msg: 'Dependency unavailable', action, dependency });
        return { kind: 'DEPENDENCY_UNAVAILABLE', dependency };
    }

    private unexpectedFailure(action: string, error: unknown): PipelineError {
        if (error instanceof DependencyUnavailableError) {
            return this.dependencyFailure(action, error);
        }
        if (error instanceof EntityNotFoundError) {
            return { kind: 'NOT_FOUND', entityType: error.entityType, id: error.id };
        }
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error({ msg: 'Pipeline stage failed', action, reason });
        return { kind: 'PERSIST_FAILED', reason };
    }

    /**
     * Maps a write failure. A storage-level uniqueness violation lands in the
     * same CONFLICT state as a failed pre-check.
     */
    private persistFailure(action: string, error: unknown): PipelineError {
        if (error instanceof UniqueConstraintViolationError) {
            return { kind: 'CONFLICT', field: error.field, value: error.value };
        }
        return this.unexpectedFailure(action, error);
    }

    private emitAudit<TEntity, TResult>(
        operation: PipelineOperation<TEntity, TResult>,
        context: RequestContext,
        outcome: RunOutcome<TResult>,
    ): void {
        const { result } = outcome;
        try {
            this.audit.record({
                action: operation.action,
                entityType: operation.entityType,
                entityId: outcome.entityId,
                principal: context.principal?.username ?? ANONYMOUS,
                ipAddress: context.ipAddress,
                status: result.ok ? 'SUCCESS' : 'FAILURE',
                ...(!result.ok && { errorMessage: describePipelineError(result.error) }),
                details: {
                    ...operation.details,
                    state: result.ok ? 'COMPLETED' : result.error.kind,
                    ...(!result.ok && result.error.kind === 'VALIDATION_FAILED' && {
                        fields: Object.keys(result.error.fieldErrors),
                    }),
                    ...(!result.ok && result.error.kind === 'CONFLICT' && { field: result.error.field }),
                },
            });
        } catch (error) {
            this.logger.error({
                msg: 'Audit emission failed',
                action: operation.action,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}
