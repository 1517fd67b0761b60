/**
 * @fileoverview Audit Event Interfaces
 */

export type AuditStatus = 'SUCCESS' | 'FAILURE';

/** Outcome reported by a caller of the emitter */
export interface AuditEvent {
    /** Operation name, e.g. `CREATE_MEMBER` */
    action: string;
    entityType: string;
    entityId: string | null;
    /** Username of the caller, or `anonymous` */
    principal: string;
    ipAddress: string | null;
    status: AuditStatus;
    errorMessage?: string;
    details: Record<string, unknown>;
}

/** Stored, append-only audit record */
export interface AuditLogEntry extends AuditEvent {
    id: string;
    /** ISO 8601 time the event was recorded */
    timestamp: string;
}

/** Destination for drained audit entries */
export interface AuditSink {
    append(entry: AuditLogEntry): Promise<void>;
}

export const AUDIT_SINK = Symbol('AUDIT_SINK');
