/**
 * @fileoverview Audit Emitter
 *
 * Fire-and-forget recorder for pipeline outcomes.
 *
 * @remarks
 * - `record()` stamps the entry and returns immediately; writes happen on a
 *   later tick, drained by a single worker.
 * - The queue is bounded. When it is full the NEWEST event is dropped and
 *   counted; the caller is never blocked.
 * - Sink failures are logged and the entry is discarded.
 * - On shutdown the queue is flushed best-effort within a timeout.
 */

import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Counter } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { Clock, CLOCK } from '../shared/clock';
import { AUDIT_SINK, AuditEvent, AuditLogEntry, AuditSink } from './interfaces';

const auditCounter = new Counter({
    name: 'member_directory_audit_events_total',
    help: 'Audit events by outcome of the emitter',
    labelNames: ['result'],
});

export interface AuditEmitterOptions {
    /** Maximum queued entries before new ones are dropped */
    capacity: number;
    /** Upper bound on the shutdown flush */
    flushTimeoutMs: number;
}

export const AUDIT_EMITTER_OPTIONS = Symbol('AUDIT_EMITTER_OPTIONS');

@Injectable()
export class AuditEmitter implements OnApplicationShutdown {
    private readonly logger = new Logger(AuditEmitter.name);
    private readonly queue: AuditLogEntry[] = [];
    private draining: Promise<void> | null = null;
    private dropped = 0;

    constructor(
        @Inject(AUDIT_SINK) private readonly sink: AuditSink,
        @Inject(AUDIT_EMITTER_OPTIONS) private readonly options: AuditEmitterOptions,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    /** Entries waiting to be written */
    get pendingCount(): number {
        return this.queue.length;
    }

    /** Entries dropped because the queue was full */
    get droppedCount(): number {
        return this.dropped;
    }

    /**
     * Queues an event. Never throws and never waits on the sink.
     */
    record(event: AuditEvent): void {
        if (this.queue.length >= this.options.capacity) {
            this.dropped++;
            auditCounter.inc({ result: 'dropped' });
            this.logger.warn({
                msg: 'Audit queue full, dropping event',
                action: event.action,
                entityId: event.entityId,
                capacity: this.options.capacity,
            });
            return;
        }

        this.queue.push({
            ...event,
            id: uuidv4(),
            timestamp: this.clock.now().toISOString(),
        });
        this.scheduleDrain();
    }

    /**
     * Waits for the queue to empty.
     *
     * @returns False when the timeout elapsed first
     */
    async flush(timeoutMs = this.options.flushTimeoutMs): Promise<boolean> {
        const drained = (async () => {
            while (this.draining) {
                await this.draining;
            }
            return true;
        })();

        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });

        const completed = await Promise.race([drained, timedOut]);
        clearTimeout(timer);

        if (!completed) {
            this.logger.warn({ msg: 'Audit flush timed out', pending: this.queue.length });
        }
        return completed;
    }

    async onApplicationShutdown(): Promise<void> {
        await this.flush();
    }

    private scheduleDrain(): void {
        if (this.draining) return;

        this.draining = new Promise<void>((resolve) => setImmediate(resolve))
            .then(() => this.drain())
            .finally(() => {
                this.draining = null;
                if (this.queue.length > 0) {
                    this.scheduleDrain();
                }
            });
    }

    private async drain(): Promise<void> {
        let entry = this.queue.shift();
        while (entry) {
            try {
                await this.sink.append(entry);
                auditCounter.inc({ result: 'written' });
            } catch (error) {
                auditCounter.inc({ result: 'failed' });
                this.logger.error({
                    msg: 'Audit write failed',
                    auditId: entry.id,
                    action: entry.action,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
            entry = this.queue.shift();
        }
    }
}
