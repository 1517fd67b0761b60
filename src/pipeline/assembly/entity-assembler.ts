/**
 * @fileoverview Entity Assembler
 *
 * Builds persist-ready records from validated input and stamps the audit
 * columns. No I/O; the clock is injected.
 */

import { Inject, Injectable } from '@nestjs/common';
import { Clock, CLOCK } from '../../shared/clock';

/** Actor recorded when no principal exists (seed scripts, migrations) */
export const SYSTEM_ACTOR = 'system';

/** Audit columns carried by every stored entity */
export interface AuditStamp {
    createdAt: string;
    updatedAt: string;
    createdBy: string;
    updatedBy: string;
}

export interface Identified {
    id: string;
}

export type Stamped = Identified & AuditStamp;

/** Columns an update may never overwrite */
export type Immutable = keyof Stamped;

@Injectable()
export class EntityAssembler {
    constructor(@Inject(CLOCK) private readonly clock: Clock) { }

    /**
     * Creates a new record with both stamps set to now.
     *
     * @param actor - Username of the principal, or null for {@link SYSTEM_ACTOR}
     */
    create<T extends object>(id: string, fields: T, actor: string | null): T & Stamped {
        const now = this.clock.now().toISOString();
        const by = actor ?? SYSTEM_ACTOR;
        return {
            ...fields,
            id,
            createdAt: now,
            updatedAt: now,
            createdBy: by,
            updatedBy: by,
        };
    }

    /**
     * Applies changes to an existing record, keeping its identity and creation stamp.
     */
    update<T extends Stamped>(existing: T, changes: Partial<Omit<T, Immutable>>, actor: string | null): T {
        return {
            ...existing,
            ...changes,
            id: existing.id,
            createdAt: existing.createdAt,
            createdBy: existing.createdBy,
            updatedAt: this.clock.now().toISOString(),
            updatedBy: actor ?? SYSTEM_ACTOR,
        };
    }
}
