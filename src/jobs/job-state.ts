/**
 * @fileoverview Job Lifecycle
 *
 * ```
 * PENDING → IN_PROGRESS → COMPLETED | FAILED | CANCELLED
 * PENDING → CANCELLED | FAILED
 * ```
 *
 * Terminal states accept no further transition.
 */

import { Job, JobStatus } from './interfaces';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
    PENDING: ['IN_PROGRESS', 'CANCELLED', 'FAILED'],
    IN_PROGRESS: ['COMPLETED', 'FAILED', 'CANCELLED'],
    COMPLETED: [],
    FAILED: [],
    CANCELLED: [],
};

export const ACTIVE_STATUSES: readonly JobStatus[] = ['PENDING', 'IN_PROGRESS'];

export class InvalidJobTransitionError extends Error {
    constructor(
        public readonly from: JobStatus,
        public readonly to: JobStatus,
    ) {
        super(`Job cannot move from ${from} to ${to}`);
        this.name = 'InvalidJobTransitionError';
    }
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

export function isActive(status: JobStatus): boolean {
    return ACTIVE_STATUSES.includes(status);
}

/**
 * Moves a job to its next status, stamping `startedAt` on start and
 * `completedAt` on any terminal status.
 *
 * @throws InvalidJobTransitionError when the move is not allowed
 */
export function transitionJob(job: Job, to: JobStatus, now: Date, errorMessage: string | null = null): Job {
    if (!canTransition(job.status, to)) {
        throw new InvalidJobTransitionError(job.status, to);
    }
    const timestamp = now.toISOString();
    return {
        ...job,
        status: to,
        ...(to === 'IN_PROGRESS' && { startedAt: timestamp }),
        ...(isTerminal(to) && { completedAt: timestamp }),
        ...(to === 'COMPLETED' && { progress: 100 }),
        ...(errorMessage !== null && { errorMessage }),
    };
}
