/**
 * @fileoverview Job Interfaces
 */

export const JOB_TYPES = ['BULK_DELETE', 'EXCEL_UPLOAD'] as const;
export type JobType = typeof JOB_TYPES[number];

export const JOB_STATUSES = ['PENDING', 'IN_PROGRESS', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export type JobStatus = typeof JOB_STATUSES[number];

/**
 * Outcome of one processed item. `errorMessage` is present on failures only.
 */
export interface JobResultItem {
    itemId: string;
    itemDescription: string;
    errorMessage?: string;
}

/**
 * Background bulk operation owned by the user who started it.
 */
export interface Job {
    id: string;
    type: JobType;
    status: JobStatus;
    userId: string;
    username: string;
    totalItems: number;
    processedItems: number;
    successfulItems: number;
    failedItems: number;
    /** 0 to 100 */
    progress: number;
    createdAt: string;
    startedAt: string | null;
    completedAt: string | null;
    errorMessage: string | null;
    successfulResults: JobResultItem[];
    failedResults: JobResultItem[];
}

export interface JobStore {
    findById(id: string): Promise<Job | null>;
    /** Newest first */
    findByUserId(userId: string): Promise<Job[]>;
    findAll(): Promise<Job[]>;
    /** Inserts a new job; fails if the id exists */
    insert(job: Job): Promise<Job>;
    /**
     * Replaces a job only while its stored status still equals `expected`.
     *
     * @returns False when the status moved on (for example a concurrent cancel)
     */
    replaceIfStatus(job: Job, expected: JobStatus): Promise<boolean>;
    deleteById(id: string): Promise<void>;
}

export const JOB_STORE = Symbol('JOB_STORE');
