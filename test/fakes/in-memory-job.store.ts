/**
 * @fileoverview In-memory job store
 */

import { Job, JobStatus, JobStore } from '../../src/jobs/interfaces';

export class InMemoryJobStore implements JobStore {
    readonly jobs = new Map<string, Job>();

    async findById(id: string): Promise<Job | null> {
        return this.jobs.get(id) ?? null;
    }

    async findByUserId(userId: string): Promise<Job[]> {
        return [...this.jobs.values()]
            .filter((job) => job.userId === userId)
            .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }

    async findAll(): Promise<Job[]> {
        return [...this.jobs.values()];
    }

    async insert(job: Job): Promise<Job> {
        if (this.jobs.has(job.id)) {
            throw new Error(`Job ${job.id} exists`);
        }
        this.jobs.set(job.id, job);
        return job;
    }

    async replaceIfStatus(job: Job, expected: JobStatus): Promise<boolean> {
        const stored = this.jobs.get(job.id);
        if (!stored || stored.status !== expected) {
            return false;
        }
        this.jobs.set(job.id, job);
        return true;
    }

    async deleteById(id: string): Promise<void> {
        this.jobs.delete(id);
    }
}
