/**
 * @fileoverview Jobs Service
 *
 * Creates, runs and tracks background bulk operations on members.
 *
 * @remarks
 * - Each item goes through the membership service, so it is validated,
 *   authorized and audited like a single request made by the job owner.
 * - A failed item is recorded and the job moves on; only a storage failure
 *   while tracking the job itself marks it FAILED.
 * - Cancellation is checked before every item. Progress is saved every
 *   {@link PROGRESS_INTERVAL} items and after the last one.
 * - Runs are tracked so shutdown can wait for them; callers never wait.
 * - Terminal jobs older than `JOB_RETENTION_DAYS` are removed once a day.
 */

import {
    ConflictException,
    ForbiddenException,
    Inject,
    Injectable,
    Logger,
    NotFoundException,
    OnApplicationShutdown,
    OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { MembershipService } from '../membership/membership.service';
import { describePipelineError, RequestContext } from '../pipeline';
import { AuthenticatedUser } from '../shared/auth/interfaces';
import { Clock, CLOCK } from '../shared/clock';
import { MemberImportRowDto } from './dto';
import { Job, JOB_STORE, JobResultItem, JobStore, JobType } from './interfaces';
import { isActive, isTerminal, transitionJob } from './job-state';

const jobCounter = new Counter({
    name: 'member_directory_jobs_total',
    help: 'Background jobs by type and final status',
    labelNames: ['type', 'status'],
});

/** Items processed between progress writes */
export const PROGRESS_INTERVAL = 5;

const CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** How many times a cancel re-reads a job whose status moved underneath it */
const CANCEL_ATTEMPTS = 3;

/** The part of the caller a job keeps */
export type JobOwner = Pick<AuthenticatedUser, 'userId' | 'username' | 'roles'>;

interface ItemOutcome {
    succeeded: boolean;
    result: JobResultItem;
}

function withProgress(
    job: Job,
    processed: number,
    total: number,
    successfulResults: readonly JobResultItem[],
    failedResults: readonly JobResultItem[],
): Job {
    return {
        ...job,
        processedItems: processed,
        successfulItems: successfulResults.length,
        failedItems: failedResults.length,
        progress: Math.floor((processed * 100) / total),
        successfulResults: [...successfulResults],
        failedResults: [...failedResults],
    };
}

@Injectable()
export class JobsService implements OnModuleInit, OnApplicationShutdown {
    private readonly logger = new Logger(JobsService.name);
    private readonly running = new Set<Promise<void>>();
    private readonly retentionDays: number;
    private cleanupTimer: NodeJS.Timeout | null = null;

    constructor(
        @Inject(JOB_STORE) private readonly jobs: JobStore,
        @Inject(CLOCK) private readonly clock: Clock,
        private readonly membership: MembershipService,
        configService: ConfigService,
    ) {
        this.retentionDays = configService.get<number>('JOB_RETENTION_DAYS') ?? 7;
    }

    onModuleInit(): void {
        this.cleanupTimer = setInterval(() => this.scheduleCleanup(), CLEANUP_INTERVAL_MS);
        this.cleanupTimer.unref();
    }

    async onApplicationShutdown(): Promise<void> {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = null;
        }
        await this.idle();
    }

    /** Resolves once every tracked run has settled */
    async idle(): Promise<void> {
        while (this.running.size > 0) {
            this.logger.log({ msg: 'Waiting for background jobs', running: this.running.size });
            await Promise.allSettled([...this.running]);
        }
    }

    /* ---------------------------------------------------------------------- */
    /*                              Starting Jobs                              */
    /* ---------------------------------------------------------------------- */

    /**
     * Queues deletion of the given members and returns the PENDING job.
     */
    async startBulkDelete(memberIds: readonly string[], owner: JobOwner, ipAddress: string | null): Promise<Job> {
        const ids = [...new Set(memberIds.map((id) => id.trim()).filter((id) => id.length > 0))];
        const job = await this.createJob('BULK_DELETE', owner, ids.length);
        const context = this.contextOf(owner, ipAddress);

        this.track(`job ${job.id}`, () => this.process(job, ids, async (memberId) => {
            const result = await this.membership.deleteMember(memberId, context);
            return result.ok
                ? { succeeded: true, result: { itemId: memberId, itemDescription: result.value.email } }
                : {
                    succeeded: false,
                    result: {
                        itemId: memberId,
                        itemDescription: `Member ID: ${memberId}`,
                        errorMessage: describePipelineError(result.error),
                    },
                };
        }));
        return job;
    }

    /**
     * Queues registration of imported rows and returns the PENDING job.
     * Rows are numbered from 1 in results.
     */
    async startImport(rows: readonly MemberImportRowDto[], owner: JobOwner, ipAddress: string | null): Promise<Job> {
        const job = await this.createJob('EXCEL_UPLOAD', owner, rows.length);
        const context = this.contextOf(owner, ipAddress);

        this.track(`job ${job.id}`, () => this.process(job, rows, async (row, index) => {
            const rowNumber = index + 1;
            const result = await this.membership.registerMember(row, context);
            return result.ok
                ? {
                    succeeded: true,
                    result: { itemId: String(rowNumber), itemDescription: `Row ${rowNumber}: ${result.value.email}` },
                }
                : {
                    succeeded: false,
                    result: {
                        itemId: String(rowNumber),
                        itemDescription: `Row ${rowNumber}`,
                        errorMessage: describePipelineError(result.error),
                    },
                };
        }));
        return job;
    }

    async createJob(type: JobType, owner: JobOwner, totalItems: number): Promise<Job> {
        const job = await this.jobs.insert({
            id: uuidv4(),
            type,
            status: 'PENDING',
            userId: owner.userId,
            username: owner.username,
            totalItems,
            processedItems: 0,
            successfulItems: 0,
            failedItems: 0,
            progress: 0,
            createdAt: this.clock.now().toISOString(),
            startedAt: null,
            completedAt: null,
            errorMessage: null,
            successfulResults: [],
            failedResults: [],
        });
        this.logger.log({ msg: 'Job created', jobId: job.id, type, totalItems, username: owner.username });
        return job;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Queries & Control                          */
    /* ---------------------------------------------------------------------- */

    /**
     * @throws NotFoundException when the job does not exist
     * @throws ForbiddenException when another user owns it
     */
    async getJob(id: string, userId: string): Promise<Job> {
        const job = await this.jobs.findById(id);
        if (!job) {
            throw new NotFoundException('Job not found');
        }
        if (job.userId !== userId) {
            throw new ForbiddenException('Access denied');
        }
        return job;
    }

    listJobs(userId: string): Promise<Job[]> {
        return this.jobs.findByUserId(userId);
    }

    async listActiveJobs(userId: string): Promise<Job[]> {
        const jobs = await this.jobs.findByUserId(userId);
        return jobs.filter((job) => isActive(job.status));
    }

    /**
     * Cancels a PENDING or IN_PROGRESS job. The worker notices before its
     * next item; results recorded so far are kept.
     *
     * @throws ConflictException when the job already finished
     */
    async cancelJob(id: string, userId: string): Promise<Job> {
        for (let attempt = 1; attempt <= CANCEL_ATTEMPTS; attempt++) {
            const job = await this.getJob(id, userId);
            if (isTerminal(job.status)) {
                throw new ConflictException(`Job is already ${job.status}`);
            }

            const cancelled = transitionJob(job, 'CANCELLED', this.clock.now());
            if (await this.jobs.replaceIfStatus(cancelled, job.status)) {
                jobCounter.inc({ type: job.type, status: 'CANCELLED' });
                this.logger.log({ msg: 'Job cancelled', jobId: id, userId, from: job.status });
                return cancelled;
            }
        }
        throw new ConflictException('Job changed while cancelling; retry');
    }

    /**
     * Removes a finished job from history.
     *
     * @throws ConflictException while the job is still active
     */
    async deleteJob(id: string, userId: string): Promise<void> {
        const job = await this.getJob(id, userId);
        if (isActive(job.status)) {
            throw new ConflictException('Job is still running; cancel it first');
        }
        await this.jobs.deleteById(id);
        this.logger.log({ msg: 'Job deleted', jobId: id, userId });
    }

    /**
     * Deletes terminal jobs created before the retention window.
     *
     * @returns Number of jobs removed
     */
    async cleanupOldJobs(): Promise<number> {
        const cutoff = new Date(this.clock.now().getTime() - this.retentionDays * DAY_MS).toISOString();
        const expired = (await this.jobs.findAll())
            .filter((job) => isTerminal(job.status) && job.createdAt < cutoff);

        for (const job of expired) {
            await this.jobs.deleteById(job.id);
        }
        this.logger.log({ msg: 'Old jobs cleaned up', removed: expired.length, cutoff });
        return expired.length;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Processing                                 */
    /* ---------------------------------------------------------------------- */

    private async process<T>(
        job: Job,
        items: readonly T[],
        handle: (item: T, index: number) => Promise<ItemOutcome>,
    ): Promise<void> {
        let current = transitionJob(job, 'IN_PROGRESS', this.clock.now());
        try {
            if (!await this.jobs.replaceIfStatus(current, 'PENDING')) {
                this.logger.log({ msg: 'Job cancelled before start', jobId: job.id });
                return;
            }
            this.logger.log({ msg: 'Job started', jobId: job.id, type: job.type, totalItems: items.length });

            const successfulResults: JobResultItem[] = [];
            const failedResults: JobResultItem[] = [];

            for (let index = 0; index < items.length; index++) {
                const stored = await this.jobs.findById(job.id);
                if (!stored || stored.status !== 'IN_PROGRESS') {
                    if (stored?.status === 'CANCELLED' && index > current.processedItems) {
                        // Keep the outcomes gathered since the last progress write
                        const counted = withProgress(stored, index, items.length, successfulResults, failedResults);
                        await this.jobs.replaceIfStatus(counted, 'CANCELLED');
                    }
                    this.logger.log({ msg: 'Job stopped', jobId: job.id, status: stored?.status ?? 'DELETED', processed: index });
                    return;
                }

                const outcome = await this.runItem(job, items[index], index, handle);
                (outcome.succeeded ? successfulResults : failedResults).push(outcome.result);

                const processed = index + 1;
                if (processed % PROGRESS_INTERVAL === 0 || processed === items.length) {
                    current = withProgress(current, processed, items.length, successfulResults, failedResults);
                    await this.jobs.replaceIfStatus(current, 'IN_PROGRESS');
                    this.logger.debug({ msg: 'Job progress', jobId: job.id, processed, total: items.length });
                }
            }

            const completed = transitionJob(current, 'COMPLETED', this.clock.now());
            if (await this.jobs.replaceIfStatus(completed, 'IN_PROGRESS')) {
                jobCounter.inc({ type: job.type, status: 'COMPLETED' });
                this.logger.log({
                    msg: 'Job completed',
                    jobId: job.id,
                    successful: completed.successfulItems,
                    failed: completed.failedItems,
                });
            }
        } catch (error) {
            await this.markFailed(job, error);
        }
    }

    private async runItem<T>(
        job: Job,
        item: T,
        index: number,
        handle: (item: T, index: number) => Promise<ItemOutcome>,
    ): Promise<ItemOutcome> {
        try {
            return await handle(item, index);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error({ msg: 'Job item failed', jobId: job.id, index, reason });
            return {
                succeeded: false,
                result: { itemId: String(index + 1), itemDescription: `Item ${index + 1}`, errorMessage: reason },
            };
        }
    }

    private async markFailed(job: Job, error: unknown): Promise<void> {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error({ msg: 'Job failed', jobId: job.id, reason });

        const stored = await this.jobs.findById(job.id);
        if (!stored || !isActive(stored.status)) return;

        const failed = transitionJob(stored, 'FAILED', this.clock.now(), reason);
        if (await this.jobs.replaceIfStatus(failed, stored.status)) {
            jobCounter.inc({ type: job.type, status: 'FAILED' });
        }
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    private contextOf(owner: JobOwner, ipAddress: string | null): RequestContext {
        return {
            principal: { username: owner.username, roles: owner.roles },
            ipAddress,
        };
    }

    private scheduleCleanup(): void {
        this.track('job cleanup', async () => {
            await this.cleanupOldJobs();
        });
    }

    /**
     * Starts work on a later tick and keeps it until it settles. Errors are
     * logged here; nothing is rethrown to the caller.
     */
    private track(label: string, work: () => Promise<void>): void {
        const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
            .then(work)
            .catch((error: unknown) => {
                this.logger.error({
                    msg: 'Background run failed',
                    label,
                    reason: error instanceof Error ? error.message : String(error),
                });
            })
            .finally(() => {
                this.running.delete(run);
            });
        this.running.add(run);
    }
}
