/**
 * Queue Manager
 *
 * Enqueues sync jobs, applies exponential backoff to failed ones and moves
 * exhausted jobs to the dead-letter store.
 *
 * Backoff: a job that failed `n` times in total waits 2^n minutes before the
 * next attempt (2, 4, 8, 16); the 5th failure dead-letters it. Errors that
 * cannot succeed on a later attempt dead-letter at once.
 */

import { ERP_SYNC } from '../../config/sync/erp.js';
import type { DeadLetterEntry, DeadLetterRepository } from '../../db/repositories/types.js';
import { ConflictError, NotFoundError, errorMessage, isJobRetryable } from '../../utils/errors.js';
import { queueLogger } from '../../utils/logger.js';
import { JOB_GROUP_BY_TYPE, isJobType, readRetryState, type ClaimedJob, type JobPayload, type JobType } from './jobs.js';
import type { JobScheduler } from './scheduler.js';

export interface QueueManagerDeps {
    scheduler: JobScheduler;
    deadLetters: DeadLetterRepository;
    now?: () => Date;
    maxAttempts?: number;
    backoffBaseMs?: number;
    maxDeadLetterCycles?: number;
}

export type FailureOutcome =
    | { action: 'retry'; jobId: number; attempts: number; delayMs: number }
    | { action: 'dead-letter'; entry: DeadLetterEntry }
    /** Recurring jobs are not retried; their next run is the retry */
    | { action: 'next-run' }
    /** Another worker took the job over after the lease ran out */
    | { action: 'claim-lost' };

interface EnqueueOptions {
    delayMs?: number;
    retryCount?: number;
    priorAttempts?: number;
    /** Payload keys that identify the job for the duplicate guard */
    dedupeOn?: JobPayload;
}

export class QueueManager {
    private readonly scheduler: JobScheduler;
    private readonly deadLetters: DeadLetterRepository;
    private readonly now: () => Date;
    private readonly maxAttempts: number;
    private readonly backoffBaseMs: number;
    private readonly maxDeadLetterCycles: number;

    constructor(deps: QueueManagerDeps) {
        this.scheduler = deps.scheduler;
        this.deadLetters = deps.deadLetters;
        this.now = deps.now ?? (() => new Date());
        this.maxAttempts = deps.maxAttempts ?? ERP_SYNC.queue.maxAttempts;
        this.backoffBaseMs = deps.backoffBaseMs ?? ERP_SYNC.queue.backoffBaseMs;
        this.maxDeadLetterCycles = deps.maxDeadLetterCycles ?? ERP_SYNC.queue.maxDeadLetterCycles;
    }

    // ============================================
    // ENQUEUE
    // ============================================

    /**
     * Schedule an order push. Returns the job id, or null when a job for the
     * order is already scheduled.
     */
    queueOrderSync(orderId: number, delayMs = 0, retryCount = 0): Promise<number | null> {
        return this.enqueue('order-sync', { orderId }, { delayMs, retryCount, dedupeOn: { orderId } });
    }

    queueOrderCancel(orderId: number, delayMs = 0, retryCount = 0): Promise<number | null> {
        return this.enqueue('order-cancel', { orderId }, { delayMs, retryCount, dedupeOn: { orderId } });
    }

    queueStockPull(productId: number, delayMs = 0, retryCount = 0): Promise<number | null> {
        return this.enqueue('stock-pull', { productId }, { delayMs, retryCount, dedupeOn: { productId } });
    }

    /**
     * One-off full stock sync. Only another one-off run blocks it; the
     * recurring sync does not.
     */
    queueFullStockSync(delayMs = 0, retryCount = 0): Promise<number | null> {
        return this.enqueue('full-stock-sync', { manual: true }, { delayMs, retryCount, dedupeOn: { manual: true } });
    }

    queueProductSync(productId: number, delayMs = 0, retryCount = 0): Promise<number | null> {
        return this.enqueue('product-sync', { productId }, { delayMs, retryCount, dedupeOn: { productId } });
    }

    /**
     * Recurring full stock sync. Does nothing when one is already scheduled,
     * so every process start can call it.
     */
    async scheduleRecurringStockSync(intervalMinutes: number): Promise<number | null> {
        const group = JOB_GROUP_BY_TYPE['full-stock-sync'];
        if (await this.scheduler.hasScheduled({ type: 'full-stock-sync', group, payload: { recurring: true } })) {
            queueLogger.debug('Recurring stock sync already scheduled');
            return null;
        }

        const intervalMs = intervalMinutes * 60_000;
        const jobId = await this.scheduler.scheduleRecurring({
            type: 'full-stock-sync',
            group,
            payload: { recurring: true, retryCount: 0, priorAttempts: 0 },
            runAt: new Date(this.now().getTime() + intervalMs),
            intervalMs,
        });
        queueLogger.info({ jobId, intervalMinutes }, 'Recurring stock sync scheduled');
        return jobId;
    }

    /**
     * Replace the recurring stock sync after an interval change. A run in
     * progress keeps its old interval.
     */
    async rescheduleRecurringStockSync(intervalMinutes: number): Promise<number | null> {
        await this.scheduler.cancelAll({
            type: 'full-stock-sync',
            group: JOB_GROUP_BY_TYPE['full-stock-sync'],
            payload: { recurring: true },
        });
        return this.scheduleRecurringStockSync(intervalMinutes);
    }

    private async enqueue(type: JobType, payload: JobPayload, options: EnqueueOptions): Promise<number | null> {
        const group = JOB_GROUP_BY_TYPE[type];

        if (options.dedupeOn && (await this.scheduler.hasScheduled({ type, group, payload: options.dedupeOn }))) {
            queueLogger.debug({ type, ...options.dedupeOn }, 'Job already scheduled, skipping');
            return null;
        }

        const delayMs = options.delayMs ?? 0;
        const jobId = await this.scheduler.scheduleOnce({
            type,
            group,
            payload: { ...payload, retryCount: options.retryCount ?? 0, priorAttempts: options.priorAttempts ?? 0 },
            runAt: new Date(this.now().getTime() + delayMs),
        });
        queueLogger.debug({ jobId, type, delayMs, retryCount: options.retryCount ?? 0 }, 'Job scheduled');
        return jobId;
    }

    // ============================================
    // FAILURE HANDLING
    // ============================================

    /**
     * Reschedule a failed job with backoff or dead-letter it, releasing the
     * worker's claim. The retry reuses the job's row, so it keeps its slot
     * against duplicates. Nothing is recorded when the claim was lost.
     */
    async handleFailure(job: ClaimedJob, error: unknown): Promise<FailureOutcome> {
        const { retryCount, priorAttempts } = readRetryState(job.payload);
        const attempts = retryCount + 1;
        const message = errorMessage(error);

        if (job.intervalMs !== null) {
            if (!(await this.scheduler.complete(job, this.now()))) return this.claimLost(job);
            queueLogger.warn({ jobId: job.id, type: job.type, error: message }, 'Recurring job failed, waiting for next run');
            return { action: 'next-run' };
        }

        if (!isJobType(job.type) || !isJobRetryable(error) || attempts >= this.maxAttempts) {
            if (!(await this.scheduler.complete(job, this.now()))) return this.claimLost(job);
            const entry = await this.deadLetters.insert({
                jobType: job.type,
                group: job.group,
                payload: job.payload,
                errorMessage: message,
                attempts,
                maxAttempts: this.maxAttempts,
                lifetimeAttempts: priorAttempts + attempts,
                failedAt: this.now(),
            });
            queueLogger.error(
                { jobId: job.id, type: job.type, attempts, deadLetterId: entry.id, error: message },
                'Job moved to dead-letter store',
            );
            return { action: 'dead-letter', entry };
        }

        const delayMs = 2 ** attempts * this.backoffBaseMs;
        const rescheduled = await this.scheduler.reschedule(job, {
            payload: { ...job.payload, retryCount: attempts, priorAttempts },
            runAt: new Date(this.now().getTime() + delayMs),
        });
        if (!rescheduled) return this.claimLost(job);

        queueLogger.warn(
            { jobId: job.id, type: job.type, attempts, delayMs, error: message },
            'Job failed, retry scheduled',
        );
        return { action: 'retry', jobId: job.id, attempts, delayMs };
    }

    private claimLost(job: ClaimedJob): FailureOutcome {
        queueLogger.warn({ jobId: job.id, type: job.type }, 'Job claim lost, failure not recorded');
        return { action: 'claim-lost' };
    }

    // ============================================
    // DEAD LETTERS
    // ============================================

    /**
     * Re-enqueue a dead-lettered job with a fresh retry count. Refused once
     * the job has used up its dead-letter cycles.
     */
    async retryDeadLetter(id: number): Promise<number | null> {
        const entry = await this.requireUnresolved(id);

        if (entry.lifetimeAttempts >= this.maxAttempts * this.maxDeadLetterCycles) {
            throw new ConflictError(
                `Job has failed ${entry.lifetimeAttempts} times and can no longer be retried`,
                'retry_limit_reached',
            );
        }
        if (!isJobType(entry.jobType)) {
            throw new ConflictError(`Unknown job type: ${entry.jobType}`, 'unknown_job_type');
        }

        const payload = withoutRetryState(entry.payload);
        const jobId = await this.enqueue(entry.jobType, payload, {
            priorAttempts: entry.lifetimeAttempts,
            dedupeOn: dedupeKeys(payload),
        });
        await this.deadLetters.markResolved(id, 'retried', this.now());

        queueLogger.info({ deadLetterId: id, jobId, type: entry.jobType }, 'Dead-letter entry re-queued');
        return jobId;
    }

    async discardDeadLetter(id: number): Promise<void> {
        await this.requireUnresolved(id);
        await this.deadLetters.markResolved(id, 'discarded', this.now());
        queueLogger.info({ deadLetterId: id }, 'Dead-letter entry discarded');
    }

    getFailedJobs(limit: number = ERP_SYNC.queue.failedJobsPageSize): Promise<DeadLetterEntry[]> {
        return this.deadLetters.listUnresolved(limit);
    }

    countFailedJobs(): Promise<number> {
        return this.deadLetters.countUnresolved();
    }

    private async requireUnresolved(id: number): Promise<DeadLetterEntry> {
        const entry = await this.deadLetters.findById(id);
        if (!entry) {
            throw new NotFoundError(`Failed job ${id} not found`, 'failed_job', id);
        }
        if (entry.resolvedAt !== null) {
            throw new ConflictError(`Failed job ${id} was already ${entry.resolution ?? 'resolved'}`, 'already_resolved');
        }
        return entry;
    }

    // ============================================
    // QUERIES
    // ============================================

    isOrderScheduled(orderId: number): Promise<boolean> {
        return this.scheduler.hasScheduled({ type: 'order-sync', payload: { orderId } });
    }

    /** Remove pending sync jobs for an order; returns how many */
    async cancelOrderSync(orderId: number): Promise<number> {
        const cancelled = await this.scheduler.cancelAll({ type: 'order-sync', payload: { orderId } });
        if (cancelled > 0) {
            queueLogger.info({ orderId, cancelled }, 'Pending order sync cancelled');
        }
        return cancelled;
    }

    getPendingCount(group?: string): Promise<number> {
        return this.scheduler.countPending(group);
    }
}

function withoutRetryState(payload: JobPayload): JobPayload {
    return Object.fromEntries(
        Object.entries(payload).filter(([key]) => key !== 'retryCount' && key !== 'priorAttempts'),
    );
}

function dedupeKeys(payload: JobPayload): JobPayload | undefined {
    for (const key of ['orderId', 'productId']) {
        const value = payload[key];
        if (typeof value === 'number') return { [key]: value };
    }
    return payload.manual === true ? { manual: true } : undefined;
}
