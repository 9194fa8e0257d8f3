/**
 * Sync Worker
 *
 * Polls the scheduler, claims one job at a time just before running it
 * through the handler for its type, and reports failures to the queue
 * manager. The lease is renewed while the handler runs. A job whose payload
 * does not validate is dead-lettered without running.
 */

import { ERP_SYNC } from '../../config/sync/erp.js';
import { ValidationError, errorMessage } from '../../utils/errors.js';
import { workerLogger } from '../../utils/logger.js';
import {
    syncJobSchema,
    type ClaimedJob,
    type FullStockSyncPayload,
    type OrderJobPayload,
    type ProductJobPayload,
    type SyncJob,
} from './jobs.js';
import type { QueueManager } from './queueManager.js';
import type { JobScheduler } from './scheduler.js';

export interface JobHandlers {
    orderSync(payload: OrderJobPayload): Promise<unknown>;
    orderCancel(payload: OrderJobPayload): Promise<unknown>;
    stockPull(payload: ProductJobPayload): Promise<unknown>;
    fullStockSync(payload: FullStockSyncPayload): Promise<unknown>;
    productSync(payload: ProductJobPayload): Promise<unknown>;
}

export interface SyncWorkerDeps {
    scheduler: JobScheduler;
    queue: QueueManager;
    handlers: JobHandlers;
    pollIntervalMs?: number;
    /** Jobs run per poll */
    batchSize?: number;
    /** Lease renewal interval while a job runs */
    heartbeatMs?: number;
    now?: () => Date;
}

export interface WorkerRunStats {
    claimed: number;
    succeeded: number;
    failed: number;
}

export class SyncWorker {
    private readonly scheduler: JobScheduler;
    private readonly queue: QueueManager;
    private readonly handlers: JobHandlers;
    private readonly pollIntervalMs: number;
    private readonly batchSize: number;
    private readonly heartbeatMs: number;
    private readonly now: () => Date;

    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<WorkerRunStats> | null = null;

    constructor(deps: SyncWorkerDeps) {
        this.scheduler = deps.scheduler;
        this.queue = deps.queue;
        this.handlers = deps.handlers;
        this.pollIntervalMs = deps.pollIntervalMs ?? 5_000;
        this.batchSize = deps.batchSize ?? ERP_SYNC.queue.workerBatchSize;
        this.heartbeatMs = deps.heartbeatMs ?? ERP_SYNC.queue.heartbeatMs;
        this.now = deps.now ?? (() => new Date());
    }

    start(): void {
        if (this.timer) {
            workerLogger.debug('Sync worker already running');
            return;
        }
        this.timer = setInterval(() => {
            this.runOnce().catch((error: unknown) => {
                workerLogger.error({ error: errorMessage(error) }, 'Worker poll failed');
            });
        }, this.pollIntervalMs);
        workerLogger.info({ pollIntervalMs: this.pollIntervalMs }, 'Sync worker started');
    }

    /** Stops polling and waits for the job in progress */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
        workerLogger.info('Sync worker stopped');
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * Claim and run due jobs. A call made while a run is in progress returns
     * that run's result instead of starting another.
     */
    runOnce(): Promise<WorkerRunStats> {
        if (this.inFlight) return this.inFlight;

        this.inFlight = this.drain().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    private async drain(): Promise<WorkerRunStats> {
        const stats: WorkerRunStats = { claimed: 0, succeeded: 0, failed: 0 };

        while (stats.claimed < this.batchSize) {
            const job = await this.scheduler.claimNext(this.now());
            if (!job) break;

            stats.claimed++;
            const ok = await this.process(job);
            if (ok) stats.succeeded++;
            else stats.failed++;
        }

        if (stats.claimed > 0) {
            workerLogger.info(stats, 'Worker run finished');
        }
        return stats;
    }

    /**
     * A job whose failure could not be recorded stays claimed; its lease
     * running out makes it claimable again.
     */
    private async process(job: ClaimedJob): Promise<boolean> {
        const startedAt = Date.now();
        const heartbeat = setInterval(() => this.renewLease(job), this.heartbeatMs);

        try {
            const parsed = syncJobSchema.safeParse({ type: job.type, payload: job.payload });
            if (!parsed.success) {
                throw new ValidationError(
                    `Invalid ${job.type} job payload`,
                    parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
                    { jobId: job.id },
                );
            }

            const result = await this.dispatch(parsed.data);
            workerLogger.info({ jobId: job.id, type: job.type, durationMs: Date.now() - startedAt, result }, 'Job completed');
        } catch (error: unknown) {
            workerLogger.warn({ jobId: job.id, type: job.type, error: errorMessage(error) }, 'Job failed');
            await this.queue.handleFailure(job, error);
            return false;
        } finally {
            clearInterval(heartbeat);
        }

        if (!(await this.scheduler.complete(job, this.now()))) {
            workerLogger.warn({ jobId: job.id, type: job.type }, 'Job claim lost before completion');
        }
        return true;
    }

    private renewLease(job: ClaimedJob): void {
        this.scheduler
            .renewLease(job, this.now())
            .then((held) => {
                if (!held) workerLogger.warn({ jobId: job.id, type: job.type }, 'Job lease could not be renewed');
            })
            .catch((error: unknown) => {
                workerLogger.error({ jobId: job.id, error: errorMessage(error) }, 'Job lease renewal failed');
            });
    }

    private dispatch(job: SyncJob): Promise<unknown> {
        switch (job.type) {
            case 'order-sync':
                return this.handlers.orderSync(job.payload);
            case 'order-cancel':
                return this.handlers.orderCancel(job.payload);
            case 'stock-pull':
                return this.handlers.stockPull(job.payload);
            case 'full-stock-sync':
                return this.handlers.fullStockSync(job.payload);
            case 'product-sync':
                return this.handlers.productSync(job.payload);
        }
    }
}
