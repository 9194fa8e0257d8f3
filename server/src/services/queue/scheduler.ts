/**
 * Job scheduler contract and its single-process implementation
 *
 * A job is `pending` until a worker claims it (`running`), then removed on
 * completion, or moved to its next run when it recurs. Running jobs whose
 * lease ran out are claimable again; the worker that lost the lease can no
 * longer complete or reschedule them.
 */

import { ERP_SYNC } from '../../config/sync/erp.js';
import type { ClaimedJob, JobPayload, JobType, ScheduledJob } from './jobs.js';

export interface ScheduleRequest {
    type: JobType;
    group: string;
    payload: JobPayload;
    runAt: Date;
}

export interface JobFilter {
    type: JobType;
    /** Matches jobs whose payload contains these key/value pairs */
    payload?: JobPayload;
    group?: string;
}

export interface RescheduleRequest {
    payload: JobPayload;
    runAt: Date;
}

export interface JobScheduler {
    scheduleOnce(request: ScheduleRequest): Promise<number>;
    scheduleRecurring(request: ScheduleRequest & { intervalMs: number }): Promise<number>;
    /** Pending or running jobs matching the filter */
    hasScheduled(filter: JobFilter): Promise<boolean>;
    /** Removes matching pending jobs; returns how many */
    cancelAll(filter: JobFilter): Promise<number>;
    countPending(group?: string): Promise<number>;
    /** Marks the oldest due job as running and returns it */
    claimNext(now: Date): Promise<ClaimedJob | null>;
    /** Restarts the lease of a running job; false when the claim was lost */
    renewLease(job: ClaimedJob, now: Date): Promise<boolean>;
    /**
     * Removes a one-off job, or moves a recurring one to its next run.
     * False when the claim was lost.
     */
    complete(job: ClaimedJob, now: Date): Promise<boolean>;
    /**
     * Returns a claimed one-off job to pending with a new payload and run
     * time, keeping its id. False when the claim was lost.
     */
    reschedule(job: ClaimedJob, request: RescheduleRequest): Promise<boolean>;
}

type JobStatus = 'pending' | 'running';

interface StoredJob extends ScheduledJob {
    status: JobStatus;
    claimedAt: Date | null;
    claimToken: string | null;
}

export function payloadContains(payload: JobPayload, subset: JobPayload): boolean {
    return Object.entries(subset).every(([key, value]) => payload[key] === value);
}

export class InMemoryJobScheduler implements JobScheduler {
    private readonly jobs = new Map<number, StoredJob>();
    private nextId = 1;
    private nextClaim = 1;

    constructor(private readonly leaseMs: number = ERP_SYNC.queue.leaseMs) {}

    async scheduleOnce(request: ScheduleRequest): Promise<number> {
        return this.insert(request, null);
    }

    async scheduleRecurring(request: ScheduleRequest & { intervalMs: number }): Promise<number> {
        return this.insert(request, request.intervalMs);
    }

    async hasScheduled(filter: JobFilter): Promise<boolean> {
        return this.matching(filter).length > 0;
    }

    async cancelAll(filter: JobFilter): Promise<number> {
        const cancelled = this.matching(filter).filter((job) => job.status === 'pending');
        for (const job of cancelled) this.jobs.delete(job.id);
        return cancelled.length;
    }

    async countPending(group?: string): Promise<number> {
        return [...this.jobs.values()].filter(
            (job) => job.status === 'pending' && (group === undefined || job.group === group),
        ).length;
    }

    async claimNext(now: Date): Promise<ClaimedJob | null> {
        const leaseCutoff = now.getTime() - this.leaseMs;
        const [job] = [...this.jobs.values()]
            .filter((candidate) =>
                candidate.status === 'pending'
                    ? candidate.runAt.getTime() <= now.getTime()
                    : candidate.claimedAt !== null && candidate.claimedAt.getTime() < leaseCutoff,
            )
            .sort((a, b) => a.runAt.getTime() - b.runAt.getTime() || a.id - b.id);
        if (!job) return null;

        const claimToken = `claim-${this.nextClaim++}`;
        job.status = 'running';
        job.claimedAt = now;
        job.claimToken = claimToken;
        return { ...toScheduledJob(job), claimToken };
    }

    async renewLease(job: ClaimedJob, now: Date): Promise<boolean> {
        const stored = this.held(job);
        if (!stored) return false;
        stored.claimedAt = now;
        return true;
    }

    async complete(job: ClaimedJob, now: Date): Promise<boolean> {
        const stored = this.held(job);
        if (!stored) return false;
        if (stored.intervalMs === null) {
            this.jobs.delete(stored.id);
            return true;
        }
        this.release(stored, new Date(now.getTime() + stored.intervalMs));
        return true;
    }

    async reschedule(job: ClaimedJob, request: RescheduleRequest): Promise<boolean> {
        const stored = this.held(job);
        if (!stored) return false;
        stored.payload = { ...request.payload };
        this.release(stored, request.runAt);
        return true;
    }

    /** Snapshot of every held job, for assertions */
    list(): ScheduledJob[] {
        return [...this.jobs.values()].map(toScheduledJob);
    }

    private insert(request: ScheduleRequest, intervalMs: number | null): number {
        const id = this.nextId++;
        this.jobs.set(id, {
            id,
            type: request.type,
            group: request.group,
            payload: { ...request.payload },
            runAt: request.runAt,
            intervalMs,
            status: 'pending',
            claimedAt: null,
            claimToken: null,
        });
        return id;
    }

    private held(job: ClaimedJob): StoredJob | null {
        const stored = this.jobs.get(job.id);
        return stored && stored.status === 'running' && stored.claimToken === job.claimToken ? stored : null;
    }

    private release(stored: StoredJob, runAt: Date): void {
        stored.status = 'pending';
        stored.claimedAt = null;
        stored.claimToken = null;
        stored.runAt = runAt;
    }

    private matching(filter: JobFilter): StoredJob[] {
        return [...this.jobs.values()].filter(
            (job) =>
                job.type === filter.type &&
                (filter.group === undefined || job.group === filter.group) &&
                (filter.payload === undefined || payloadContains(job.payload, filter.payload)),
        );
    }
}

function toScheduledJob(job: StoredJob): ScheduledJob {
    return {
        id: job.id,
        type: job.type,
        group: job.group,
        payload: { ...job.payload },
        runAt: job.runAt,
        intervalMs: job.intervalMs,
    };
}
