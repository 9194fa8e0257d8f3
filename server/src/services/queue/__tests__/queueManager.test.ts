/**
 * Unit tests for the queue manager: duplicate guard, backoff, dead letters
 */

import { InMemoryDeadLetterRepository } from '../../../db/repositories/memory.js';
import { ConflictError, ConnectionError, NotFoundError, ValidationError } from '../../../utils/errors.js';
import type { ClaimedJob } from '../jobs.js';
import { QueueManager } from '../queueManager.js';
import { InMemoryJobScheduler } from '../scheduler.js';

const START = new Date('2024-06-01T10:00:00Z');
const MINUTE = 60_000;

function setup() {
    let clock = START;
    const scheduler = new InMemoryJobScheduler();
    const deadLetters = new InMemoryDeadLetterRepository();
    const queue = new QueueManager({ scheduler, deadLetters, now: () => clock });
    return {
        scheduler,
        deadLetters,
        queue,
        advance(ms: number) {
            clock = new Date(clock.getTime() + ms);
        },
        now: () => clock,
    };
}

/** Claim the single due job, as a worker would */
async function claimOne(scheduler: InMemoryJobScheduler, now: Date): Promise<ClaimedJob> {
    const job = await scheduler.claimNext(now);
    if (!job) throw new Error('expected a due job');
    return job;
}

describe('QueueManager enqueue', () => {
    it('schedules an order sync once per order', async () => {
        const { queue, scheduler } = setup();

        await expect(queue.queueOrderSync(5001)).resolves.toBe(1);
        await expect(queue.queueOrderSync(5001)).resolves.toBeNull();
        await expect(queue.queueOrderSync(5002)).resolves.toBe(2);

        expect(scheduler.list()[0]).toEqual({
            id: 1,
            type: 'order-sync',
            group: 'erp-sync-orders',
            payload: { orderId: 5001, retryCount: 0, priorAttempts: 0 },
            runAt: START,
            intervalMs: null,
        });
    });

    it('delays a job and routes it to its group', async () => {
        const { queue, scheduler } = setup();

        await queue.queueStockPull(100, 30_000);
        await queue.queueProductSync(100);

        expect(scheduler.list().map((job) => [job.type, job.group, job.runAt.getTime() - START.getTime()])).toEqual([
            ['stock-pull', 'erp-sync-stock', 30_000],
            ['product-sync', 'erp-sync-products', 0],
        ]);
        await expect(queue.getPendingCount('erp-sync-stock')).resolves.toBe(1);
        await expect(queue.getPendingCount()).resolves.toBe(2);
    });

    it('schedules the recurring stock sync only once', async () => {
        const { queue, scheduler } = setup();

        await expect(queue.scheduleRecurringStockSync(5)).resolves.toBe(1);
        await expect(queue.scheduleRecurringStockSync(5)).resolves.toBeNull();

        expect(scheduler.list()).toEqual([
            {
                id: 1,
                type: 'full-stock-sync',
                group: 'erp-sync-stock',
                payload: { recurring: true, retryCount: 0, priorAttempts: 0 },
                runAt: new Date(START.getTime() + 5 * MINUTE),
                intervalMs: 5 * MINUTE,
            },
        ]);
    });

    it('queues one manual stock sync at a time beside the recurring one', async () => {
        const { queue, scheduler } = setup();
        await queue.scheduleRecurringStockSync(5);

        await expect(queue.queueFullStockSync()).resolves.toBe(2);
        await expect(queue.queueFullStockSync()).resolves.toBeNull();

        expect(scheduler.list().map((job) => [job.id, job.payload])).toEqual([
            [1, { recurring: true, retryCount: 0, priorAttempts: 0 }],
            [2, { manual: true, retryCount: 0, priorAttempts: 0 }],
        ]);

        const manual = await scheduler.claimNext(START);
        if (!manual) throw new Error('expected the manual sync to be due');
        await scheduler.complete(manual, START);

        await expect(queue.queueFullStockSync()).resolves.toBe(3);
    });

    it('replaces the recurring stock sync when the interval changes', async () => {
        const { queue, scheduler } = setup();
        await queue.scheduleRecurringStockSync(5);

        await expect(queue.rescheduleRecurringStockSync(15)).resolves.toBe(2);

        expect(scheduler.list().map((job) => [job.id, job.intervalMs])).toEqual([[2, 15 * MINUTE]]);
    });

    it('cancels pending syncs for an order', async () => {
        const { queue } = setup();
        await queue.queueOrderSync(5001);

        await expect(queue.isOrderScheduled(5001)).resolves.toBe(true);
        await expect(queue.cancelOrderSync(5001)).resolves.toBe(1);
        await expect(queue.isOrderScheduled(5001)).resolves.toBe(false);
        await expect(queue.cancelOrderSync(5001)).resolves.toBe(0);
    });
});

describe('QueueManager.handleFailure', () => {
    it('backs off 2, 4, 8, 16 minutes and dead-letters the 5th failure', async () => {
        const { queue, scheduler, advance, now } = setup();
        await queue.queueOrderSync(5001);
        const error = new ConnectionError('connect ECONNREFUSED', 'UNREACHABLE');

        const delays: number[] = [];
        for (let i = 0; i < 4; i++) {
            const job = await claimOne(scheduler, now());
            const outcome = await queue.handleFailure(job, error);
            if (outcome.action !== 'retry') throw new Error(`unexpected ${outcome.action}`);
            delays.push(outcome.delayMs);
            advance(outcome.delayMs);
        }

        const last = await claimOne(scheduler, now());
        expect(last.payload).toEqual({ orderId: 5001, retryCount: 4, priorAttempts: 0 });
        const outcome = await queue.handleFailure(last, error);

        expect(delays).toEqual([2 * MINUTE, 4 * MINUTE, 8 * MINUTE, 16 * MINUTE]);
        expect(outcome).toMatchObject({
            action: 'dead-letter',
            entry: { jobType: 'order-sync', attempts: 5, maxAttempts: 5, lifetimeAttempts: 5, errorMessage: 'connect ECONNREFUSED' },
        });
        expect(scheduler.list()).toEqual([]);
    });

    it('reschedules the failed job in place so it keeps its slot', async () => {
        const { queue, scheduler, now } = setup();
        await queue.queueOrderSync(5001);
        const job = await claimOne(scheduler, now());

        const outcome = await queue.handleFailure(job, new Error('socket hang up'));

        expect(outcome).toEqual({ action: 'retry', jobId: 1, attempts: 1, delayMs: 2 * MINUTE });
        expect(scheduler.list().map((held) => [held.id, held.payload.retryCount])).toEqual([[1, 1]]);
        await expect(queue.queueOrderSync(5001)).resolves.toBeNull();
    });

    it('records nothing for a job another worker took over', async () => {
        const { queue, scheduler, deadLetters, advance, now } = setup();
        await queue.queueOrderSync(5001);
        const stale = await claimOne(scheduler, now());
        advance(15 * MINUTE + 1);
        const current = await claimOne(scheduler, now());

        await expect(queue.handleFailure(stale, new ValidationError('bad order'))).resolves.toEqual({ action: 'claim-lost' });
        await expect(queue.handleFailure(stale, new Error('socket hang up'))).resolves.toEqual({ action: 'claim-lost' });

        await expect(deadLetters.countUnresolved()).resolves.toBe(0);
        expect(scheduler.list().map((held) => held.payload.retryCount)).toEqual([0]);
        await expect(scheduler.complete(current, now())).resolves.toBe(true);
    });

    it.each([
        ['validation', new ValidationError('Order #5001 cannot be synced: Order has no items.')],
        ['missing order', new NotFoundError('Order 5001 not found', 'order', 5001)],
    ])('dead-letters a %s failure at once', async (_label, error) => {
        const { queue, scheduler, now } = setup();
        await queue.queueOrderSync(5001);
        const job = await claimOne(scheduler, now());

        const outcome = await queue.handleFailure(job, error);

        expect(outcome).toMatchObject({ action: 'dead-letter', entry: { attempts: 1, errorMessage: error.message } });
    });

    it('leaves a failed recurring job to its next run', async () => {
        const { queue, scheduler, advance, now } = setup();
        await queue.scheduleRecurringStockSync(5);
        advance(5 * MINUTE);
        const job = await claimOne(scheduler, now());

        await expect(queue.handleFailure(job, new Error('boom'))).resolves.toEqual({ action: 'next-run' });
        await expect(queue.getFailedJobs()).resolves.toEqual([]);
        expect(scheduler.list().map((held) => held.runAt)).toEqual([new Date(START.getTime() + 10 * MINUTE)]);
    });
});

describe('QueueManager dead letters', () => {
    async function deadLetterOrder(queue: QueueManager, scheduler: InMemoryJobScheduler, now: Date): Promise<number> {
        await queue.queueOrderSync(5001);
        const job = await claimOne(scheduler, now);
        const outcome = await queue.handleFailure(job, new ValidationError('bad order'));
        if (outcome.action !== 'dead-letter') throw new Error('expected dead letter');
        return outcome.entry.id;
    }

    it('re-queues with a fresh retry count and marks the entry retried', async () => {
        const { queue, scheduler, deadLetters, now } = setup();
        const id = await deadLetterOrder(queue, scheduler, now());

        const jobId = await queue.retryDeadLetter(id);

        expect(scheduler.list()).toEqual([
            expect.objectContaining({ id: jobId, payload: { orderId: 5001, retryCount: 0, priorAttempts: 1 } }),
        ]);
        await expect(deadLetters.findById(id)).resolves.toMatchObject({ resolution: 'retried', resolvedAt: START });
        await expect(queue.countFailedJobs()).resolves.toBe(0);
    });

    it('refuses to resolve an entry twice', async () => {
        const { queue, scheduler, now } = setup();
        const id = await deadLetterOrder(queue, scheduler, now());

        await queue.discardDeadLetter(id);

        await expect(queue.retryDeadLetter(id)).rejects.toBeInstanceOf(ConflictError);
        await expect(queue.discardDeadLetter(id)).rejects.toMatchObject({ conflictType: 'already_resolved' });
        await expect(queue.discardDeadLetter(99)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('stops retrying after three dead-letter cycles', async () => {
        const { queue, deadLetters } = setup();
        const entry = await deadLetters.insert({
            jobType: 'order-sync',
            group: 'erp-sync-orders',
            payload: { orderId: 5001, retryCount: 4, priorAttempts: 10 },
            errorMessage: 'connect ECONNREFUSED',
            attempts: 5,
            maxAttempts: 5,
            lifetimeAttempts: 15,
            failedAt: START,
        });

        await expect(queue.retryDeadLetter(entry.id)).rejects.toMatchObject({
            conflictType: 'retry_limit_reached',
            message: 'Job has failed 15 times and can no longer be retried',
        });
    });

    it('lists unresolved entries newest first', async () => {
        const { queue, scheduler, advance, now } = setup();
        const first = await deadLetterOrder(queue, scheduler, now());
        advance(MINUTE);
        await queue.queueOrderSync(5002);
        const job = await claimOne(scheduler, now());
        await queue.handleFailure(job, new NotFoundError('Order 5002 not found'));

        const failed = await queue.getFailedJobs();
        expect(failed.map((entry) => entry.payload.orderId)).toEqual([5002, 5001]);
        expect(failed[1]?.id).toBe(first);
    });
});
