/**
 * Job types, their groups and payload schemas
 *
 * Payloads are stored as JSON and validated again when a worker picks the
 * job up. Every payload carries the retry state the queue manager needs.
 */

import { z } from 'zod';
import { ERP_SYNC, type ErpJobGroup } from '../../config/sync/erp.js';

export const JOB_TYPES = ['order-sync', 'order-cancel', 'stock-pull', 'full-stock-sync', 'product-sync'] as const;

export type JobType = (typeof JOB_TYPES)[number];

export function isJobType(value: string): value is JobType {
    return JOB_TYPES.some((type) => type === value);
}

const { groups } = ERP_SYNC.queue;

export const JOB_GROUP_BY_TYPE: Readonly<Record<JobType, ErpJobGroup>> = {
    'order-sync': groups.orders,
    'order-cancel': groups.orders,
    'stock-pull': groups.stock,
    'full-stock-sync': groups.stock,
    'product-sync': groups.products,
};

// ============================================
// PAYLOADS
// ============================================

const entityId = z.number().int().positive();

/** Failed attempts of this job within the current dead-letter cycle */
const retryCount = z.number().int().min(0).default(0);

/** Attempts spent in earlier dead-letter cycles */
const priorAttempts = z.number().int().min(0).default(0);

export const retryStateSchema = z.object({
    retryCount: retryCount.catch(0),
    priorAttempts: priorAttempts.catch(0),
});

export type RetryState = z.output<typeof retryStateSchema>;

export const orderJobPayloadSchema = z.object({ orderId: entityId, retryCount, priorAttempts });
export const productJobPayloadSchema = z.object({ productId: entityId, retryCount, priorAttempts });
export const fullStockSyncPayloadSchema = z.object({ retryCount, priorAttempts });

export type OrderJobPayload = z.output<typeof orderJobPayloadSchema>;
export type ProductJobPayload = z.output<typeof productJobPayloadSchema>;
export type FullStockSyncPayload = z.output<typeof fullStockSyncPayloadSchema>;

/**
 * A job's type and payload, validated together
 */
export const syncJobSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('order-sync'), payload: orderJobPayloadSchema }),
    z.object({ type: z.literal('order-cancel'), payload: orderJobPayloadSchema }),
    z.object({ type: z.literal('stock-pull'), payload: productJobPayloadSchema }),
    z.object({ type: z.literal('full-stock-sync'), payload: fullStockSyncPayloadSchema }),
    z.object({ type: z.literal('product-sync'), payload: productJobPayloadSchema }),
]);

export type SyncJob = z.output<typeof syncJobSchema>;

// ============================================
// SCHEDULED JOBS
// ============================================

export type JobPayload = Record<string, unknown>;

/** A job as held by a scheduler; the payload is unvalidated */
export interface ScheduledJob {
    id: number;
    type: string;
    group: string;
    payload: JobPayload;
    runAt: Date;
    /** Set for recurring jobs */
    intervalMs: number | null;
}

/**
 * A job held by one worker. Completing, rescheduling or renewing it only
 * succeeds while the token still matches the stored claim.
 */
export interface ClaimedJob extends ScheduledJob {
    claimToken: string;
}

export function readRetryState(payload: JobPayload): RetryState {
    const parsed = retryStateSchema.safeParse(payload);
    return parsed.success ? parsed.data : { retryCount: 0, priorAttempts: 0 };
}
