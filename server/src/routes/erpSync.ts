/**
 * ERP sync admin API
 *
 * Mounted at /api/erp-sync behind requireAdmin. Every handler is a thin
 * call into the admin actions; errors reach the central errorHandler.
 */

import { Router } from 'express';
import { erpSettingsSchema } from '@erpsync/shared/schemas';
import { z } from 'zod';
import { asyncHandler, noInput, typedRoute } from '../middleware/asyncHandler.js';
import type { AdminActions } from '../services/erpSync/actions.js';

const positiveId = z.coerce.number().int().positive();

const orderParamsSchema = z.object({ orderId: positiveId });

const failedJobParamsSchema = z.object({ id: positiveId });

const failedJobsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).optional(),
});

/** Full settings; the password is optional and only stored when present */
const settingsBodySchema = z.intersection(
    erpSettingsSchema,
    z.object({ password: z.string().max(200).optional() }),
);

export function createErpSyncRouter(actions: AdminActions): Router {
    const router = Router();

    // ============================================
    // STATUS
    // ============================================

    router.get('/status', asyncHandler(async (_req, res) => {
        res.json(await actions.getStatus());
    }));

    router.post('/test-connection', asyncHandler(async (_req, res) => {
        const result = await actions.testConnection();
        res.status(result.success ? 200 : 502).json(result);
    }));

    // ============================================
    // MANUAL SYNC
    // ============================================

    router.post('/stock-sync', asyncHandler(async (_req, res) => {
        res.status(202).json(await actions.queueStockSync());
    }));

    router.post('/orders/:orderId/sync', typedRoute({ params: orderParamsSchema, body: noInput }, async ({ params }, _req, res) => {
        res.status(202).json(await actions.queueOrderSync(params.orderId));
    }));

    // ============================================
    // DEAD LETTERS
    // ============================================

    router.get('/failed-jobs', asyncHandler(async (req, res) => {
        const { limit } = failedJobsQuerySchema.parse(req.query);
        const jobs = await actions.listFailedJobs(limit);
        res.json({ jobs, count: jobs.length });
    }));

    router.post('/failed-jobs/:id/retry', typedRoute({ params: failedJobParamsSchema, body: noInput }, async ({ params }, _req, res) => {
        res.status(202).json(await actions.retryFailedJob(params.id));
    }));

    router.post('/failed-jobs/:id/discard', typedRoute({ params: failedJobParamsSchema, body: noInput }, async ({ params }, _req, res) => {
        await actions.discardFailedJob(params.id);
        res.json({ success: true });
    }));

    // ============================================
    // SETTINGS
    // ============================================

    router.put('/settings', typedRoute({ params: z.object({}), body: settingsBodySchema }, async ({ body }, _req, res) => {
        await actions.updateSettings(body);
        res.json(await actions.getStatus());
    }));

    return router;
}
