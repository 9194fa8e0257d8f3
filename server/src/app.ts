/**
 * Express application: admin API and storefront webhooks
 */

import express, { type Express } from 'express';
import type { SyncEngine } from './container.js';
import { requireAdmin } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createErpSyncRouter } from './routes/erpSync.js';
import { createWebhookRouter } from './routes/storefrontWebhooks.js';
import type { AdminActions } from './services/erpSync/actions.js';
import { httpLogger, requestLogger } from './utils/logger.js';

export interface AppDeps {
    engine: SyncEngine;
    actions: AdminActions;
    /** The admin API stays unmounted without it */
    jwtSecret: string | undefined;
    webhookSecret: string | undefined;
}

export function createApp({ engine, actions, jwtSecret, webhookSecret }: AppDeps): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({
        limit: '1mb',
        verify: (req, _res, buf) => {
            req.rawBody = buf;
        },
    }));
    app.use(requestLogger);

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', configured: engine.isConfigured });
    });

    app.use('/api/webhooks/storefront', createWebhookRouter({ events: () => engine.events, secret: webhookSecret }));

    if (jwtSecret) {
        app.use('/api/erp-sync', requireAdmin(jwtSecret), createErpSyncRouter(actions));
    } else {
        httpLogger.warn('JWT_SECRET not set - admin API disabled');
    }

    app.use(errorHandler);
    return app;
}
