/**
 * Process entry point
 *
 * Postgres when DATABASE_URL is set, in-memory stores otherwise; the REST
 * storefront when its credentials are set, an empty in-memory one otherwise.
 */

import './instrument.js';
import * as Sentry from '@sentry/node';
import type { Server } from 'http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { ERP_SYNC } from './config/sync/erp.js';
import { createSyncEngine } from './container.js';
import { createDatabase, migrateToLatest } from './db/index.js';
import { createInMemoryRepositories, createKyselyRepositories, type Repositories } from './db/repositories/index.js';
import { createAdminActions } from './services/erpSync/actions.js';
import type { SecretProvider } from './services/erp/types.js';
import { PostgresJobScheduler } from './services/queue/postgresScheduler.js';
import { InMemoryJobScheduler, type JobScheduler } from './services/queue/scheduler.js';
import { EncryptedSettingSecretProvider, EnvSecretProvider } from './services/secrets.js';
import { InMemoryStorefront } from './services/storefront/memory.js';
import { RestStorefrontGateway } from './services/storefront/restGateway.js';
import type { StorefrontGateway } from './services/storefront/types.js';
import { startAllWorkers } from './services/workerRegistry.js';
import logger from './utils/logger.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

function createStorefront(): StorefrontGateway {
    if (env.STOREFRONT_URL && env.STOREFRONT_CONSUMER_KEY && env.STOREFRONT_CONSUMER_SECRET) {
        return new RestStorefrontGateway({
            baseUrl: env.STOREFRONT_URL,
            consumerKey: env.STOREFRONT_CONSUMER_KEY,
            consumerSecret: env.STOREFRONT_CONSUMER_SECRET,
        });
    }
    logger.warn('Storefront credentials not set - using an in-memory storefront');
    return new InMemoryStorefront();
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

async function main(): Promise<void> {
    const coordinator = new ShutdownCoordinator();

    let repositories: Repositories;
    let scheduler: JobScheduler;
    let closeDatabase: (() => Promise<void>) | null = null;
    if (env.DATABASE_URL) {
        const db = createDatabase(env.DATABASE_URL);
        await migrateToLatest(db);
        repositories = createKyselyRepositories(db);
        scheduler = new PostgresJobScheduler(db, ERP_SYNC.queue.leaseMs);
        closeDatabase = () => db.destroy();
    } else {
        logger.warn('DATABASE_URL not set - state is kept in memory and lost on restart');
        repositories = createInMemoryRepositories();
        scheduler = new InMemoryJobScheduler();
    }

    const envSecrets = new EnvSecretProvider(env.ERP_PASSWORD);
    const encrypted = env.ERP_ENCRYPTION_KEY
        ? new EncryptedSettingSecretProvider(repositories.settings, env.ERP_ENCRYPTION_KEY, envSecrets)
        : null;
    const secrets: SecretProvider = encrypted ?? envSecrets;

    const engine = await createSyncEngine({
        env,
        repositories,
        scheduler,
        storefront: createStorefront(),
        secrets,
        pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
    });
    const actions = createAdminActions({ engine, passwords: encrypted });

    const app = createApp({
        engine,
        actions,
        jwtSecret: env.JWT_SECRET,
        webhookSecret: env.STOREFRONT_WEBHOOK_SECRET,
    });
    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, configured: engine.isConfigured }, 'Server listening');
    });
    coordinator.register('httpServer', () => closeServer(server), 10_000);

    await startAllWorkers({ engine, coordinator, disableWorkers: env.DISABLE_BACKGROUND_WORKERS });
    // Last: workers and the ERP logout still need the pool
    if (closeDatabase) {
        coordinator.register('database', closeDatabase, 10_000);
    }

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutdown signal received');
        coordinator
            .shutdown()
            .then((results) => process.exit(results.every((r) => r.success) ? 0 : 1))
            .catch((error: unknown) => {
                logger.error({ error }, 'Shutdown failed');
                process.exit(1);
            });
    };
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);
}

main().catch((error: unknown) => {
    Sentry.captureException(error);
    logger.fatal({ error }, 'Startup failed');
    process.exit(1);
});
