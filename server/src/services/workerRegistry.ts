/**
 * Worker Registry: single source of truth for the background workers.
 *
 * index.ts calls startAllWorkers() on startup. Each worker registers its own
 * stop handler with the shutdown coordinator, in start order.
 */

import { ERP_SYNC } from '../config/sync/erp.js';
import type { SyncEngine } from '../container.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';

const registryLogger = logger.child({ module: 'workers' });

interface WorkerEntry {
    name: string;
    start: () => void;
    stop: () => void | Promise<void>;
    shutdownTimeout?: number;
}

export interface WorkerRegistryDeps {
    engine: SyncEngine;
    coordinator: ShutdownCoordinator;
    disableWorkers: boolean;
}

/** Prune the sync log to the configured retention */
export async function runHousekeeping(engine: SyncEngine): Promise<number> {
    const settings = engine.settings;
    if (!settings) return 0;
    return engine.audit.prune(settings.logRetentionDays);
}

function housekeepingWorker(engine: SyncEngine): WorkerEntry {
    let startupTimeout: NodeJS.Timeout | null = null;
    let interval: NodeJS.Timeout | null = null;

    const run = (trigger: string): void => {
        runHousekeeping(engine).catch((error: unknown) => {
            registryLogger.error({ trigger, error: errorMessage(error) }, 'Housekeeping failed');
        });
    };

    return {
        name: 'housekeeping',
        start: () => {
            startupTimeout = setTimeout(() => {
                startupTimeout = null;
                run('startup');
            }, ERP_SYNC.housekeeping.startupDelayMs);
            interval = setInterval(() => run('scheduled'), ERP_SYNC.housekeeping.intervalMs);
        },
        stop: () => {
            if (startupTimeout) clearTimeout(startupTimeout);
            if (interval) clearInterval(interval);
        },
        shutdownTimeout: 1000,
    };
}

export async function startAllWorkers({ engine, coordinator, disableWorkers }: WorkerRegistryDeps): Promise<void> {
    if (disableWorkers) {
        registryLogger.warn('Background workers disabled (DISABLE_BACKGROUND_WORKERS=true)');
    } else {
        const settings = engine.settings;
        if (settings) {
            await engine.queue.scheduleRecurringStockSync(settings.stockSyncInterval);
        }

        const workers: WorkerEntry[] = [
            { name: 'syncWorker', start: () => engine.worker.start(), stop: () => engine.worker.stop(), shutdownTimeout: 30_000 },
            housekeepingWorker(engine),
        ];
        for (const w of workers) {
            w.start();
            coordinator.register(w.name, w.stop, w.shutdownTimeout ?? 5000);
        }
        registryLogger.info({ workers: workers.map((w) => w.name) }, 'Background workers started');
    }

    // ERP logout on shutdown (always)
    coordinator.register('erpSession', () => engine.shutdown(), 10_000);
}
