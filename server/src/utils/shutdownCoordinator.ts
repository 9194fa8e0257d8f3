/**
 * Shutdown Coordinator
 *
 * Runs registered cleanup handlers (stop workers, ERP logout, close the
 * database pool) in registration order, each bounded by its own timeout.
 */

import logger from './logger.js';

const shutdownLogger = logger.child({ module: 'shutdown' });

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeoutMs: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    durationMs: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private shuttingDown = false;

    /**
     * Register a cleanup handler. Re-registering a name replaces it.
     */
    register(name: string, handler: () => Promise<void> | void, timeoutMs = 10_000): void {
        if (this.handlers.has(name)) {
            shutdownLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, handler, timeoutMs });
    }

    unregister(name: string): void {
        this.handlers.delete(name);
    }

    isInProgress(): boolean {
        return this.shuttingDown;
    }

    /**
     * Handlers run sequentially: workers must stop before the pool closes.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.shuttingDown) {
            shutdownLogger.warn('Shutdown already in progress');
            return [];
        }

        this.shuttingDown = true;
        shutdownLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];
        for (const { name, handler, timeoutMs } of this.handlers.values()) {
            const start = Date.now();
            let timer: NodeJS.Timeout | undefined;
            try {
                const timedOut = await Promise.race([
                    Promise.resolve(handler()).then(() => false),
                    new Promise<boolean>((resolve) => {
                        timer = setTimeout(() => resolve(true), timeoutMs);
                    }),
                ]);
                const durationMs = Date.now() - start;
                if (timedOut) {
                    shutdownLogger.warn({ name, timeoutMs, durationMs }, 'Shutdown handler timed out');
                    results.push({ name, success: false, error: 'Timeout', durationMs });
                } else {
                    results.push({ name, success: true, durationMs });
                }
            } catch (error: unknown) {
                const durationMs = Date.now() - start;
                const message = error instanceof Error ? error.message : 'Unknown error';
                shutdownLogger.error({ name, error: message, durationMs }, 'Shutdown handler failed');
                results.push({ name, success: false, error: message, durationMs });
            } finally {
                clearTimeout(timer);
            }
        }

        const failed = results.filter((r) => !r.success).length;
        shutdownLogger.info({ successful: results.length - failed, failed }, 'Shutdown complete');
        return results;
    }
}
