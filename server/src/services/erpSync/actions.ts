/**
 * Operator actions behind the admin API
 *
 * Thin over the engine: each action either reads state or queues work. Only
 * the connection test talks to the ERP directly.
 */

import type { ErpSettingsInput } from '@erpsync/shared/schemas';
import { ERP_JOB_GROUPS } from '../../config/sync/erp.js';
import { saveSyncSettings } from '../../config/syncSettings.js';
import type { SyncEngine } from '../../container.js';
import type { DeadLetterEntry, SyncLogRecord } from '../../db/repositories/types.js';
import { ValidationError } from '../../utils/errors.js';
import { syncLogger } from '../../utils/logger.js';
import type { ConnectionTestResult } from '../erp/types.js';

export interface PasswordStore {
    storePassword(password: string): Promise<void>;
}

export interface AdminActionsDeps {
    engine: SyncEngine;
    /** Null when no encryption key is configured; passwords then come from env only */
    passwords: PasswordStore | null;
}

export interface SyncStatus {
    configured: boolean;
    configurationError: string | null;
    pending: { orders: number; stock: number; products: number };
    failedJobs: number;
    recentLogs: SyncLogRecord[];
}

export interface QueuedAction {
    jobId: number | null;
    message: string;
}

export type SettingsUpdate = ErpSettingsInput & { password?: string };

const RECENT_LOG_LIMIT = 10;

export function createAdminActions({ engine, passwords }: AdminActionsDeps) {
    const { queue } = engine;

    return {
        async getStatus(): Promise<SyncStatus> {
            const [orders, stock, products, failedJobs, recentLogs] = await Promise.all([
                queue.getPendingCount(ERP_JOB_GROUPS.orders),
                queue.getPendingCount(ERP_JOB_GROUPS.stock),
                queue.getPendingCount(ERP_JOB_GROUPS.products),
                queue.countFailedJobs(),
                engine.repositories.syncLog.listRecent(RECENT_LOG_LIMIT),
            ]);
            return {
                configured: engine.isConfigured,
                configurationError: engine.configurationError,
                pending: { orders, stock, products },
                failedJobs,
                recentLogs,
            };
        },

        async testConnection(): Promise<ConnectionTestResult> {
            if (!engine.isConfigured) {
                return {
                    success: false,
                    message: 'ERP connection is not configured',
                    companyDb: null,
                    sessionTimeoutMinutes: null,
                };
            }
            return engine.services().client.testConnection();
        },

        async queueStockSync(): Promise<QueuedAction> {
            const jobId = await queue.queueFullStockSync();
            return { jobId, message: jobId === null ? 'Stock sync is already queued.' : 'Stock sync has been queued.' };
        },

        async queueOrderSync(orderId: number): Promise<QueuedAction> {
            const jobId = await queue.queueOrderSync(orderId);
            return {
                jobId,
                message: jobId === null ? `Order #${orderId} is already queued for sync.` : `Order #${orderId} has been queued for sync.`,
            };
        },

        listFailedJobs(limit?: number): Promise<DeadLetterEntry[]> {
            return queue.getFailedJobs(limit);
        },

        async retryFailedJob(id: number): Promise<QueuedAction> {
            const jobId = await queue.retryDeadLetter(id);
            return {
                jobId,
                message: jobId === null ? `Failed job #${id} resolved; its work is already queued.` : `Failed job #${id} has been queued for retry.`,
            };
        },

        async discardFailedJob(id: number): Promise<void> {
            await queue.discardDeadLetter(id);
        },

        /** Save, reload the engine and move the recurring stock sync to the new interval */
        async updateSettings(update: SettingsUpdate): Promise<void> {
            const { password, ...input } = update;
            if (password !== undefined && password !== '') {
                if (!passwords) {
                    throw new ValidationError('Storing the ERP password requires ERP_ENCRYPTION_KEY');
                }
                await passwords.storePassword(password);
            }

            const saved = await saveSyncSettings(engine.repositories.settings, input);
            await engine.reload();
            await queue.rescheduleRecurringStockSync(saved.stockSyncInterval);
            syncLogger.info({ serviceUrl: saved.serviceUrl, companyDb: saved.companyDb }, 'ERP sync settings updated');
        },
    };
}

export type AdminActions = ReturnType<typeof createAdminActions>;
