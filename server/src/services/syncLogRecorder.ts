/**
 * Audit trail writer for sync outcomes
 *
 * Separate from the pino log: entries land in erp_sync_log for the admin
 * screens. A failed append is logged and dropped so audit storage problems
 * never fail a sync.
 */

import type { SyncLogEntry, SyncLogRepository } from '../db/repositories/types.js';
import { errorMessage } from '../utils/errors.js';
import { syncLogger } from '../utils/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export class SyncLogRecorder {
    constructor(
        private readonly repository: SyncLogRepository,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async record(entry: SyncLogEntry): Promise<void> {
        try {
            await this.repository.append(entry);
        } catch (error: unknown) {
            syncLogger.error(
                { syncType: entry.syncType, localId: entry.localId, error: errorMessage(error) },
                'Failed to write sync log entry',
            );
        }
    }

    /** Delete entries older than the retention window; returns the number removed */
    async prune(retentionDays: number): Promise<number> {
        const cutoff = new Date(this.now().getTime() - retentionDays * DAY_MS);
        const removed = await this.repository.deleteOlderThan(cutoff);
        if (removed > 0) {
            syncLogger.info({ removed, retentionDays }, 'Pruned sync log');
        }
        return removed;
    }
}
