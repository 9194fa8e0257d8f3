import type { Kysely, Selectable } from 'kysely';
import type { DB, ErpSyncLogTable } from '../types.js';
import { toDirection, toJsonColumn, toSyncLogStatus } from './rowMapping.js';
import type { SyncLogEntry, SyncLogRecord, SyncLogRepository } from './types.js';

function toRecord(row: Selectable<ErpSyncLogTable>): SyncLogRecord {
    return {
        id: row.id,
        syncType: row.sync_type,
        localId: row.local_id,
        erpId: row.erp_id,
        status: toSyncLogStatus(row.status),
        direction: toDirection(row.direction),
        message: row.message,
        requestData: row.request_data ?? undefined,
        responseData: row.response_data ?? undefined,
        createdAt: row.created_at,
    };
}

export class KyselySyncLogRepository implements SyncLogRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async append(entry: SyncLogEntry): Promise<void> {
        await this.db
            .insertInto('erp_sync_log')
            .values({
                sync_type: entry.syncType,
                local_id: entry.localId,
                erp_id: entry.erpId,
                status: entry.status,
                direction: entry.direction,
                message: entry.message,
                request_data: toJsonColumn(entry.requestData),
                response_data: toJsonColumn(entry.responseData),
            })
            .execute();
    }

    async listRecent(limit: number): Promise<SyncLogRecord[]> {
        const rows = await this.db
            .selectFrom('erp_sync_log')
            .selectAll()
            .orderBy('created_at', 'desc')
            .orderBy('id', 'desc')
            .limit(limit)
            .execute();
        return rows.map(toRecord);
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        const result = await this.db.deleteFrom('erp_sync_log').where('created_at', '<', cutoff).executeTakeFirst();
        return Number(result.numDeletedRows);
    }
}
