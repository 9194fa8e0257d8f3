import { sql, type Kysely } from 'kysely';
import type { DB, OrderMapRow } from '../types.js';
import { toMappingStatus } from './rowMapping.js';
import type { OrderMapping, OrderMappingRepository, OrderSyncedUpdate } from './types.js';

function toOrderMapping(row: OrderMapRow): OrderMapping {
    return {
        localOrderId: row.local_order_id,
        erpDocEntry: row.erp_doc_entry,
        erpDocNum: row.erp_doc_num,
        erpDocType: row.erp_doc_type,
        syncStatus: toMappingStatus(row.sync_status),
        syncAttempts: row.sync_attempts,
        lastError: row.last_error,
        syncedAt: row.synced_at,
    };
}

export class KyselyOrderMappingRepository implements OrderMappingRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async findByOrderId(localOrderId: number): Promise<OrderMapping | null> {
        const row = await this.db
            .selectFrom('erp_order_map')
            .selectAll()
            .where('local_order_id', '=', localOrderId)
            .executeTakeFirst();
        return row ? toOrderMapping(row) : null;
    }

    async markSynced(localOrderId: number, update: OrderSyncedUpdate): Promise<void> {
        const now = new Date();
        await this.db
            .insertInto('erp_order_map')
            .values({
                local_order_id: localOrderId,
                erp_doc_entry: update.docEntry,
                erp_doc_num: update.docNum,
                sync_status: 'synced',
                sync_attempts: 1,
                last_error: null,
                synced_at: update.syncedAt,
                updated_at: now,
            })
            .onConflict((oc) =>
                oc.column('local_order_id').doUpdateSet({
                    erp_doc_entry: update.docEntry,
                    erp_doc_num: update.docNum,
                    sync_status: 'synced',
                    sync_attempts: sql<number>`erp_order_map.sync_attempts + 1`,
                    last_error: null,
                    synced_at: update.syncedAt,
                    updated_at: now,
                }),
            )
            .execute();
    }

    async recordFailure(localOrderId: number, error: string): Promise<void> {
        const now = new Date();
        await this.db
            .insertInto('erp_order_map')
            .values({
                local_order_id: localOrderId,
                sync_status: 'failed',
                sync_attempts: 1,
                last_error: error,
                updated_at: now,
            })
            .onConflict((oc) =>
                oc.column('local_order_id').doUpdateSet({
                    sync_status: sql<string>`case when erp_order_map.erp_doc_entry is null then 'failed' else erp_order_map.sync_status end`,
                    sync_attempts: sql<number>`erp_order_map.sync_attempts + 1`,
                    last_error: error,
                    updated_at: now,
                }),
            )
            .execute();
    }
}
