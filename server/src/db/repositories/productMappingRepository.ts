import type { Kysely } from 'kysely';
import type { DB, ProductMapRow } from '../types.js';
import { ConflictError } from '../../utils/errors.js';
import { isUniqueViolation, toMappingStatus } from './rowMapping.js';
import type { ProductMapping, ProductMappingRepository, ProductMappingUpsert } from './types.js';

function toProductMapping(row: ProductMapRow): ProductMapping {
    return {
        localProductId: row.local_product_id,
        erpItemCode: row.erp_item_code,
        syncEnabled: row.sync_enabled,
        lastSyncedAt: row.last_synced_at,
        lastStockQty: row.last_stock_qty,
        syncStatus: toMappingStatus(row.sync_status),
        errorMessage: row.error_message,
    };
}

export class KyselyProductMappingRepository implements ProductMappingRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async findByProductId(localProductId: number): Promise<ProductMapping | null> {
        const row = await this.db
            .selectFrom('erp_product_map')
            .selectAll()
            .where('local_product_id', '=', localProductId)
            .executeTakeFirst();
        return row ? toProductMapping(row) : null;
    }

    async listEnabled(): Promise<ProductMapping[]> {
        const rows = await this.db
            .selectFrom('erp_product_map')
            .selectAll()
            .where('sync_enabled', '=', true)
            .orderBy('local_product_id')
            .execute();
        return rows.map(toProductMapping);
    }

    async upsert(mapping: ProductMappingUpsert): Promise<void> {
        const now = new Date();
        const values = {
            erp_item_code: mapping.erpItemCode,
            sync_enabled: mapping.syncEnabled,
            sync_status: mapping.syncStatus,
            error_message: mapping.errorMessage ?? null,
            updated_at: now,
        };
        try {
            await this.db
                .insertInto('erp_product_map')
                .values({ local_product_id: mapping.localProductId, ...values })
                .onConflict((oc) => oc.column('local_product_id').doUpdateSet(values))
                .execute();
        } catch (error: unknown) {
            if (isUniqueViolation(error)) {
                throw new ConflictError(`Item code ${mapping.erpItemCode} is already mapped to another product`, 'duplicate_item_code');
            }
            throw error;
        }
    }

    async recordStock(localProductId: number, quantity: number, syncedAt: Date): Promise<void> {
        await this.db
            .updateTable('erp_product_map')
            .set({
                last_stock_qty: quantity,
                last_synced_at: syncedAt,
                sync_status: 'synced',
                error_message: null,
                updated_at: syncedAt,
            })
            .where('local_product_id', '=', localProductId)
            .execute();
    }

    async recordError(localProductId: number, message: string): Promise<void> {
        await this.db
            .updateTable('erp_product_map')
            .set({ sync_status: 'failed', error_message: message, updated_at: new Date() })
            .where('local_product_id', '=', localProductId)
            .execute();
    }

    async remove(localProductId: number): Promise<boolean> {
        const result = await this.db
            .deleteFrom('erp_product_map')
            .where('local_product_id', '=', localProductId)
            .executeTakeFirst();
        return result.numDeletedRows > 0n;
    }
}
