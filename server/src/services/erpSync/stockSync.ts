/**
 * Stock pull: ERP on-hand quantities → storefront products
 *
 * Single-product pulls back the `stock-pull` job; the batched full sync backs
 * `full-stock-sync`. Writes are skipped when the storefront already holds the
 * quantity (within ERP_SYNC.stock.epsilon).
 */

import {
    ErpQueryBuilder,
    parseItemStock,
    sanitizeItemCode,
    type ErpRecord,
    type StorefrontProduct,
    type StorefrontStockStatus,
} from '@erpsync/shared/domain';
import { ERP_SYNC } from '../../config/sync/erp.js';
import type { ProductMapping, ProductMappingRepository } from '../../db/repositories/types.js';
import { errorMessage } from '../../utils/errors.js';
import { stockLogger } from '../../utils/logger.js';
import type { ErpClient } from '../erp/client.js';
import type { StorefrontGateway } from '../storefront/types.js';
import type { SyncLogRecorder } from '../syncLogRecorder.js';

/** Item fields needed to compute stock */
export const STOCK_ITEM_FIELDS = ['ItemCode', 'QuantityOnStock', 'ItemWarehouseInfoCollection'] as const;

export interface StockSyncStats {
    synced: number;
    failed: number;
    skipped: number;
}

export type StockPullResult =
    | { status: 'updated' | 'unchanged'; quantity: number }
    | { status: 'skipped'; reason: 'product-not-found' | 'no-item-code' };

export interface StockSyncDeps {
    erp: ErpClient;
    storefront: StorefrontGateway;
    productMappings: ProductMappingRepository;
    audit: SyncLogRecorder;
    batchSize?: number;
    now?: () => Date;
}

export function stockStatusFor(quantity: number): StorefrontStockStatus {
    return quantity > 0 ? 'instock' : 'outofstock';
}

function emptyStats(): StockSyncStats {
    return { synced: 0, failed: 0, skipped: 0 };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

export class StockSyncService {
    private readonly batchSize: number;
    private readonly now: () => Date;

    constructor(private readonly deps: StockSyncDeps) {
        this.batchSize = deps.batchSize ?? ERP_SYNC.stock.batchSize;
        this.now = deps.now ?? (() => new Date());
    }

    // ============================================
    // SINGLE PRODUCT
    // ============================================

    async syncProductStock(productId: number): Promise<StockPullResult> {
        const product = await this.deps.storefront.getProduct(productId);
        if (!product) {
            stockLogger.warn({ productId }, 'Product not found');
            return { status: 'skipped', reason: 'product-not-found' };
        }

        const mapping = await this.deps.productMappings.findByProductId(productId);
        const itemCode = mapping?.erpItemCode ?? (product.sku ? sanitizeItemCode(product.sku) : '');
        if (itemCode === '') {
            stockLogger.warn({ productId }, 'Product has no SKU');
            return { status: 'skipped', reason: 'no-item-code' };
        }

        let item: ErpRecord;
        try {
            item = await this.deps.erp.getItem(itemCode, { $select: STOCK_ITEM_FIELDS.join(',') });
        } catch (error: unknown) {
            stockLogger.error({ productId, itemCode, error: errorMessage(error) }, 'Failed to pull stock for product');
            if (mapping) await this.deps.productMappings.recordError(productId, errorMessage(error));
            throw error;
        }

        const { total } = parseItemStock(item);
        const updated = await this.applyStock(product, total);
        if (mapping) await this.deps.productMappings.recordStock(productId, total, this.now());

        stockLogger.info({ productId, itemCode, stock: total, updated }, 'Stock synced for product');
        return { status: updated ? 'updated' : 'unchanged', quantity: total };
    }

    // ============================================
    // FULL SYNC
    // ============================================

    async syncAllStock(): Promise<StockSyncStats> {
        const stats = emptyStats();
        const mappings = await this.deps.productMappings.listEnabled();

        if (mappings.length === 0) {
            stockLogger.info('No mapped products found for stock sync');
            return stats;
        }

        stockLogger.info({ products: mappings.length, batchSize: this.batchSize }, 'Starting full stock sync');

        for (const batch of chunk(mappings, this.batchSize)) {
            const batchStats = await this.syncBatch(batch);
            stats.synced += batchStats.synced;
            stats.failed += batchStats.failed;
            stats.skipped += batchStats.skipped;
        }

        stockLogger.info(stats, 'Full stock sync completed');
        await this.deps.audit.record({
            syncType: 'stock',
            localId: null,
            erpId: null,
            status: stats.failed > 0 ? 'warning' : 'success',
            direction: 'from_erp',
            message: `Stock sync: ${stats.synced} synced, ${stats.failed} failed, ${stats.skipped} skipped`,
            responseData: stats,
        });

        return stats;
    }

    /**
     * One ERP query for the whole batch. A failing query fails the batch;
     * retrying is left to the job queue.
     */
    private async syncBatch(batch: ProductMapping[]): Promise<StockSyncStats> {
        const stats = emptyStats();
        const codes = batch.map((mapping) => mapping.erpItemCode);

        let itemsByCode: Map<string, ErpRecord>;
        let products: Map<number, StorefrontProduct>;
        try {
            const query = new ErpQueryBuilder()
                .select(...STOCK_ITEM_FIELDS)
                .whereIn('ItemCode', codes)
                .limit(codes.length)
                .build();
            const result = await this.deps.erp.getItems(query);
            itemsByCode = new Map(
                result.items.flatMap((item): [string, ErpRecord][] =>
                    typeof item.ItemCode === 'string' ? [[item.ItemCode, item]] : [],
                ),
            );
            products = await this.deps.storefront.getProducts(batch.map((mapping) => mapping.localProductId));
        } catch (error: unknown) {
            stockLogger.error({ error: errorMessage(error), batchCount: batch.length }, 'Batch stock sync failed');
            return { synced: 0, failed: batch.length, skipped: 0 };
        }

        for (const mapping of batch) {
            const item = itemsByCode.get(mapping.erpItemCode);
            if (!item) {
                stockLogger.warn({ itemCode: mapping.erpItemCode }, 'ERP item not found');
                stats.skipped++;
                continue;
            }

            const product = products.get(mapping.localProductId);
            if (!product) {
                stats.skipped++;
                continue;
            }

            try {
                const { total } = parseItemStock(item);
                await this.applyStock(product, total);
                await this.deps.productMappings.recordStock(mapping.localProductId, total, this.now());
                stats.synced++;
            } catch (error: unknown) {
                stockLogger.error(
                    { productId: mapping.localProductId, itemCode: mapping.erpItemCode, error: errorMessage(error) },
                    'Stock update failed',
                );
                await this.deps.productMappings.recordError(mapping.localProductId, errorMessage(error));
                stats.failed++;
            }
        }

        return stats;
    }

    /**
     * Apply an already-fetched ERP item to a mapped product
     */
    async applyItemStock(product: StorefrontProduct, item: ErpRecord): Promise<number> {
        const { total } = parseItemStock(item);
        await this.applyStock(product, total);
        await this.deps.productMappings.recordStock(product.id, total, this.now());
        return total;
    }

    /** Returns true when the storefront was written */
    private async applyStock(product: StorefrontProduct, quantity: number): Promise<boolean> {
        if (
            product.manageStock &&
            product.stockQuantity !== null &&
            Math.abs(product.stockQuantity - quantity) < ERP_SYNC.stock.epsilon
        ) {
            return false;
        }

        await this.deps.storefront.updateProductStock(product.id, quantity, stockStatusFor(quantity));
        stockLogger.debug(
            { productId: product.id, oldStock: product.stockQuantity, newStock: quantity },
            'Product stock updated',
        );
        return true;
    }
}
