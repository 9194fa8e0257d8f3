import { sanitizeItemCode } from '@erpsync/shared/domain';
import type { ProductMappingRepository } from '../../db/repositories/types.js';
import { ApiError } from '../../utils/errors.js';
import { productLogger } from '../../utils/logger.js';
import type { ErpClient } from '../erp/client.js';
import type { StorefrontGateway } from '../storefront/types.js';
import type { SyncLogRecorder } from '../syncLogRecorder.js';
import { STOCK_ITEM_FIELDS, type StockSyncService } from './stockSync.js';

export interface ProductSyncDeps {
    erp: ErpClient;
    storefront: StorefrontGateway;
    productMappings: ProductMappingRepository;
    stock: StockSyncService;
    audit: SyncLogRecorder;
}

export type ProductSyncResult =
    | { status: 'mapped'; itemCode: string; quantity: number }
    | { status: 'not-found'; itemCode: string }
    | { status: 'skipped'; reason: 'product-not-found' | 'no-sku' };

/**
 * Links storefront products to ERP items by SKU
 *
 * A product whose SKU has no ERP item keeps a disabled `not_found` mapping,
 * so the full stock sync leaves it alone until the next save.
 */
export class ProductSyncService {
    constructor(private readonly deps: ProductSyncDeps) {}

    async syncProduct(productId: number): Promise<ProductSyncResult> {
        const product = await this.deps.storefront.getProduct(productId);
        if (!product) return { status: 'skipped', reason: 'product-not-found' };
        if (!product.sku) return { status: 'skipped', reason: 'no-sku' };

        const itemCode = sanitizeItemCode(product.sku);

        try {
            const item = await this.deps.erp.getItem(itemCode, { $select: STOCK_ITEM_FIELDS.join(',') });
            await this.deps.productMappings.upsert({
                localProductId: productId,
                erpItemCode: itemCode,
                syncEnabled: true,
                syncStatus: 'synced',
            });
            const quantity = await this.deps.stock.applyItemStock(product, item);

            productLogger.info({ productId, itemCode, quantity }, 'Product mapped to ERP item');
            return { status: 'mapped', itemCode, quantity };
        } catch (error: unknown) {
            if (!(error instanceof ApiError && error.isNotFound)) throw error;

            await this.deps.productMappings.upsert({
                localProductId: productId,
                erpItemCode: itemCode,
                syncEnabled: false,
                syncStatus: 'not_found',
                errorMessage: `Item ${itemCode} not found in ERP`,
            });
            await this.deps.audit.record({
                syncType: 'product',
                localId: productId,
                erpId: itemCode,
                status: 'warning',
                direction: 'from_erp',
                message: `No ERP item for SKU ${product.sku}`,
            });
            productLogger.warn({ productId, itemCode }, 'ERP item not found for product');
            return { status: 'not-found', itemCode };
        }
    }

    async removeProduct(productId: number): Promise<boolean> {
        const removed = await this.deps.productMappings.remove(productId);
        if (removed) productLogger.info({ productId }, 'Product mapping removed');
        return removed;
    }
}
