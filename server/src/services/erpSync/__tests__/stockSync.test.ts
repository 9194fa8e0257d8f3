/**
 * Unit tests for stock pulls: single product, batched full sync and the
 * unchanged-quantity shortcut
 */

import { buildProduct } from '@erpsync/shared/testing';
import type { StorefrontProduct } from '@erpsync/shared/domain';
import type { FakeReply, RecordedCall } from '../../../testing/fakeErp.js';
import { FIXED_NOW, createSyncHarness, type SyncHarness } from '../../../testing/syncHarness.js';

const STOCK_SELECT = 'ItemCode,QuantityOnStock,ItemWarehouseInfoCollection';

function catalogue(count: number): StorefrontProduct[] {
    return Array.from({ length: count }, (_, index) =>
        buildProduct({ id: index + 1, sku: `SKU-${index + 1}`, stockQuantity: 0, stockStatus: 'outofstock' }),
    );
}

async function mapAll(h: SyncHarness, products: StorefrontProduct[]): Promise<void> {
    for (const product of products) {
        await h.repos.productMappings.upsert({
            localProductId: product.id,
            erpItemCode: product.sku ?? '',
            syncEnabled: true,
            syncStatus: 'synced',
        });
    }
}

/** Answers a batched item query with 7 units of every requested code except `missing` */
function itemsHandler(missing: readonly string[] = []) {
    return (call: RecordedCall): FakeReply => {
        const filter = typeof call.params.$filter === 'string' ? call.params.$filter : '';
        const codes = [...filter.matchAll(/'([^']+)'/g)].flatMap((match) => (match[1] ? [match[1]] : []));
        return {
            status: 200,
            body: {
                value: codes
                    .filter((code) => !missing.includes(code))
                    .map((code) => ({ ItemCode: code, QuantityOnStock: 7 })),
            },
        };
    };
}

describe('StockSyncService.syncProductStock', () => {
    it('writes the ERP quantity and status to the product', async () => {
        const h = createSyncHarness({ products: [buildProduct({ stockQuantity: 10 })] });
        h.erp.reply('GET', "Items('TEE-100')", { status: 200, body: { ItemCode: 'TEE-100', QuantityOnStock: 0 } });

        await expect(h.stock.syncProductStock(100)).resolves.toEqual({ status: 'updated', quantity: 0 });

        expect(h.erp.callsTo('GET', "Items('TEE-100')")[0]?.params).toEqual({ $select: STOCK_SELECT });
        expect(h.storefront.products.get(100)).toMatchObject({ stockQuantity: 0, stockStatus: 'outofstock' });
    });

    it('leaves a quantity within the tolerance untouched', async () => {
        const h = createSyncHarness({ products: [buildProduct({ stockQuantity: 5.0005 })] });
        h.erp.reply('GET', "Items('TEE-100')", { status: 200, body: { ItemCode: 'TEE-100', QuantityOnStock: 5 } });

        await expect(h.stock.syncProductStock(100)).resolves.toEqual({ status: 'unchanged', quantity: 5 });
        expect(h.storefront.stockWrites).toBe(0);
    });

    it('writes when the product does not manage stock yet', async () => {
        const h = createSyncHarness({ products: [buildProduct({ manageStock: false, stockQuantity: 5 })] });
        h.erp.reply('GET', "Items('TEE-100')", { status: 200, body: { ItemCode: 'TEE-100', QuantityOnStock: 5 } });

        await expect(h.stock.syncProductStock(100)).resolves.toEqual({ status: 'updated', quantity: 5 });
        expect(h.storefront.products.get(100)?.manageStock).toBe(true);
    });

    it('prefers the mapped item code and records the pull on the mapping', async () => {
        const h = createSyncHarness({ products: [buildProduct()] });
        await h.repos.productMappings.upsert({
            localProductId: 100,
            erpItemCode: 'ERP-TEE',
            syncEnabled: true,
            syncStatus: 'synced',
        });
        h.erp.reply('GET', "Items('ERP-TEE')", { status: 200, body: { ItemCode: 'ERP-TEE', QuantityOnStock: 12 } });

        await h.stock.syncProductStock(100);

        await expect(h.repos.productMappings.findByProductId(100)).resolves.toMatchObject({
            lastStockQty: 12,
            lastSyncedAt: FIXED_NOW,
        });
    });

    it('skips products without a SKU or mapping', async () => {
        const h = createSyncHarness({ products: [buildProduct({ sku: null })] });

        await expect(h.stock.syncProductStock(100)).resolves.toEqual({ status: 'skipped', reason: 'no-item-code' });
        await expect(h.stock.syncProductStock(404)).resolves.toEqual({ status: 'skipped', reason: 'product-not-found' });
        expect(h.erp.calls).toEqual([]);
    });

    it('marks the mapping failed and rethrows a pull error', async () => {
        const h = createSyncHarness({ products: [buildProduct()] });
        await mapAll(h, [buildProduct()]);
        h.erp.reply('GET', "Items('TEE-100')", { status: 404, body: '' });

        await expect(h.stock.syncProductStock(100)).rejects.toMatchObject({ code: 'NOT_FOUND' });
        await expect(h.repos.productMappings.findByProductId(100)).resolves.toMatchObject({
            syncStatus: 'failed',
            errorMessage: "Resource not found: Items('TEE-100')",
        });
    });
});

describe('StockSyncService.syncAllStock', () => {
    it('queries the ERP once per batch and skips items it does not return', async () => {
        const products = catalogue(120);
        const h = createSyncHarness({ products });
        await mapAll(h, products);
        h.erp.on('GET', 'Items', itemsHandler(['SKU-60']));

        const stats = await h.stock.syncAllStock();

        expect(stats).toEqual({ synced: 119, failed: 0, skipped: 1 });
        const queries = h.erp.callsTo('GET', 'Items');
        expect(queries.map((call) => call.params.$top)).toEqual([50, 50, 20]);
        expect(queries[0]?.params.$select).toBe(STOCK_SELECT);
        expect(h.storefront.products.get(60)?.stockQuantity).toBe(0);
        expect(h.storefront.products.get(61)).toMatchObject({ stockQuantity: 7, stockStatus: 'instock' });
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({
            syncType: 'stock',
            status: 'success',
            direction: 'from_erp',
            message: 'Stock sync: 119 synced, 0 failed, 1 skipped',
        });
    });

    it('fails a whole batch when its query fails and carries on', async () => {
        const products = catalogue(120);
        const h = createSyncHarness({ products });
        await mapAll(h, products);
        h.erp.reply('GET', 'Items', {
            status: 500,
            body: { error: { code: -1, message: { lang: 'en-us', value: 'Internal error' } } },
        });
        h.erp.on('GET', 'Items', itemsHandler());

        const stats = await h.stock.syncAllStock();

        expect(stats).toEqual({ synced: 70, failed: 50, skipped: 0 });
        expect(h.storefront.products.get(1)?.stockQuantity).toBe(0);
        expect(h.storefront.products.get(51)?.stockQuantity).toBe(7);
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({ status: 'warning' });
    });

    it('counts a failed storefront write against that product only', async () => {
        const products = catalogue(3);
        const h = createSyncHarness({ products });
        await mapAll(h, products);
        h.erp.on('GET', 'Items', itemsHandler());
        vi.spyOn(h.storefront, 'updateProductStock').mockRejectedValueOnce(new Error('write refused'));

        await expect(h.stock.syncAllStock()).resolves.toEqual({ synced: 2, failed: 1, skipped: 0 });
        await expect(h.repos.productMappings.findByProductId(1)).resolves.toMatchObject({
            syncStatus: 'failed',
            errorMessage: 'write refused',
        });
    });

    it('returns empty stats when nothing is mapped', async () => {
        const h = createSyncHarness();

        await expect(h.stock.syncAllStock()).resolves.toEqual({ synced: 0, failed: 0, skipped: 0 });
        expect(h.erp.calls).toEqual([]);
    });
});
