/**
 * Unit tests for product → ERP item linking
 */

import { buildProduct } from '@erpsync/shared/testing';
import { ConflictError } from '../../../utils/errors.js';
import { createSyncHarness } from '../../../testing/syncHarness.js';

describe('ProductSyncService', () => {
    it('maps a product whose SKU exists in the ERP and pulls its stock', async () => {
        const h = createSyncHarness({ products: [buildProduct({ sku: ' TEE #100 ' })] });
        h.erp.reply('GET', "Items('TEE100')", { status: 200, body: { ItemCode: 'TEE100', QuantityOnStock: 3 } });

        await expect(h.products.syncProduct(100)).resolves.toEqual({ status: 'mapped', itemCode: 'TEE100', quantity: 3 });

        await expect(h.repos.productMappings.findByProductId(100)).resolves.toMatchObject({
            erpItemCode: 'TEE100',
            syncEnabled: true,
            syncStatus: 'synced',
            lastStockQty: 3,
        });
        expect(h.storefront.products.get(100)?.stockQuantity).toBe(3);
    });

    it('keeps a disabled mapping when the ERP has no such item', async () => {
        const h = createSyncHarness({ products: [buildProduct()] });
        h.erp.reply('GET', "Items('TEE-100')", { status: 404, body: '' });

        await expect(h.products.syncProduct(100)).resolves.toEqual({ status: 'not-found', itemCode: 'TEE-100' });

        await expect(h.repos.productMappings.findByProductId(100)).resolves.toMatchObject({
            syncEnabled: false,
            syncStatus: 'not_found',
            errorMessage: 'Item TEE-100 not found in ERP',
        });
        await expect(h.repos.productMappings.listEnabled()).resolves.toEqual([]);
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({
            syncType: 'product',
            status: 'warning',
            message: 'No ERP item for SKU TEE-100',
        });
    });

    it('refuses an item code already linked to another product', async () => {
        const h = createSyncHarness({ products: [buildProduct({ id: 101 })] });
        await h.repos.productMappings.upsert({
            localProductId: 100,
            erpItemCode: 'TEE-100',
            syncEnabled: true,
            syncStatus: 'synced',
        });
        h.erp.reply('GET', "Items('TEE-100')", { status: 200, body: { ItemCode: 'TEE-100', QuantityOnStock: 1 } });

        await expect(h.products.syncProduct(101)).rejects.toBeInstanceOf(ConflictError);
    });

    it('skips products that are missing or have no SKU', async () => {
        const h = createSyncHarness({ products: [buildProduct({ sku: '' })] });

        await expect(h.products.syncProduct(100)).resolves.toEqual({ status: 'skipped', reason: 'no-sku' });
        await expect(h.products.syncProduct(7)).resolves.toEqual({ status: 'skipped', reason: 'product-not-found' });
    });

    it('removes a mapping once', async () => {
        const h = createSyncHarness();
        await h.repos.productMappings.upsert({
            localProductId: 100,
            erpItemCode: 'TEE-100',
            syncEnabled: true,
            syncStatus: 'synced',
        });

        await expect(h.products.removeProduct(100)).resolves.toBe(true);
        await expect(h.products.removeProduct(100)).resolves.toBe(false);
    });
});
