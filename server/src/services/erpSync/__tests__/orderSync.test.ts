/**
 * Unit tests for the order push
 */

import { buildOrder, buildProduct } from '@erpsync/shared/testing';
import { ApiError, NotFoundError, ValidationError } from '../../../utils/errors.js';
import { FIXED_NOW, createSyncHarness } from '../../../testing/syncHarness.js';

const CREATED_ORDER = { status: 201, body: { DocEntry: 88, DocNum: 1088, DocTotal: 40 } };

async function harnessWithMappedCustomer() {
    const h = createSyncHarness({ orders: [buildOrder()], products: [buildProduct()] });
    await h.repos.customerMappings.upsert({
        localCustomerId: 42,
        email: 'ada@example.com',
        erpCardCode: 'C-ADA',
        erpCardName: 'Ada Lovelace',
        syncStatus: 'synced',
    });
    return h;
}

describe('OrderSyncService.syncOrder', () => {
    it('creates the ERP document and records the reference', async () => {
        const h = await harnessWithMappedCustomer();
        h.erp.reply('POST', 'Orders', CREATED_ORDER);

        await expect(h.orders.syncOrder(5001)).resolves.toEqual({ status: 'synced', docEntry: 88, docNum: 1088 });

        expect(h.erp.callsTo('POST', 'Orders')[0]?.body).toEqual({
            CardCode: 'C-ADA',
            DocDate: '2024-06-01',
            DocDueDate: '2024-06-08',
            NumAtCard: '5001',
            Comments: 'Store Order #5001\nPayment: Direct bank transfer',
            DocumentLines: [{ ItemCode: 'TEE-100', Quantity: 2, UnitPrice: 20, DiscountPercent: 0 }],
            PaymentMethod: 'BT',
        });
        expect(h.storefront.orders.get(5001)).toMatchObject({ erpDocEntry: 88, erpDocNum: 1088, erpSyncedAt: FIXED_NOW });
        expect(h.storefront.notesFor(5001)).toEqual(['Order synced to ERP. DocNum: 1088, DocEntry: 88']);
        await expect(h.repos.orderMappings.findByOrderId(5001)).resolves.toMatchObject({
            erpDocEntry: 88,
            syncStatus: 'synced',
            syncAttempts: 1,
        });
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({
            syncType: 'order',
            localId: 5001,
            erpId: '88',
            status: 'success',
            message: 'Order #5001 synced as DocNum 1088',
        });
    });

    it('does nothing for an order that already carries a document', async () => {
        const h = createSyncHarness({
            orders: [buildOrder({ erpDocEntry: 77, erpDocNum: 1077, erpSyncedAt: FIXED_NOW })],
            products: [buildProduct()],
        });

        await expect(h.orders.syncOrder(5001)).resolves.toEqual({ status: 'already-synced', docEntry: 77, docNum: 1077 });
        expect(h.erp.calls).toEqual([]);
        expect(h.storefront.notesFor(5001)).toEqual([]);
    });

    it('repairs the storefront reference from the mapping table', async () => {
        const h = createSyncHarness({ orders: [buildOrder()], products: [buildProduct()] });
        await h.repos.orderMappings.markSynced(5001, { docEntry: 88, docNum: 1088, syncedAt: FIXED_NOW });

        await expect(h.orders.syncOrder(5001)).resolves.toEqual({ status: 'already-synced', docEntry: 88, docNum: 1088 });
        expect(h.erp.calls).toEqual([]);
        expect(h.storefront.orders.get(5001)).toMatchObject({ erpDocEntry: 88, erpDocNum: 1088 });
    });

    it('rejects an order that fails validation before calling the ERP', async () => {
        const h = createSyncHarness({ orders: [buildOrder()] });

        const error = await h.orders.syncOrder(5001).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
            message: 'Order #5001 cannot be synced: Product not found for item: Test Tee',
            details: ['Product not found for item: Test Tee'],
        });
        expect(h.erp.calls).toEqual([]);
        expect(h.storefront.notesFor(5001)).toEqual([
            'ERP sync failed: Order #5001 cannot be synced: Product not found for item: Test Tee',
        ]);
        await expect(h.repos.orderMappings.findByOrderId(5001)).resolves.toMatchObject({
            syncStatus: 'failed',
            syncAttempts: 1,
        });
    });

    it('records an ERP rejection and rethrows it', async () => {
        const h = await harnessWithMappedCustomer();
        h.erp.reply('POST', 'Orders', {
            status: 400,
            body: { error: { code: -10, message: { lang: 'en-us', value: 'Invalid BP code' } } },
        });

        await expect(h.orders.syncOrder(5001)).rejects.toBeInstanceOf(ApiError);

        expect(h.storefront.notesFor(5001)).toEqual(['ERP sync failed: Invalid BP code']);
        await expect(h.repos.orderMappings.findByOrderId(5001)).resolves.toMatchObject({
            erpDocEntry: null,
            syncStatus: 'failed',
            lastError: 'Invalid BP code',
        });
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({
            status: 'error',
            message: 'Order #5001 sync failed: Invalid BP code',
        });
    });

    it('fails when the ERP answers without a DocEntry', async () => {
        const h = await harnessWithMappedCustomer();
        h.erp.reply('POST', 'Orders', { status: 201, body: { DocNum: 1088 } });

        await expect(h.orders.syncOrder(5001)).rejects.toMatchObject({ code: 'MISSING_DOC_ENTRY' });
        expect(h.storefront.orders.get(5001)?.erpDocEntry).toBeNull();
    });

    it('resolves an unmapped customer through customer sync', async () => {
        const h = createSyncHarness({ orders: [buildOrder()], products: [buildProduct()] });
        h.erp.reply('GET', 'BusinessPartners', { status: 200, body: { value: [] } });
        h.erp.reply('POST', 'BusinessPartners', { status: 201, body: { CardCode: 'WC000042', CardName: 'Ada Lovelace' } });
        h.erp.reply('POST', 'Orders', CREATED_ORDER);

        await h.orders.syncOrder(5001);

        expect(h.erp.callsTo('POST', 'Orders')[0]?.body).toMatchObject({ CardCode: 'WC000042' });
    });

    it('raises NotFoundError for an unknown order', async () => {
        const h = createSyncHarness();

        await expect(h.orders.syncOrder(999)).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('OrderSyncService.cancelOrder', () => {
    it('cancels the mapped document', async () => {
        const h = createSyncHarness({ orders: [buildOrder()] });
        await h.repos.orderMappings.markSynced(5001, { docEntry: 88, docNum: 1088, syncedAt: FIXED_NOW });
        h.erp.reply('POST', 'Orders(88)/Cancel', { status: 204 });

        await expect(h.orders.cancelOrder(5001)).resolves.toEqual({ status: 'cancelled', docEntry: 88 });
        expect(h.storefront.notesFor(5001)).toEqual(['ERP order cancelled. DocEntry: 88']);
        expect(h.repos.syncLog.records.at(-1)).toMatchObject({ syncType: 'order_cancel', status: 'success' });
    });

    it('skips an order that never reached the ERP', async () => {
        const h = createSyncHarness({ orders: [buildOrder()] });

        await expect(h.orders.cancelOrder(5001)).resolves.toEqual({ status: 'not-synced' });
        expect(h.erp.calls).toEqual([]);
    });
});
