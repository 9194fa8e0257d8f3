/**
 * Unit tests for the order → ERP document mapper
 */

import { buildLineItem, buildOrder, buildProduct, productMap } from '../../../testing/storefrontFixtures.js';
import { calculateDiscountPercent, mapOrderToDocument, mapPaymentMethod, type OrderMappingOptions } from '../orderMapper.js';

const options: OrderMappingOptions = {
    defaultWarehouse: null,
    defaultTaxCode: null,
    shippingItemCode: 'SHIPPING',
};

describe('calculateDiscountPercent', () => {
    it('returns the rounded discount share', () => {
        expect(calculateDiscountPercent(40, 30)).toBe(25);
        expect(calculateDiscountPercent(30, 20)).toBe(33.33);
    });

    it('is zero when there is no discount', () => {
        expect(calculateDiscountPercent(40, 40)).toBe(0);
        expect(calculateDiscountPercent(40, 45)).toBe(0);
        expect(calculateDiscountPercent(0, -5)).toBe(0);
    });

    it('never exceeds 100', () => {
        expect(calculateDiscountPercent(10, -10)).toBe(100);
    });
});

describe('mapPaymentMethod', () => {
    it('maps known gateways and omits the rest', () => {
        expect(mapPaymentMethod('paypal')).toBe('PP');
        expect(mapPaymentMethod('cod')).toBe('CA');
        expect(mapPaymentMethod('stripe')).toBeNull();
    });
});

describe('mapOrderToDocument', () => {
    it('maps header fields and lines', () => {
        const order = buildOrder({
            customerNote: 'Leave at door',
            lineItems: [buildLineItem({ quantity: 3, subtotal: 30, total: 20, meta: [{ key: 'Size', value: 'M' }, { key: 'Color', value: 'Red' }] })],
        });
        const doc = mapOrderToDocument(order, 'WC000042', productMap(buildProduct({ sku: 'TEE 100' })), options);

        expect(doc).toEqual({
            CardCode: 'WC000042',
            DocDate: '2024-06-01',
            DocDueDate: '2024-06-08',
            NumAtCard: '5001',
            Comments: 'Store Order #5001\nCustomer Note: Leave at door\nPayment: Direct bank transfer',
            PaymentMethod: 'BT',
            DocumentLines: [
                {
                    ItemCode: 'TEE100',
                    Quantity: 3,
                    UnitPrice: 10,
                    DiscountPercent: 33.33,
                    FreeText: 'Size: M, Color: Red',
                },
            ],
        });
    });

    it('adds warehouse, tax code, ship-to and a shipping line when configured', () => {
        const order = buildOrder({ paymentMethod: 'stripe', shippingTotal: 4.95, shippingMethod: 'Flat rate' });
        const doc = mapOrderToDocument(order, 'C1', productMap(buildProduct()), {
            defaultWarehouse: '01',
            defaultTaxCode: 'VAT20',
            shippingItemCode: 'SHIP-FEE',
            shipToCode: 'SHIP',
        });

        expect(doc.PaymentMethod).toBeUndefined();
        expect(doc.ShipToCode).toBe('SHIP');
        expect(doc.DocumentLines).toEqual([
            { ItemCode: 'TEE-100', Quantity: 2, UnitPrice: 20, DiscountPercent: 0, WarehouseCode: '01', TaxCode: 'VAT20' },
            { ItemCode: 'SHIP-FEE', Quantity: 1, UnitPrice: 4.95, FreeText: 'Flat rate' },
        ]);
    });

    it('skips lines whose product cannot be resolved', () => {
        const order = buildOrder({ lineItems: [buildLineItem(), buildLineItem({ id: 2, productId: 999 })] });
        const doc = mapOrderToDocument(order, 'C1', productMap(buildProduct()), options);
        expect(doc.DocumentLines).toHaveLength(1);
    });
});
