/**
 * Unit tests for ERP order pre-flight validation
 */

import { buildAddress, buildLineItem, buildOrder, buildProduct, productMap } from '../../../testing/storefrontFixtures.js';
import { isSyncableStatus, normalizeOrderStatus, validateOrderForErp } from '../erpValidation.js';

describe('isSyncableStatus', () => {
    it('accepts processing and completed, with or without prefix', () => {
        expect(isSyncableStatus('processing')).toBe(true);
        expect(isSyncableStatus('wc-completed')).toBe(true);
        expect(isSyncableStatus('pending')).toBe(false);
        expect(isSyncableStatus('cancelled')).toBe(false);
    });

    it('normalizes status casing', () => {
        expect(normalizeOrderStatus(' WC-Processing ')).toBe('processing');
    });
});

describe('validateOrderForErp', () => {
    it('passes a complete order', () => {
        expect(validateOrderForErp(buildOrder(), productMap(buildProduct()))).toEqual({ valid: true, errors: [] });
    });

    it('rejects an order without items', () => {
        const result = validateOrderForErp(buildOrder({ lineItems: [] }), productMap());
        expect(result).toEqual({ valid: false, errors: ['Order has no items.'] });
    });

    it('accepts phone-only contact details', () => {
        const order = buildOrder({ billing: buildAddress({ email: '' }) });
        expect(validateOrderForErp(order, productMap(buildProduct())).valid).toBe(true);
    });

    it('rejects an order without email or phone', () => {
        const order = buildOrder({ billing: buildAddress({ email: '', phone: ' ' }) });
        expect(validateOrderForErp(order, productMap(buildProduct())).errors).toEqual(['Order has no contact information.']);
    });

    it('reports missing products and SKUs', () => {
        const order = buildOrder({
            lineItems: [
                buildLineItem({ productId: null, name: 'Gift wrap' }),
                buildLineItem({ id: 2, productId: 100 }),
            ],
        });
        const result = validateOrderForErp(order, productMap(buildProduct({ sku: '' })));
        expect(result.errors).toEqual(['Product not found for item: Gift wrap', 'Product "Test Tee" has no SKU.']);
    });
});
