/**
 * Order → ERP sales order document
 *
 * Pure transformation; the caller supplies the resolved partner code and the
 * products referenced by the order's lines.
 */

import { addDays, formatDateForErp, formatPriceForErp, roundTo, sanitizeItemCode } from '../erp/formatting.js';
import type { ErpDocumentLinePayload, ErpOrderPayload } from '../erp/types.js';
import type { StorefrontLineItem, StorefrontOrder, StorefrontProduct } from '../storefront/types.js';

/** Days between document date and due date */
export const ORDER_DUE_DAYS = 7;

/** Storefront payment gateway id → ERP payment method code */
export const PAYMENT_METHOD_CODES: Readonly<Record<string, string>> = {
    bacs: 'BT',
    cheque: 'CH',
    cod: 'CA',
    paypal: 'PP',
};

export interface OrderMappingOptions {
    defaultWarehouse: string | null;
    defaultTaxCode: string | null;
    shippingItemCode: string;
    /** Partner ship-to address code, when the partner has one on file */
    shipToCode?: string | null;
}

/**
 * Discount of a line as a percentage of its pre-discount subtotal,
 * in [0, 100] with 2 decimals.
 */
export function calculateDiscountPercent(subtotal: number, total: number): number {
    if (subtotal <= 0) return 0;
    const discount = subtotal - total;
    if (discount <= 0) return 0;
    return Math.min(100, roundTo((discount / subtotal) * 100, 2));
}

export function mapPaymentMethod(method: string): string | null {
    return PAYMENT_METHOD_CODES[method] ?? null;
}

function renderLineMeta(item: StorefrontLineItem): string {
    return item.meta
        .filter((entry) => entry.key.trim() !== '' && !entry.key.startsWith('_'))
        .map((entry) => `${entry.key}: ${entry.value}`)
        .join(', ');
}

function buildComments(order: StorefrontOrder): string {
    const parts = [`Store Order #${order.number}`];
    if (order.customerNote.trim() !== '') {
        parts.push(`Customer Note: ${order.customerNote.trim()}`);
    }
    if (order.paymentMethodTitle.trim() !== '') {
        parts.push(`Payment: ${order.paymentMethodTitle.trim()}`);
    }
    return parts.join('\n');
}

export function mapOrderLines(
    order: StorefrontOrder,
    products: ReadonlyMap<number, StorefrontProduct>,
    options: OrderMappingOptions,
): ErpDocumentLinePayload[] {
    const lines: ErpDocumentLinePayload[] = [];

    for (const item of order.lineItems) {
        const product = item.productId === null ? undefined : products.get(item.productId);
        const sku = product?.sku;
        if (!sku || item.quantity <= 0) continue;

        const line: ErpDocumentLinePayload = {
            ItemCode: sanitizeItemCode(sku),
            Quantity: item.quantity,
            UnitPrice: formatPriceForErp(item.subtotal / item.quantity),
            DiscountPercent: calculateDiscountPercent(item.subtotal, item.total),
        };

        if (options.defaultWarehouse) line.WarehouseCode = options.defaultWarehouse;
        if (options.defaultTaxCode) line.TaxCode = options.defaultTaxCode;

        const meta = renderLineMeta(item);
        if (meta !== '') line.FreeText = meta;

        lines.push(line);
    }

    if (order.shippingTotal > 0) {
        lines.push({
            ItemCode: options.shippingItemCode,
            Quantity: 1,
            UnitPrice: formatPriceForErp(order.shippingTotal),
            FreeText: order.shippingMethod,
        });
    }

    return lines;
}

export function mapOrderToDocument(
    order: StorefrontOrder,
    cardCode: string,
    products: ReadonlyMap<number, StorefrontProduct>,
    options: OrderMappingOptions,
): ErpOrderPayload {
    const payload: ErpOrderPayload = {
        CardCode: cardCode,
        DocDate: formatDateForErp(order.createdAt),
        DocDueDate: formatDateForErp(addDays(order.createdAt, ORDER_DUE_DAYS)),
        NumAtCard: order.number,
        Comments: buildComments(order),
        DocumentLines: mapOrderLines(order, products, options),
    };

    if (options.shipToCode) payload.ShipToCode = options.shipToCode;

    const paymentCode = mapPaymentMethod(order.paymentMethod);
    if (paymentCode) payload.PaymentMethod = paymentCode;

    return payload;
}
