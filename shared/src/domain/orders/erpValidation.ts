/**
 * Pre-flight checks for pushing a storefront order to the ERP
 *
 * Runs before any network call. Returns every problem found so the audit note
 * can list them all at once.
 */

import type { StorefrontOrder, StorefrontProduct } from '../storefront/types.js';

/** Storefront statuses that trigger an ERP order */
export const SYNCABLE_ORDER_STATUSES = ['processing', 'completed'] as const;

export type SyncableOrderStatus = (typeof SYNCABLE_ORDER_STATUSES)[number];

export interface OrderValidationResult {
    valid: boolean;
    errors: string[];
}

/** Strip the storefront's `wc-` status prefix */
export function normalizeOrderStatus(status: string): string {
    const lower = status.trim().toLowerCase();
    return lower.startsWith('wc-') ? lower.slice(3) : lower;
}

export function isSyncableStatus(status: string): boolean {
    const normalized = normalizeOrderStatus(status);
    return SYNCABLE_ORDER_STATUSES.some((s) => s === normalized);
}

export function validateOrderForErp(
    order: StorefrontOrder,
    products: ReadonlyMap<number, StorefrontProduct>,
): OrderValidationResult {
    const errors: string[] = [];

    if (order.lineItems.length === 0) {
        errors.push('Order has no items.');
    }

    if (order.billing.email.trim() === '' && order.billing.phone.trim() === '') {
        errors.push('Order has no contact information.');
    }

    for (const item of order.lineItems) {
        const product = item.productId === null ? undefined : products.get(item.productId);
        if (!product) {
            errors.push(`Product not found for item: ${item.name}`);
            continue;
        }
        if (!product.sku || product.sku.trim() === '') {
            errors.push(`Product "${product.name}" has no SKU.`);
        }
    }

    return { valid: errors.length === 0, errors };
}
