/**
 * Wire shapes of the storefront REST API (orders, products, webhooks)
 *
 * Parsed with zod and transformed into the shared storefront read models.
 * Money arrives as decimal strings; ids of guests arrive as 0.
 */

import { z } from 'zod';
import type {
    StorefrontAddress,
    StorefrontLineItem,
    StorefrontOrder,
    StorefrontProduct,
} from '@erpsync/shared/domain';

/** Order meta keys carrying the ERP document reference */
export const ERP_ORDER_META_KEYS = {
    docEntry: '_erp_doc_entry',
    docNum: '_erp_doc_num',
    syncedAt: '_erp_synced_at',
} as const;

const amount = z.coerce.number().catch(0);

const text = z.string().nullish().transform((value) => value ?? '');

const metaEntrySchema = z.object({
    key: z.string(),
    value: z.unknown(),
});

type MetaEntry = z.infer<typeof metaEntrySchema>;

const addressSchema = z.object({
    first_name: text,
    last_name: text,
    company: text,
    address_1: text,
    address_2: text,
    city: text,
    state: text,
    postcode: text,
    country: text,
    email: text.optional(),
    phone: text.optional(),
});

type WireAddress = z.infer<typeof addressSchema>;

const lineItemSchema = z.object({
    id: z.number().int(),
    product_id: z.number().int().nullish(),
    name: text,
    quantity: z.coerce.number(),
    subtotal: amount,
    total: amount,
    meta_data: z.array(metaEntrySchema).default([]),
});

export const restOrderSchema = z.object({
    id: z.number().int(),
    number: z.union([z.string(), z.number()]).transform(String),
    status: z.string(),
    date_created_gmt: z.string(),
    currency: text,
    customer_id: z.number().int().default(0),
    customer_note: text,
    payment_method: text,
    payment_method_title: text,
    billing: addressSchema,
    shipping: addressSchema.nullish(),
    line_items: z.array(lineItemSchema).default([]),
    shipping_total: amount,
    shipping_lines: z.array(z.object({ method_title: text })).default([]),
    meta_data: z.array(metaEntrySchema).default([]),
});

export type RestOrder = z.infer<typeof restOrderSchema>;

const stockStatusSchema = z.enum(['instock', 'outofstock', 'onbackorder']).catch('outofstock');

export const restProductSchema = z.object({
    id: z.number().int(),
    sku: z.string().nullish(),
    name: text,
    manage_stock: z.boolean().catch(false),
    stock_quantity: z.number().nullish(),
    stock_status: stockStatusSchema,
});

export type RestProduct = z.infer<typeof restProductSchema>;

// ============================================
// TRANSFORMS
// ============================================

function metaText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}

function findMeta(meta: MetaEntry[], key: string): string | null {
    const entry = meta.find((m) => m.key === key);
    return entry === undefined || entry.value === null || entry.value === '' ? null : metaText(entry.value);
}

function metaInt(meta: MetaEntry[], key: string): number | null {
    const value = findMeta(meta, key);
    if (value === null) return null;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : null;
}

/** Timestamps without an offset are GMT */
function parseGmt(value: string): Date {
    return new Date(/[zZ]|[+-]\d{2}:?\d{2}$/.test(value) ? value : `${value}Z`);
}

function toAddress(address: WireAddress): StorefrontAddress {
    return {
        firstName: address.first_name,
        lastName: address.last_name,
        company: address.company,
        address1: address.address_1,
        address2: address.address_2,
        city: address.city,
        state: address.state,
        postcode: address.postcode,
        country: address.country,
        email: address.email ?? '',
        phone: address.phone ?? '',
    };
}

export function toStorefrontOrder(order: RestOrder): StorefrontOrder {
    const lineItems: StorefrontLineItem[] = order.line_items.map((item) => ({
        id: item.id,
        productId: item.product_id ? item.product_id : null,
        name: item.name,
        quantity: item.quantity,
        subtotal: item.subtotal,
        total: item.total,
        meta: item.meta_data.map((m) => ({ key: m.key, value: metaText(m.value) })),
    }));
    const syncedAt = findMeta(order.meta_data, ERP_ORDER_META_KEYS.syncedAt);

    return {
        id: order.id,
        number: order.number,
        status: order.status,
        createdAt: parseGmt(order.date_created_gmt),
        currency: order.currency,
        customerId: order.customer_id > 0 ? order.customer_id : null,
        customerNote: order.customer_note,
        paymentMethod: order.payment_method,
        paymentMethodTitle: order.payment_method_title,
        billing: toAddress(order.billing),
        shipping: order.shipping && order.shipping.address_1 !== '' ? toAddress(order.shipping) : null,
        lineItems,
        shippingTotal: order.shipping_total,
        shippingMethod: order.shipping_lines.map((line) => line.method_title).filter(Boolean).join(', '),
        erpDocEntry: metaInt(order.meta_data, ERP_ORDER_META_KEYS.docEntry),
        erpDocNum: metaInt(order.meta_data, ERP_ORDER_META_KEYS.docNum),
        erpSyncedAt: syncedAt ? new Date(syncedAt) : null,
    };
}

export function toStorefrontProduct(product: RestProduct): StorefrontProduct {
    return {
        id: product.id,
        sku: product.sku ? product.sku : null,
        name: product.name,
        manageStock: product.manage_stock,
        stockQuantity: product.stock_quantity ?? null,
        stockStatus: product.stock_status,
    };
}
