/**
 * Storefront entity contracts
 *
 * Read models of the storefront's orders and products, as seen by the sync
 * engine. The storefront owns their lifecycle; the engine only reads them and
 * writes back through the gateway interface on the server side.
 */

export type StorefrontStockStatus = 'instock' | 'outofstock' | 'onbackorder';

export interface StorefrontAddress {
    firstName: string;
    lastName: string;
    company: string;
    address1: string;
    address2: string;
    city: string;
    state: string;
    postcode: string;
    country: string;
    email: string;
    phone: string;
}

export interface StorefrontLineItemMeta {
    key: string;
    value: string;
}

export interface StorefrontLineItem {
    id: number;
    productId: number | null;
    name: string;
    quantity: number;
    /** Line price before discounts */
    subtotal: number;
    /** Line price after discounts */
    total: number;
    meta: StorefrontLineItemMeta[];
}

export interface StorefrontOrder {
    id: number;
    number: string;
    status: string;
    createdAt: Date;
    currency: string;
    /** Registered customer id; null for guest checkouts */
    customerId: number | null;
    customerNote: string;
    paymentMethod: string;
    paymentMethodTitle: string;
    billing: StorefrontAddress;
    /** Null when the order ships to the billing address */
    shipping: StorefrontAddress | null;
    lineItems: StorefrontLineItem[];
    shippingTotal: number;
    shippingMethod: string;
    /** ERP document reference, set once the order has been synced */
    erpDocEntry: number | null;
    erpDocNum: number | null;
    erpSyncedAt: Date | null;
}

export interface StorefrontProduct {
    id: number;
    sku: string | null;
    name: string;
    manageStock: boolean;
    stockQuantity: number | null;
    stockStatus: StorefrontStockStatus;
}

export function emptyAddress(): StorefrontAddress {
    return {
        firstName: '',
        lastName: '',
        company: '',
        address1: '',
        address2: '',
        city: '',
        state: '',
        postcode: '',
        country: '',
        email: '',
        phone: '',
    };
}
