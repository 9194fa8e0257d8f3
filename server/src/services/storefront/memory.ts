import type { StorefrontOrder, StorefrontProduct, StorefrontStockStatus } from '@erpsync/shared/domain';
import type { ErpOrderReference, StorefrontGateway } from './types.js';

/**
 * Storefront held in process memory. Backs the tests and local runs without
 * a storefront connection.
 */
export class InMemoryStorefront implements StorefrontGateway {
    readonly orders = new Map<number, StorefrontOrder>();
    readonly products = new Map<number, StorefrontProduct>();
    readonly notes = new Map<number, string[]>();
    stockWrites = 0;

    constructor(seed: { orders?: StorefrontOrder[]; products?: StorefrontProduct[] } = {}) {
        for (const order of seed.orders ?? []) this.orders.set(order.id, order);
        for (const product of seed.products ?? []) this.products.set(product.id, product);
    }

    async getOrder(orderId: number): Promise<StorefrontOrder | null> {
        return this.orders.get(orderId) ?? null;
    }

    async getProduct(productId: number): Promise<StorefrontProduct | null> {
        return this.products.get(productId) ?? null;
    }

    async getProducts(productIds: readonly number[]): Promise<Map<number, StorefrontProduct>> {
        const found = new Map<number, StorefrontProduct>();
        for (const id of productIds) {
            const product = this.products.get(id);
            if (product) found.set(id, product);
        }
        return found;
    }

    async updateProductStock(productId: number, quantity: number, status: StorefrontStockStatus): Promise<void> {
        const product = this.products.get(productId);
        if (!product) return;
        this.stockWrites++;
        this.products.set(productId, { ...product, manageStock: true, stockQuantity: quantity, stockStatus: status });
    }

    async addOrderNote(orderId: number, note: string): Promise<void> {
        const notes = this.notes.get(orderId) ?? [];
        notes.push(note);
        this.notes.set(orderId, notes);
    }

    async setOrderErpReference(orderId: number, reference: ErpOrderReference): Promise<void> {
        const order = this.orders.get(orderId);
        if (!order) return;
        this.orders.set(orderId, {
            ...order,
            erpDocEntry: reference.docEntry,
            erpDocNum: reference.docNum,
            erpSyncedAt: reference.syncedAt,
        });
    }

    notesFor(orderId: number): string[] {
        return this.notes.get(orderId) ?? [];
    }
}
