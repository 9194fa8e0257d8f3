import type { StorefrontOrder, StorefrontProduct, StorefrontStockStatus } from '@erpsync/shared/domain';

export interface ErpOrderReference {
    docEntry: number;
    docNum: number | null;
    syncedAt: Date;
}

/**
 * Read/write access to the storefront's orders and products. The engine never
 * touches storefront storage directly.
 */
export interface StorefrontGateway {
    getOrder(orderId: number): Promise<StorefrontOrder | null>;
    getProduct(productId: number): Promise<StorefrontProduct | null>;
    /** Products by id; ids the storefront does not know are absent from the map */
    getProducts(productIds: readonly number[]): Promise<Map<number, StorefrontProduct>>;
    updateProductStock(productId: number, quantity: number, status: StorefrontStockStatus): Promise<void>;
    addOrderNote(orderId: number, note: string): Promise<void>;
    setOrderErpReference(orderId: number, reference: ErpOrderReference): Promise<void>;
}
