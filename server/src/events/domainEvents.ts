/**
 * Domain event handlers
 *
 * Storefront events (webhooks, or direct calls from an embedding app) turn
 * into at most one queued job each. Nothing here talks to the ERP.
 */

import { isSyncableStatus, normalizeOrderStatus, type StorefrontOrder, type StorefrontProduct } from '@erpsync/shared/domain';
import type { SyncSettings } from '../config/syncSettings.js';
import type { ProductMappingRepository } from '../db/repositories/types.js';
import type { QueueManager } from '../services/queue/queueManager.js';
import type { StorefrontGateway } from '../services/storefront/types.js';
import type { SyncLogRecorder } from '../services/syncLogRecorder.js';
import { eventLogger } from '../utils/logger.js';

export interface DomainEventDeps {
    queue: QueueManager;
    storefront: StorefrontGateway;
    productMappings: ProductMappingRepository;
    audit: SyncLogRecorder;
    settings: Pick<SyncSettings, 'autoSyncOrders'>;
}

export interface OrderRefund {
    id: number;
    amount: number;
}

export interface DomainEventHandlers {
    /** Returns the queued job id, or null when nothing was queued */
    onOrderCreated(order: StorefrontOrder): Promise<number | null>;
    /** `oldStatus` is null when the previous status is unknown */
    onOrderStatusChanged(order: StorefrontOrder, oldStatus: string | null, newStatus: string): Promise<number | null>;
    onOrderRefunded(order: StorefrontOrder, refund: OrderRefund): Promise<void>;
    onStockReduced(order: StorefrontOrder): Promise<number | null>;
    onLowStock(product: StorefrontProduct): void;
    onOutOfStock(product: StorefrontProduct): void;
    onProductSaved(product: StorefrontProduct): Promise<number | null>;
    onProductDeleted(productId: number): Promise<boolean>;
}

export function createDomainEventHandlers(deps: DomainEventDeps): DomainEventHandlers {
    const { queue, storefront, productMappings, audit, settings } = deps;

    async function queueOrder(order: StorefrontOrder): Promise<number | null> {
        if (order.erpDocEntry !== null) {
            eventLogger.debug({ orderId: order.id, docEntry: order.erpDocEntry }, 'Order already synced to ERP');
            return null;
        }

        const jobId = await queue.queueOrderSync(order.id);
        if (jobId !== null) {
            await storefront.addOrderNote(order.id, `Order queued for ERP sync (Job #${jobId})`);
        }
        return jobId;
    }

    async function handleCancellation(order: StorefrontOrder): Promise<number | null> {
        await queue.cancelOrderSync(order.id);
        if (order.erpDocEntry === null) return null;

        const jobId = await queue.queueOrderCancel(order.id);
        if (jobId !== null) {
            await storefront.addOrderNote(order.id, 'Order cancellation queued for ERP sync');
        }
        return jobId;
    }

    return {
        async onOrderCreated(order) {
            if (!settings.autoSyncOrders) {
                eventLogger.debug({ orderId: order.id }, 'Auto order sync disabled, skipping');
                return null;
            }
            if (!isSyncableStatus(order.status)) {
                eventLogger.debug({ orderId: order.id, status: order.status }, 'Order status not syncable on creation');
                return null;
            }
            return queueOrder(order);
        },

        async onOrderStatusChanged(order, oldStatus, newStatus) {
            if (!settings.autoSyncOrders) return null;

            const from = oldStatus === null ? null : normalizeOrderStatus(oldStatus);
            const to = normalizeOrderStatus(newStatus);
            eventLogger.debug({ orderId: order.id, oldStatus: from, newStatus: to }, 'Order status changed');

            const wasSyncable = from !== null && isSyncableStatus(from);
            if (isSyncableStatus(to) && !wasSyncable) {
                return queueOrder(order);
            }

            if (to === 'cancelled') {
                return handleCancellation(order);
            }

            if (to === 'completed' && from !== 'completed') {
                if (order.erpDocEntry === null) return queueOrder(order);
                eventLogger.info({ orderId: order.id, docEntry: order.erpDocEntry }, 'Synced order completed');
            }
            return null;
        },

        async onOrderRefunded(order, refund) {
            eventLogger.info({ orderId: order.id, refundId: refund.id, amount: refund.amount }, 'Order refunded');
            if (order.erpDocEntry === null) {
                eventLogger.debug({ orderId: order.id }, 'Order not synced to ERP, skipping refund');
                return;
            }

            // Credit memos are not created; the refund is only recorded
            await audit.record({
                syncType: 'order_refund',
                localId: order.id,
                erpId: String(order.erpDocEntry),
                status: 'info',
                direction: 'internal',
                message: `Refund #${refund.id} of ${refund.amount.toFixed(2)} recorded for ERP document ${order.erpDocEntry}`,
            });
        },

        async onStockReduced(order) {
            for (const item of order.lineItems) {
                if (item.productId === null) continue;
                const mapping = await productMappings.findByProductId(item.productId);
                if (mapping?.syncEnabled) {
                    return queue.queueStockPull(item.productId);
                }
            }
            eventLogger.debug({ orderId: order.id }, 'No mapped products on order, stock pull skipped');
            return null;
        },

        onLowStock: warnLowStock,
        onOutOfStock: warnOutOfStock,

        async onProductSaved(product) {
            if (!product.sku || product.sku.trim() === '') return null;
            eventLogger.debug({ productId: product.id, sku: product.sku }, 'Product saved');
            return queue.queueProductSync(product.id);
        },

        onProductDeleted: (productId) => removeProductMapping(productMappings, productId),
    };
}

/**
 * Handlers for an engine without a usable ERP connection: nothing is queued,
 * since every job would fail. Deleted products still lose their mapping.
 */
export function createInactiveEventHandlers(productMappings: ProductMappingRepository): DomainEventHandlers {
    const ignore = async (event: string, context: Record<string, unknown>): Promise<null> => {
        eventLogger.debug({ event, ...context }, 'ERP sync not configured, event ignored');
        return null;
    };

    return {
        onOrderCreated: (order) => ignore('order.created', { orderId: order.id }),
        onOrderStatusChanged: (order, _oldStatus, newStatus) =>
            ignore('order.status_changed', { orderId: order.id, newStatus }),
        async onOrderRefunded(order, refund) {
            await ignore('order.refunded', { orderId: order.id, refundId: refund.id });
        },
        onStockReduced: (order) => ignore('order.stock_reduced', { orderId: order.id }),
        onLowStock: warnLowStock,
        onOutOfStock: warnOutOfStock,
        onProductSaved: (product) => ignore('product.saved', { productId: product.id }),
        onProductDeleted: (productId) => removeProductMapping(productMappings, productId),
    };
}

function warnLowStock(product: StorefrontProduct): void {
    eventLogger.warn({ productId: product.id, sku: product.sku, stock: product.stockQuantity }, 'Low stock alert');
}

function warnOutOfStock(product: StorefrontProduct): void {
    eventLogger.warn({ productId: product.id, sku: product.sku }, 'Out of stock alert');
}

function removeProductMapping(productMappings: ProductMappingRepository, productId: number): Promise<boolean> {
    eventLogger.info({ productId }, 'Product deleted');
    return productMappings.remove(productId);
}
