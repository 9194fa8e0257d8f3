/**
 * Order push: storefront order → ERP sales order
 *
 * unsynced → validated → customer resolved → submitted → mapped.
 * A recorded DocEntry (on the order or in erp_order_map) means the order is
 * done; a re-run never creates a second document.
 */

import {
    mapOrderToDocument,
    validateOrderForErp,
    type OrderMappingOptions,
    type StorefrontOrder,
} from '@erpsync/shared/domain';
import type { SyncSettings } from '../../config/syncSettings.js';
import type { CustomerMappingRepository, OrderMappingRepository } from '../../db/repositories/types.js';
import { ApiError, NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { orderLogger } from '../../utils/logger.js';
import type { ErpClient } from '../erp/client.js';
import type { ErpOrderReference, StorefrontGateway } from '../storefront/types.js';
import type { SyncLogRecorder } from '../syncLogRecorder.js';
import type { CustomerSyncService } from './customerSync.js';

export type OrderSyncSettings = Pick<
    SyncSettings,
    'defaultWarehouse' | 'defaultTaxCode' | 'shippingItemCode' | 'defaultCustomerCode'
>;

export interface OrderSyncDeps {
    erp: ErpClient;
    storefront: StorefrontGateway;
    orderMappings: OrderMappingRepository;
    customerMappings: CustomerMappingRepository;
    /** Null when customer sync is not wired; orders then use the default code */
    customers: CustomerSyncService | null;
    audit: SyncLogRecorder;
    settings: OrderSyncSettings;
    now?: () => Date;
}

export type OrderSyncResult =
    | { status: 'synced'; docEntry: number; docNum: number | null }
    | { status: 'already-synced'; docEntry: number; docNum: number | null };

export type OrderCancelResult =
    | { status: 'cancelled'; docEntry: number }
    | { status: 'not-synced' };

interface RecordedDocument extends ErpOrderReference {
    /** Whether the storefront order already carries the reference */
    onOrder: boolean;
}

export class OrderSyncService {
    private readonly now: () => Date;

    constructor(private readonly deps: OrderSyncDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async syncOrder(orderId: number): Promise<OrderSyncResult> {
        const order = await this.loadOrder(orderId);

        const existing = await this.recordedDocument(order);
        if (existing) {
            if (!existing.onOrder) {
                // An earlier run created the document but never reached the storefront
                await this.deps.storefront.setOrderErpReference(orderId, existing);
            }
            orderLogger.info({ orderId, docEntry: existing.docEntry }, 'Order already synced to ERP');
            return { status: 'already-synced', docEntry: existing.docEntry, docNum: existing.docNum };
        }

        const productIds = order.lineItems.flatMap((item) => (item.productId === null ? [] : [item.productId]));
        const products = await this.deps.storefront.getProducts(productIds);

        const validation = validateOrderForErp(order, products);
        if (!validation.valid) {
            const error = new ValidationError(
                `Order #${order.number} cannot be synced: ${validation.errors.join(' ')}`,
                validation.errors,
                { orderId },
            );
            await this.recordFailure(order, error);
            throw error;
        }

        orderLogger.info({ orderId, lines: order.lineItems.length }, 'Starting order sync');

        try {
            const cardCode = await this.resolveCustomer(order);
            const payload = mapOrderToDocument(order, cardCode, products, this.mappingOptions());
            const created = await this.deps.erp.createOrder(payload);

            if (created.docEntry === null) {
                throw new ApiError('ERP response carried no DocEntry', null, 'MISSING_DOC_ENTRY', created, { orderId });
            }

            const docEntry = created.docEntry;
            const docNum = created.docNum;
            const syncedAt = this.now();

            // Mapping first: it is the idempotency record if a storefront write fails
            await this.deps.orderMappings.markSynced(orderId, { docEntry, docNum, syncedAt });
            await this.deps.storefront.setOrderErpReference(orderId, { docEntry, docNum, syncedAt });
            await this.deps.storefront.addOrderNote(orderId, `Order synced to ERP. DocNum: ${docNum ?? '-'}, DocEntry: ${docEntry}`);
            await this.deps.audit.record({
                syncType: 'order',
                localId: orderId,
                erpId: String(docEntry),
                status: 'success',
                direction: 'to_erp',
                message: `Order #${order.number} synced as DocNum ${docNum ?? '-'}`,
                requestData: payload,
                responseData: created,
            });

            orderLogger.info({ orderId, docEntry, docNum }, 'Order synced successfully');
            return { status: 'synced', docEntry, docNum };
        } catch (error: unknown) {
            orderLogger.error({ orderId, error: errorMessage(error) }, 'ERP order sync failed');
            await this.recordFailure(order, error);
            throw error;
        }
    }

    /**
     * Cancel the ERP document of a synced order
     */
    async cancelOrder(orderId: number): Promise<OrderCancelResult> {
        const mapping = await this.deps.orderMappings.findByOrderId(orderId);
        let docEntry = mapping?.erpDocEntry ?? null;
        if (docEntry === null) {
            const order = await this.deps.storefront.getOrder(orderId);
            docEntry = order?.erpDocEntry ?? null;
        }

        if (docEntry === null) {
            orderLogger.debug({ orderId }, 'Order not in ERP, nothing to cancel');
            return { status: 'not-synced' };
        }

        try {
            await this.deps.erp.cancelOrder(docEntry);
        } catch (error: unknown) {
            await this.deps.audit.record({
                syncType: 'order_cancel',
                localId: orderId,
                erpId: String(docEntry),
                status: 'error',
                direction: 'to_erp',
                message: `ERP cancellation failed: ${errorMessage(error)}`,
            });
            throw error;
        }

        await this.deps.storefront.addOrderNote(orderId, `ERP order cancelled. DocEntry: ${docEntry}`);
        await this.deps.audit.record({
            syncType: 'order_cancel',
            localId: orderId,
            erpId: String(docEntry),
            status: 'success',
            direction: 'to_erp',
            message: `ERP document ${docEntry} cancelled`,
        });
        orderLogger.info({ orderId, docEntry }, 'ERP order cancelled');
        return { status: 'cancelled', docEntry };
    }

    // ============================================
    // HELPERS
    // ============================================

    private async loadOrder(orderId: number): Promise<StorefrontOrder> {
        const order = await this.deps.storefront.getOrder(orderId);
        if (!order) {
            throw new NotFoundError(`Order ${orderId} not found`, 'order', orderId);
        }
        return order;
    }

    private async recordedDocument(order: StorefrontOrder): Promise<RecordedDocument | null> {
        if (order.erpDocEntry !== null) {
            return {
                docEntry: order.erpDocEntry,
                docNum: order.erpDocNum,
                syncedAt: order.erpSyncedAt ?? this.now(),
                onOrder: true,
            };
        }
        const mapping = await this.deps.orderMappings.findByOrderId(order.id);
        if (mapping?.erpDocEntry != null) {
            return {
                docEntry: mapping.erpDocEntry,
                docNum: mapping.erpDocNum,
                syncedAt: mapping.syncedAt ?? this.now(),
                onOrder: false,
            };
        }
        return null;
    }

    private async resolveCustomer(order: StorefrontOrder): Promise<string> {
        if (order.customerId !== null) {
            const mapped = await this.deps.customerMappings.findByCustomerId(order.customerId);
            if (mapped) return mapped.erpCardCode;
        }
        if (this.deps.customers) {
            return this.deps.customers.ensureCustomer(order);
        }
        return this.deps.settings.defaultCustomerCode;
    }

    private mappingOptions(): OrderMappingOptions {
        return {
            defaultWarehouse: this.deps.settings.defaultWarehouse,
            defaultTaxCode: this.deps.settings.defaultTaxCode,
            shippingItemCode: this.deps.settings.shippingItemCode,
        };
    }

    /**
     * Failure note, mapping attempt and audit entry. Writes here must not mask
     * the triggering error, so their own failures are only logged.
     */
    private async recordFailure(order: StorefrontOrder, error: unknown): Promise<void> {
        const message = errorMessage(error);
        try {
            await this.deps.orderMappings.recordFailure(order.id, message);
            await this.deps.storefront.addOrderNote(order.id, `ERP sync failed: ${message}`);
        } catch (writeError: unknown) {
            orderLogger.warn({ orderId: order.id, error: errorMessage(writeError) }, 'Could not record order sync failure');
        }
        await this.deps.audit.record({
            syncType: 'order',
            localId: order.id,
            erpId: null,
            status: 'error',
            direction: 'to_erp',
            message: `Order #${order.number} sync failed: ${message}`,
        });
    }
}
