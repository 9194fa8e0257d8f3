import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { StorefrontOrder, StorefrontProduct, StorefrontStockStatus } from '@erpsync/shared/domain';
import { storefrontLogger } from '../../utils/logger.js';
import { errorMessage, ExternalServiceError } from '../../utils/errors.js';
import {
    ERP_ORDER_META_KEYS,
    restOrderSchema,
    restProductSchema,
    toStorefrontOrder,
    toStorefrontProduct,
} from './restSchemas.js';
import type { ErpOrderReference, StorefrontGateway } from './types.js';


export interface RestStorefrontConfig {
    /** Store root, e.g. https://shop.example.com */
    baseUrl: string;
    consumerKey: string;
    consumerSecret: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

/** Largest page the products endpoint serves */
const PRODUCTS_PAGE_SIZE = 100;

/**
 * Storefront REST API gateway
 *
 * Authenticates with consumer key/secret over basic auth. A 404 on a read
 * means the entity is gone and resolves to null; every other failure becomes
 * an ExternalServiceError for the job queue to retry.
 */
export class RestStorefrontGateway implements StorefrontGateway {
    private readonly http: AxiosInstance;

    constructor(config: RestStorefrontConfig) {
        this.http = axios.create({
            baseURL: `${config.baseUrl.replace(/\/+$/, '')}/wp-json/wc/v3`,
            auth: { username: config.consumerKey, password: config.consumerSecret },
            headers: { 'Content-Type': 'application/json' },
            timeout: config.timeoutMs ?? 30_000,
            adapter: config.adapter,
        });
    }

    async getOrder(orderId: number): Promise<StorefrontOrder | null> {
        const body = await this.read(`orders/${orderId}`);
        return body === null ? null : toStorefrontOrder(restOrderSchema.parse(body));
    }

    async getProduct(productId: number): Promise<StorefrontProduct | null> {
        const body = await this.read(`products/${productId}`);
        return body === null ? null : toStorefrontProduct(restProductSchema.parse(body));
    }

    async getProducts(productIds: readonly number[]): Promise<Map<number, StorefrontProduct>> {
        const found = new Map<number, StorefrontProduct>();
        const unique = [...new Set(productIds)];

        for (let i = 0; i < unique.length; i += PRODUCTS_PAGE_SIZE) {
            const chunk = unique.slice(i, i + PRODUCTS_PAGE_SIZE);
            const body = await this.call('GET', 'products', undefined, {
                include: chunk.join(','),
                per_page: chunk.length,
            });
            for (const raw of z.array(restProductSchema).parse(body)) {
                const product = toStorefrontProduct(raw);
                found.set(product.id, product);
            }
        }

        return found;
    }

    async updateProductStock(productId: number, quantity: number, status: StorefrontStockStatus): Promise<void> {
        await this.call('PUT', `products/${productId}`, {
            manage_stock: true,
            stock_quantity: quantity,
            stock_status: status,
        });
    }

    async addOrderNote(orderId: number, note: string): Promise<void> {
        await this.call('POST', `orders/${orderId}/notes`, { note });
    }

    async setOrderErpReference(orderId: number, reference: ErpOrderReference): Promise<void> {
        await this.call('PUT', `orders/${orderId}`, {
            meta_data: [
                { key: ERP_ORDER_META_KEYS.docEntry, value: String(reference.docEntry) },
                { key: ERP_ORDER_META_KEYS.docNum, value: reference.docNum === null ? '' : String(reference.docNum) },
                { key: ERP_ORDER_META_KEYS.syncedAt, value: reference.syncedAt.toISOString() },
            ],
        });
    }

    // ============================================
    // TRANSPORT
    // ============================================

    private async read(path: string): Promise<unknown> {
        try {
            return await this.call('GET', path);
        } catch (error: unknown) {
            if (error instanceof ExternalServiceError && error.httpStatus === 404) return null;
            throw error;
        }
    }

    private async call(
        method: 'GET' | 'POST' | 'PUT',
        path: string,
        data?: unknown,
        params?: Record<string, string | number>,
    ): Promise<unknown> {
        try {
            const response = await this.http.request<unknown>({ method, url: path, data, params });
            return response.data;
        } catch (error: unknown) {
            const status = error instanceof AxiosError ? (error.response?.status ?? null) : null;
            if (status !== 404) {
                storefrontLogger.warn({ method, path, status, error: errorMessage(error) }, 'Storefront request failed');
            }
            throw new ExternalServiceError(
                `Storefront ${method} ${path} failed${status === null ? '' : ` with status ${status}`}`,
                'storefront',
                error,
                status,
            );
        }
    }
}
