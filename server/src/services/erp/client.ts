import type { AxiosInstance, AxiosResponse } from 'axios';
import {
    hasError,
    parseError,
    type ErpBusinessPartner,
    type ErpBusinessPartnerPayload,
    type ErpOrder,
    type ErpOrderPayload,
    type ErpQueryParams,
    type ErpRecord,
    type ParsedCollection,
} from '@erpsync/shared/domain';
import { ERP_SYNC } from '../../config/sync/erp.js';
import { ApiError, AuthenticationError, ConnectionError, errorMessage, isErpError } from '../../utils/errors.js';
import { erpLogger } from '../../utils/logger.js';
import { createErpHttp, toConnectionError } from './http.js';
import type { ErpSessionManager } from './sessionManager.js';
import type {
    ConnectionTestResult,
    ErpConnectionConfig,
    ErpRequester,
    ErpResponseBody,
    ErpTransportOptions,
    HttpMethod,
} from './types.js';

// Feature module imports
import * as itemsFn from './items.js';
import * as ordersFn from './orders.js';
import * as partnersFn from './businessPartners.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ErpClientDeps extends ErpTransportOptions {
    config: ErpConnectionConfig;
    session: ErpSessionManager;
    sleep?: Sleep;
    maxAttempts?: number;
}

/**
 * ERP Service Layer client
 *
 * Every request carries the current session cookies. Failures are retried
 * according to their kind:
 * - retryable authentication (session expired / missing): re-login, retry at once
 * - connection: wait 2^attempt seconds, retry
 * - anything else: propagate immediately
 */
export class ErpClient implements ErpRequester {
    private readonly config: ErpConnectionConfig;
    private readonly session: ErpSessionManager;
    private readonly http: AxiosInstance;
    private readonly sleep: Sleep;
    private readonly maxAttempts: number;

    constructor(deps: ErpClientDeps) {
        this.config = deps.config;
        this.session = deps.session;
        this.http = createErpHttp(deps.config, deps.adapter);
        this.sleep = deps.sleep ?? defaultSleep;
        this.maxAttempts = deps.maxAttempts ?? ERP_SYNC.client.maxAttempts;
    }

    // ============================================
    // HTTP VERBS
    // ============================================

    get(endpoint: string, query?: ErpQueryParams): Promise<ErpResponseBody> {
        return this.request('GET', endpoint, undefined, query);
    }

    post(endpoint: string, body?: unknown, query?: ErpQueryParams): Promise<ErpResponseBody> {
        return this.request('POST', endpoint, body, query);
    }

    patch(endpoint: string, body: unknown): Promise<ErpResponseBody> {
        return this.request('PATCH', endpoint, body);
    }

    delete(endpoint: string): Promise<ErpResponseBody> {
        return this.request('DELETE', endpoint);
    }

    // ============================================
    // RETRY LOGIC
    // ============================================

    async request(method: HttpMethod, endpoint: string, body?: unknown, query?: ErpQueryParams): Promise<ErpResponseBody> {
        let lastConnectionError: ConnectionError | null = null;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await this.execute(method, endpoint, body, query);
            } catch (error: unknown) {
                if (!isErpError(error)) throw error;

                switch (error.kind) {
                    case 'authentication': {
                        if (!error.retryable || attempt === this.maxAttempts) {
                            erpLogger.error({ method, endpoint, code: error.code, attempt }, 'ERP authentication failed');
                            throw error;
                        }
                        erpLogger.warn({ method, endpoint, code: error.code, attempt }, 'ERP session rejected, logging in again');
                        await this.session.refresh();
                        continue;
                    }
                    case 'connection': {
                        lastConnectionError = error instanceof ConnectionError ? error : toConnectionError(error, endpoint);
                        if (attempt < this.maxAttempts) {
                            const waitMs = 2 ** attempt * ERP_SYNC.client.connectionRetryBaseMs;
                            erpLogger.warn(
                                { method, endpoint, code: error.code, attempt, maxAttempts: this.maxAttempts, waitMs },
                                'ERP connection failed, retrying',
                            );
                            await this.sleep(waitMs);
                        }
                        continue;
                    }
                    default: {
                        erpLogger.warn({ method, endpoint, code: error.code, error: error.message }, 'ERP request rejected');
                        throw error;
                    }
                }
            }
        }

        erpLogger.error({ method, endpoint, attempts: this.maxAttempts }, 'ERP request failed after retries');
        throw new ConnectionError(
            `ERP request ${method} ${endpoint} failed after ${this.maxAttempts} attempts`,
            'MAX_RETRIES_EXCEEDED',
            { method, endpoint, attempts: this.maxAttempts, lastCode: lastConnectionError?.code ?? null },
            lastConnectionError ?? undefined,
        );
    }

    private async execute(method: HttpMethod, endpoint: string, body?: unknown, query?: ErpQueryParams): Promise<ErpResponseBody> {
        const session = await this.session.getSession();
        const startedAt = Date.now();

        erpLogger.debug({ method, endpoint, query, body }, 'ERP request');

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request({
                method,
                url: endpoint,
                data: body,
                params: query,
                headers: { Cookie: this.session.formatCookies(session) },
            });
        } catch (error: unknown) {
            throw toConnectionError(error, endpoint);
        }

        erpLogger.debug(
            { method, endpoint, status: response.status, durationMs: Date.now() - startedAt, response: response.data },
            'ERP response',
        );

        return this.handleResponse(response, endpoint);
    }

    private handleResponse(response: AxiosResponse<unknown>, endpoint: string): ErpResponseBody {
        const { status, data } = response;

        if (status === 204) return { success: true };
        if (status >= 200 && status < 300) return data;

        if (status === 401) {
            this.session.clearSession();
            throw new AuthenticationError('session-expired', 'ERP session expired', { endpoint, status });
        }
        if (status === 403) {
            throw new AuthenticationError('forbidden', 'Access forbidden', { endpoint, status });
        }
        if (status === 404) {
            const message = hasError(data) ? parseError(data).message : `Resource not found: ${endpoint}`;
            throw new ApiError(message, status, 'NOT_FOUND', data, { endpoint });
        }
        if (hasError(data)) {
            const info = parseError(data);
            throw new ApiError(info.message, status, info.code, data, { endpoint });
        }
        throw new ApiError(`Unexpected response status: ${status}`, status, 'UNEXPECTED_STATUS', data, { endpoint });
    }

    // ============================================
    // ITEMS (delegates to items module)
    // ============================================

    getItems(query?: ErpQueryParams): Promise<ParsedCollection> {
        return itemsFn.getItems(this, query);
    }

    getItem(itemCode: string, query?: ErpQueryParams): Promise<ErpRecord> {
        return itemsFn.getItem(this, itemCode, query);
    }

    updateItem(itemCode: string, data: ErpRecord): Promise<void> {
        return itemsFn.updateItem(this, itemCode, data);
    }

    // ============================================
    // ORDERS (delegates to orders module)
    // ============================================

    getOrders(query?: ErpQueryParams): Promise<ParsedCollection> {
        return ordersFn.getOrders(this, query);
    }

    getOrder(docEntry: number): Promise<ErpOrder> {
        return ordersFn.getOrder(this, docEntry);
    }

    createOrder(payload: ErpOrderPayload): Promise<ErpOrder> {
        return ordersFn.createOrder(this, payload);
    }

    cancelOrder(docEntry: number): Promise<void> {
        return ordersFn.cancelOrder(this, docEntry);
    }

    // ============================================
    // BUSINESS PARTNERS (delegates to businessPartners module)
    // ============================================

    getBusinessPartners(query?: ErpQueryParams): Promise<ParsedCollection> {
        return partnersFn.getBusinessPartners(this, query);
    }

    getBusinessPartner(cardCode: string): Promise<ErpBusinessPartner> {
        return partnersFn.getBusinessPartner(this, cardCode);
    }

    createBusinessPartner(payload: ErpBusinessPartnerPayload): Promise<ErpBusinessPartner> {
        return partnersFn.createBusinessPartner(this, payload);
    }

    updateBusinessPartner(cardCode: string, data: Partial<ErpBusinessPartnerPayload>): Promise<void> {
        return partnersFn.updateBusinessPartner(this, cardCode, data);
    }

    // ============================================
    // DIAGNOSTICS
    // ============================================

    /**
     * Log in and read one company-level record to prove the connection works
     */
    async testConnection(): Promise<ConnectionTestResult> {
        try {
            const session = await this.session.refresh();
            await this.get('Items', { $select: 'ItemCode', $top: 1 });
            return {
                success: true,
                message: 'Connection successful',
                companyDb: this.config.companyDb,
                sessionTimeoutMinutes: session.timeoutMinutes,
            };
        } catch (error: unknown) {
            const message = errorMessage(error);
            erpLogger.warn({ error: message }, 'ERP connection test failed');
            return {
                success: false,
                message,
                companyDb: null,
                sessionTimeoutMinutes: null,
            };
        }
    }
}
