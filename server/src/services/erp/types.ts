import type { AxiosAdapter } from 'axios';
import type { ErpQueryParams } from '@erpsync/shared/domain';

// ============================================
// CONNECTION & SESSION
// ============================================

export interface ErpConnectionConfig {
    /** Service Layer root, e.g. https://erp.example.com:50000 */
    serviceUrl: string;
    companyDb: string;
    username: string;
    apiVersion: 'v1' | 'v2';
    requestTimeoutMs: number;
}

export interface ErpSession {
    /** B1SESSION cookie value */
    sessionId: string;
    /** ROUTEID cookie value (load balancer affinity), when the ERP sent one */
    routeId: string | null;
    /** Session timeout reported by the ERP, in minutes */
    timeoutMinutes: number;
    createdAt: number;
    expiresAt: number;
}

/** Source of the ERP password; the engine never stores it in plaintext */
export interface SecretProvider {
    getErpPassword(): Promise<string>;
}

/** Overrides for wiring tests or alternative transports */
export interface ErpTransportOptions {
    adapter?: AxiosAdapter;
}

// ============================================
// CLIENT
// ============================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** 2xx body, or `{ success: true }` for 204 */
export type ErpResponseBody = unknown;

export interface ErpRequester {
    get(endpoint: string, query?: ErpQueryParams): Promise<ErpResponseBody>;
    post(endpoint: string, body?: unknown, query?: ErpQueryParams): Promise<ErpResponseBody>;
    patch(endpoint: string, body: unknown): Promise<ErpResponseBody>;
    delete(endpoint: string): Promise<ErpResponseBody>;
}

export interface ConnectionTestResult {
    success: boolean;
    message: string;
    companyDb: string | null;
    sessionTimeoutMinutes: number | null;
}
