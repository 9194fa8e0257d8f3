/**
 * Axios plumbing shared by the session manager and the API client
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { ConnectionError } from '../../utils/errors.js';
import type { ErpConnectionConfig } from './types.js';

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'ECONNRESET']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);
const SSL_CODE_PATTERN = /CERT|SSL|TLS|SELF_SIGNED|UNABLE_TO_VERIFY/i;

export function buildBaseUrl(config: Pick<ErpConnectionConfig, 'serviceUrl' | 'apiVersion'>): string {
    return `${config.serviceUrl.replace(/\/+$/, '')}/b1s/${config.apiVersion}`;
}

/**
 * OData option names keep their `$`; values are percent-encoded so spaces
 * travel as %20.
 */
export function serializeODataParams(params: Record<string, unknown>): string {
    return Object.entries(params)
        .filter(([, value]) => value !== undefined && value !== null)
        .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
        .join('&');
}

/**
 * Status codes are classified by the caller, so every status resolves.
 */
export function createErpHttp(config: ErpConnectionConfig, adapter?: AxiosAdapter): AxiosInstance {
    return axios.create({
        baseURL: buildBaseUrl(config),
        timeout: config.requestTimeoutMs,
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        validateStatus: () => true,
        paramsSerializer: { serialize: serializeODataParams },
        ...(adapter ? { adapter } : {}),
    });
}

/**
 * Map a transport failure to a ConnectionError with a failure code
 */
export function toConnectionError(error: unknown, endpoint: string): ConnectionError {
    if (error instanceof ConnectionError) return error;

    if (axios.isAxiosError(error)) {
        const code = error.code ?? '';
        const context = { endpoint, errorCode: code || null };

        if (TIMEOUT_CODES.has(code)) {
            return new ConnectionError(`Request to ${endpoint} timed out`, 'TIMEOUT', context, error);
        }
        if (SSL_CODE_PATTERN.test(code)) {
            return new ConnectionError(`TLS handshake with the ERP failed: ${error.message}`, 'SSL_ERROR', context, error);
        }
        if (UNREACHABLE_CODES.has(code)) {
            return new ConnectionError(`ERP host unreachable: ${error.message}`, 'UNREACHABLE', context, error);
        }
        return new ConnectionError(`Request to ${endpoint} failed: ${error.message}`, 'CONNECTION_FAILED', context, error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ConnectionError(`Request to ${endpoint} failed: ${message}`, 'CONNECTION_FAILED', { endpoint }, error);
}

/**
 * Wrap an entity key for a path segment: strings are single-quoted with
 * embedded quotes doubled, integers stay bare.
 *
 * @example
 * entityPath('Items', "A'1") // "Items('A''1')"
 * entityPath('Orders', 12)   // 'Orders(12)'
 */
export function entityPath(entity: string, key: string | number): string {
    if (typeof key === 'number') return `${entity}(${Math.trunc(key)})`;
    return `${entity}('${encodeURIComponent(key.replace(/'/g, "''"))}')`;
}
