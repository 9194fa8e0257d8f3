/**
 * ERP Session Manager
 *
 * Logs in to the Service Layer and caches the B1SESSION/ROUTEID cookie pair
 * until shortly before the ERP-reported timeout. Concurrent callers share one
 * in-flight login instead of racing their own.
 */

import crypto from 'crypto';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { isRecord, parseError } from '@erpsync/shared/domain';
import { ERP_SYNC } from '../../config/sync/erp.js';
import { AuthenticationError, type AuthFailureReason } from '../../utils/errors.js';
import { sessionLogger } from '../../utils/logger.js';
import { TtlCache, systemClock, type Clock } from '../../utils/ttlCache.js';
import { createErpHttp, toConnectionError } from './http.js';
import type { ErpConnectionConfig, ErpSession, ErpTransportOptions, SecretProvider } from './types.js';

const MINUTE_MS = 60_000;

export interface SessionManagerDeps extends ErpTransportOptions {
    config: ErpConnectionConfig;
    secrets: SecretProvider;
    clock?: Clock;
    /** Share a cache between managers of the same process */
    cache?: TtlCache<ErpSession>;
}

// ============================================
// COOKIE HELPERS
// ============================================

/**
 * Read name/value pairs from `set-cookie` header values, ignoring attributes
 */
export function parseSetCookie(header: unknown): Record<string, string> {
    const lines = Array.isArray(header) ? header : typeof header === 'string' ? [header] : [];
    const cookies: Record<string, string> = {};

    for (const line of lines) {
        if (typeof line !== 'string') continue;
        const pair = line.split(';', 1)[0] ?? '';
        const eq = pair.indexOf('=');
        if (eq <= 0) continue;
        cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
    }
    return cookies;
}

/** Cache TTL: reported timeout minus the safety buffer, never below the minimum */
export function sessionTtlMinutes(timeoutMinutes: number): number {
    return Math.max(ERP_SYNC.session.minTtlMinutes, timeoutMinutes - ERP_SYNC.session.bufferMinutes);
}

function classifyLoginFailure(message: string): AuthFailureReason {
    const lower = message.toLowerCase();
    if (lower.includes('license')) return 'license-exhausted';
    if (lower.includes('company')) return 'company-not-found';
    return 'login-failed';
}

// ============================================
// SESSION MANAGER
// ============================================

export class ErpSessionManager {
    private readonly config: ErpConnectionConfig;
    private readonly secrets: SecretProvider;
    private readonly http: AxiosInstance;
    private readonly clock: Clock;
    private readonly cache: TtlCache<ErpSession>;
    private readonly cacheKey: string;
    private pendingLogin: Promise<ErpSession> | null = null;

    constructor(deps: SessionManagerDeps) {
        this.config = deps.config;
        this.secrets = deps.secrets;
        this.clock = deps.clock ?? systemClock;
        this.cache = deps.cache ?? new TtlCache<ErpSession>(this.clock);
        this.http = createErpHttp(deps.config, deps.adapter);
        this.cacheKey = crypto
            .createHash('sha256')
            .update(`${deps.config.serviceUrl}${deps.config.companyDb}${deps.config.username}`)
            .digest('hex');
    }

    /**
     * Cached session, or a new login. Waits for a login already in flight.
     */
    async getSession(): Promise<ErpSession> {
        const cached = this.cache.get(this.cacheKey);
        if (cached) return cached;
        return this.login();
    }

    /**
     * Authenticate and overwrite the cache. Calls made while a login is in
     * flight join that login.
     */
    login(): Promise<ErpSession> {
        if (this.pendingLogin) return this.pendingLogin;

        const attempt = this.performLogin().finally(() => {
            this.pendingLogin = null;
        });
        this.pendingLogin = attempt;
        return attempt;
    }

    /** Drop the cached session and log in again */
    refresh(): Promise<ErpSession> {
        sessionLogger.info({ companyDb: this.config.companyDb }, 'Refreshing ERP session');
        this.cache.delete(this.cacheKey);
        return this.login();
    }

    /**
     * Best-effort server-side logout. The local cache is cleared whatever
     * the outcome; returns whether the ERP acknowledged the logout.
     */
    async logout(): Promise<boolean> {
        const session = this.cache.get(this.cacheKey);
        this.cache.delete(this.cacheKey);
        if (!session) return true;

        try {
            const response = await this.http.post('Logout', null, {
                headers: { Cookie: this.formatCookies(session) },
                timeout: ERP_SYNC.session.logoutTimeoutMs,
            });
            return response.status < 400;
        } catch (error: unknown) {
            sessionLogger.warn(
                { error: error instanceof Error ? error.message : String(error) },
                'ERP logout failed, local session cleared',
            );
            return false;
        }
    }

    hasCachedSession(): boolean {
        return this.cache.has(this.cacheKey);
    }

    clearSession(): void {
        this.cache.delete(this.cacheKey);
    }

    /** Cookie header value: `B1SESSION=...; ROUTEID=...` */
    formatCookies(session: ErpSession): string {
        const cookies = [`B1SESSION=${session.sessionId}`];
        if (session.routeId) cookies.push(`ROUTEID=${session.routeId}`);
        return cookies.join('; ');
    }

    // ============================================
    // LOGIN
    // ============================================

    private async performLogin(): Promise<ErpSession> {
        const password = await this.secrets.getErpPassword();

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post(
                'Login',
                { CompanyDB: this.config.companyDb, UserName: this.config.username, Password: password },
                { timeout: ERP_SYNC.session.loginTimeoutMs },
            );
        } catch (error: unknown) {
            const connectionError = toConnectionError(error, 'Login');
            sessionLogger.error({ code: connectionError.code, error: connectionError.message }, 'ERP login request failed');
            throw connectionError;
        }

        const context = { status: response.status, companyDb: this.config.companyDb, username: this.config.username };

        if (response.status === 401 || response.status === 403) {
            sessionLogger.error(context, 'ERP rejected credentials');
            throw new AuthenticationError('invalid-credentials', 'Invalid ERP credentials', context);
        }

        if (response.status >= 400) {
            const info = parseError(response.data);
            sessionLogger.error({ ...context, erpCode: info.code, error: info.message }, 'ERP login failed');
            throw new AuthenticationError(classifyLoginFailure(info.message), `ERP login failed: ${info.message}`, context);
        }

        const cookies = parseSetCookie(response.headers['set-cookie']);
        const body = isRecord(response.data) ? response.data : {};
        const sessionId = cookies.B1SESSION ?? (typeof body.SessionId === 'string' ? body.SessionId : null);

        if (!sessionId) {
            sessionLogger.error(context, 'ERP login response carried no session cookie');
            throw new AuthenticationError('malformed-response', 'ERP login response did not include a session', context);
        }

        const reported = Number(body.SessionTimeout);
        const timeoutMinutes = Number.isFinite(reported) && reported > 0
            ? reported
            : ERP_SYNC.session.defaultTimeoutMinutes;

        const ttlMs = sessionTtlMinutes(timeoutMinutes) * MINUTE_MS;
        const now = this.clock();
        const session: ErpSession = {
            sessionId,
            routeId: cookies.ROUTEID ?? null,
            timeoutMinutes,
            createdAt: now,
            expiresAt: now + ttlMs,
        };

        this.cache.set(this.cacheKey, session, ttlMs);
        sessionLogger.info({ companyDb: this.config.companyDb, timeoutMinutes }, 'ERP session established');
        return session;
    }
}
