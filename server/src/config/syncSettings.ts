/**
 * Resolved sync settings
 *
 * Stored settings win over env values. The result is frozen and handed to
 * each component's constructor; nothing reads settings ambiently.
 */

import { ERP_SETTING_KEYS, erpSettingsSchema, type ErpSettings, type ErpSettingsInput } from '@erpsync/shared/schemas';
import type { SettingsRepository } from '../db/repositories/types.js';
import type { ErpConnectionConfig } from '../services/erp/types.js';
import { ValidationError } from '../utils/errors.js';
import type { Env } from './env.js';

export type SyncSettings = Readonly<ErpSettings & { requestTimeoutMs: number }>;

export type SettingsEnv = Pick<
    Env,
    'ERP_SERVICE_URL' | 'ERP_COMPANY_DB' | 'ERP_USERNAME' | 'ERP_API_VERSION' | 'ERP_ALLOW_HTTP' | 'ERP_REQUEST_TIMEOUT_MS'
>;

function envDefaults(env: SettingsEnv): Record<string, unknown> {
    return {
        serviceUrl: env.ERP_SERVICE_URL,
        companyDb: env.ERP_COMPANY_DB,
        username: env.ERP_USERNAME,
        apiVersion: env.ERP_API_VERSION,
        allowHttp: env.ERP_ALLOW_HTTP,
    };
}

export function resolveSyncSettings(stored: Record<string, string>, env: SettingsEnv): SyncSettings {
    const input: Record<string, unknown> = envDefaults(env);
    for (const key of ERP_SETTING_KEYS) {
        const value = stored[key];
        if (value !== undefined && value !== '') input[key] = value;
    }

    const result = erpSettingsSchema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(
            'Invalid ERP sync settings',
            result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        );
    }

    return Object.freeze({ ...result.data, requestTimeoutMs: env.ERP_REQUEST_TIMEOUT_MS });
}

export async function loadSyncSettings(settings: SettingsRepository, env: SettingsEnv): Promise<SyncSettings> {
    return resolveSyncSettings(await settings.getAll(), env);
}

/** Persist operator settings after validating them as a whole */
export async function saveSyncSettings(settings: SettingsRepository, input: ErpSettingsInput): Promise<ErpSettings> {
    const parsed = erpSettingsSchema.parse(input);
    for (const key of ERP_SETTING_KEYS) {
        const value = parsed[key];
        await settings.set(key, value === null ? '' : String(value));
    }
    return parsed;
}

export function toConnectionConfig(settings: SyncSettings): ErpConnectionConfig {
    return {
        serviceUrl: settings.serviceUrl,
        companyDb: settings.companyDb,
        username: settings.username,
        apiVersion: settings.apiVersion,
        requestTimeoutMs: settings.requestTimeoutMs,
    };
}
