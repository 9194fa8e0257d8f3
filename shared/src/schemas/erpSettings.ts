/**
 * ERP Sync Settings Schema
 *
 * Operator settings, stored as key/value pairs and resolved into one
 * immutable object. Out-of-range numbers are clamped rather than rejected so a
 * stale settings row never stops the engine from starting.
 */

import { z } from 'zod';

export const ERP_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'critical'] as const;

export const ERP_API_VERSIONS = ['v1', 'v2'] as const;

const clampedInt = (min: number, max: number, fallback: number) =>
    z.coerce
        .number()
        .catch(fallback)
        .transform((value) => (Number.isFinite(value) ? Math.min(max, Math.max(min, Math.trunc(value))) : fallback))
        .default(fallback);

const flag = (fallback: boolean) =>
    z
        .union([z.boolean(), z.string()])
        .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())))
        .default(fallback);

const optionalCode = z
    .string()
    .trim()
    .max(50)
    .nullish()
    .transform((value) => (value ? value : null));

export const erpSettingsSchema = z
    .object({
        serviceUrl: z.string().trim().url('Service URL must be a valid URL'),
        companyDb: z.string().trim().min(1, 'Company database is required').max(100),
        username: z.string().trim().min(1, 'Username is required').max(50),
        apiVersion: z.enum(ERP_API_VERSIONS).default('v1'),
        allowHttp: flag(false),
        stockSyncInterval: clampedInt(1, 1440, 5),
        autoSyncOrders: flag(true),
        autoCreateCustomers: flag(true),
        defaultCustomerCode: z.string().trim().min(1).max(50).default('WALKIN'),
        cardCodePrefix: z.string().trim().min(1).max(10).default('WC'),
        defaultWarehouse: optionalCode,
        defaultTaxCode: optionalCode,
        shippingItemCode: z.string().trim().min(1).max(50).default('SHIPPING'),
        logLevel: z.enum(ERP_LOG_LEVELS).catch('info').default('info'),
        logRetentionDays: clampedInt(1, 365, 30),
    })
    .superRefine((settings, ctx) => {
        if (!settings.allowHttp && !settings.serviceUrl.toLowerCase().startsWith('https://')) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['serviceUrl'],
                message: 'Service URL must use HTTPS',
            });
        }
    });

export type ErpSettingsInput = z.input<typeof erpSettingsSchema>;
export type ErpSettings = z.output<typeof erpSettingsSchema>;

/** Settings keys as stored in the settings table */
export const ERP_SETTING_KEYS = [
    'serviceUrl',
    'companyDb',
    'username',
    'apiVersion',
    'allowHttp',
    'stockSyncInterval',
    'autoSyncOrders',
    'autoCreateCustomers',
    'defaultCustomerCode',
    'cardCodePrefix',
    'defaultWarehouse',
    'defaultTaxCode',
    'shippingItemCode',
    'logLevel',
    'logRetentionDays',
] as const satisfies ReadonlyArray<keyof ErpSettingsInput>;

export type ErpSettingKey = (typeof ERP_SETTING_KEYS)[number];
