/**
 * Centralized Environment Variable Validation
 *
 * Validates process environment at startup using Zod. ERP connection values
 * here are fallbacks; settings stored in the database take precedence.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 * - Tests call `parseEnv(source)` with their own record instead
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const booleanFlag = z.enum(['true', 'false']).default('false').transform((value) => value === 'true');

export const envSchema = z.object({
    // ----------------------------------------
    // SERVER
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Admin API port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** Pino log level */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    /** Error reporting; disabled when unset */
    SENTRY_DSN: z.string().url().optional(),

    /** PostgreSQL connection string. Without it the engine runs on in-memory stores */
    DATABASE_URL: z.string().optional(),

    // ----------------------------------------
    // ERP CONNECTION (fallbacks for stored settings)
    // ----------------------------------------

    /** Service Layer base URL, e.g. https://erp.example.com:50000 */
    ERP_SERVICE_URL: z.string().optional(),

    /** Company database name */
    ERP_COMPANY_DB: z.string().optional(),

    ERP_USERNAME: z.string().optional(),

    ERP_PASSWORD: z.string().optional(),

    /** Service Layer API version path segment */
    ERP_API_VERSION: z.enum(['v1', 'v2']).default('v1'),

    /** Per-request timeout for regular API calls */
    ERP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    /** Permit plain-http service URLs (local test servers only) */
    ERP_ALLOW_HTTP: booleanFlag,

    /** Secret used to encrypt the stored ERP password */
    ERP_ENCRYPTION_KEY: z.string().optional(),

    // ----------------------------------------
    // STOREFRONT
    // ----------------------------------------

    /** Storefront base URL; without it orders and products come from memory */
    STOREFRONT_URL: z.string().url().optional(),

    STOREFRONT_CONSUMER_KEY: z.string().optional(),

    STOREFRONT_CONSUMER_SECRET: z.string().optional(),

    /** HMAC secret of incoming storefront webhooks */
    STOREFRONT_WEBHOOK_SECRET: z.string().optional(),

    // ----------------------------------------
    // ADMIN API
    // ----------------------------------------

    /** Verifies admin bearer tokens; the admin routes stay unmounted without it */
    JWT_SECRET: z.string().min(1).optional(),

    // ----------------------------------------
    // WORKERS
    // ----------------------------------------

    /** Disable background workers (admin API only) */
    DISABLE_BACKGROUND_WORKERS: booleanFlag,

    /** How often the sync worker polls for due jobs */
    WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse an environment record. Throws an Error listing every failing
 * variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);
    if (result.success) return result.data;

    const issues = result.error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
    throw new Error('Environment validation failed:\n' + issues);
}

export const env = parseEnv();
