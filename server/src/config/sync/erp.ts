/**
 * ERP Sync Configuration
 *
 * Timeouts, retry budgets and batch sizes for talking to the ERP and for
 * the background job queue.
 *
 * TO CHANGE ERP SYNC SETTINGS:
 * Update the values below. Operator-facing settings (intervals, default
 * codes) live in the settings table instead.
 */

// ============================================
// SESSION
// ============================================

/**
 * Minutes subtracted from the ERP-reported session timeout before the
 * cached session is considered expired
 */
export const ERP_SESSION_BUFFER_MINUTES = 5;

/** Used when the login response carries no SessionTimeout */
export const ERP_DEFAULT_SESSION_TIMEOUT_MINUTES = 30;

/** Lower bound on the cache TTL */
export const ERP_MIN_SESSION_TTL_MINUTES = 1;

export const ERP_LOGIN_TIMEOUT_MS = 30_000;

export const ERP_LOGOUT_TIMEOUT_MS = 10_000;

// ============================================
// API CLIENT
// ============================================

export const ERP_DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/** Attempts per request, including the first one */
export const ERP_CLIENT_MAX_ATTEMPTS = 3;

/** Connection retry delay is 2^attempt × this */
export const ERP_CONNECTION_RETRY_BASE_MS = 1_000;

// ============================================
// STOCK SYNC
// ============================================

/** Item codes per ERP query during a full stock sync */
export const ERP_STOCK_BATCH_SIZE = 50;

/** Stock differences below this are not written back */
export const ERP_STOCK_EPSILON = 0.001;

// ============================================
// JOB QUEUE
// ============================================

export const ERP_JOB_GROUPS = {
    orders: 'erp-sync-orders',
    stock: 'erp-sync-stock',
    products: 'erp-sync-products',
} as const;

export type ErpJobGroup = (typeof ERP_JOB_GROUPS)[keyof typeof ERP_JOB_GROUPS];

/** Failed attempts before a job is dead-lettered */
export const ERP_JOB_MAX_ATTEMPTS = 5;

/** Job retry delay is 2^attempts × this */
export const ERP_JOB_BACKOFF_BASE_MS = 60_000;

/**
 * Dead-letter cycles after which manual retry is refused.
 * One cycle is ERP_JOB_MAX_ATTEMPTS attempts.
 */
export const ERP_JOB_MAX_DEAD_LETTER_CYCLES = 3;

/** Default page size when listing dead-letter entries */
export const ERP_FAILED_JOBS_PAGE_SIZE = 50;

/**
 * A claimed job whose lease is not renewed within this window is claimable
 * again (its worker is assumed dead)
 */
export const ERP_JOB_LEASE_MS = 15 * 60_000;

/** How often a worker renews the lease of the job it is running */
export const ERP_JOB_HEARTBEAT_MS = 5 * 60_000;

/** Jobs run per worker poll; each is claimed just before it runs */
export const ERP_WORKER_BATCH_SIZE = 10;

// ============================================
// HOUSEKEEPING
// ============================================

/** How often old sync log entries are pruned */
export const ERP_HOUSEKEEPING_INTERVAL_MS = 24 * 60 * 60_000;

/** First housekeeping run after startup */
export const ERP_HOUSEKEEPING_STARTUP_DELAY_MS = 30_000;

// ============================================
// CONSOLIDATED CONFIG OBJECT
// ============================================

export const ERP_SYNC = {
    session: {
        bufferMinutes: ERP_SESSION_BUFFER_MINUTES,
        defaultTimeoutMinutes: ERP_DEFAULT_SESSION_TIMEOUT_MINUTES,
        minTtlMinutes: ERP_MIN_SESSION_TTL_MINUTES,
        loginTimeoutMs: ERP_LOGIN_TIMEOUT_MS,
        logoutTimeoutMs: ERP_LOGOUT_TIMEOUT_MS,
    },
    client: {
        requestTimeoutMs: ERP_DEFAULT_REQUEST_TIMEOUT_MS,
        maxAttempts: ERP_CLIENT_MAX_ATTEMPTS,
        connectionRetryBaseMs: ERP_CONNECTION_RETRY_BASE_MS,
    },
    stock: {
        batchSize: ERP_STOCK_BATCH_SIZE,
        epsilon: ERP_STOCK_EPSILON,
    },
    queue: {
        groups: ERP_JOB_GROUPS,
        maxAttempts: ERP_JOB_MAX_ATTEMPTS,
        backoffBaseMs: ERP_JOB_BACKOFF_BASE_MS,
        maxDeadLetterCycles: ERP_JOB_MAX_DEAD_LETTER_CYCLES,
        failedJobsPageSize: ERP_FAILED_JOBS_PAGE_SIZE,
        leaseMs: ERP_JOB_LEASE_MS,
        heartbeatMs: ERP_JOB_HEARTBEAT_MS,
        workerBatchSize: ERP_WORKER_BATCH_SIZE,
    },
    housekeeping: {
        intervalMs: ERP_HOUSEKEEPING_INTERVAL_MS,
        startupDelayMs: ERP_HOUSEKEEPING_STARTUP_DELAY_MS,
    },
} as const;
