/**
 * ERP Formatting Helpers
 *
 * Pure conversions between storefront values and the literal formats the ERP
 * accepts (dates, prices, item codes, partner codes).
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/** Characters the ERP accepts in an item code */
const ITEM_CODE_DISALLOWED = /[^a-zA-Z0-9\-_.]/g;

/** `/Date(1700000000000)/` style timestamps emitted by older service versions */
const LEGACY_DATE_PATTERN = /^\/Date\((-?\d+)\)\/$/;

/**
 * Format a date as `YYYY-MM-DD` (UTC calendar day)
 */
export function formatDateForErp(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Parse an ERP date value. Accepts ISO strings and the legacy
 * `/Date(ms)/` form; anything unparseable yields null.
 */
export function parseDateFromErp(value: unknown): Date | null {
    if (typeof value !== 'string' || value.trim() === '') return null;

    const legacy = LEGACY_DATE_PATTERN.exec(value.trim());
    if (legacy?.[1]) {
        return new Date(Number(legacy[1]));
    }

    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Round to a fixed number of decimals
 *
 * @example
 * roundTo(12.34567, 4) // 12.3457
 */
export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/** Prices are sent with 4 decimals */
export function formatPriceForErp(value: number): number {
    return roundTo(value, 4);
}

/**
 * Strip characters the ERP rejects in item codes
 *
 * @example
 * sanitizeItemCode('TEE #42/blue') // 'TEE42blue'
 */
export function sanitizeItemCode(sku: string): string {
    return sku.trim().replace(ITEM_CODE_DISALLOWED, '');
}

/**
 * Deterministic business partner code: prefix + id zero-padded to 6 digits.
 * Ids of 7+ digits are kept whole.
 *
 * @example
 * generateCardCode('WC', 42) // 'WC000042'
 */
export function generateCardCode(prefix: string, localId: number): string {
    return `${prefix}${String(Math.trunc(localId)).padStart(6, '0')}`;
}

/**
 * Mask all but the last few characters of a secret for logging
 */
export function maskSensitive(value: string, visible = 4): string {
    if (value.length <= visible) return '*'.repeat(value.length);
    return '*'.repeat(value.length - visible) + value.slice(-visible);
}
