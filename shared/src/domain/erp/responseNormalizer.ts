/**
 * ERP Response Normalizer
 *
 * Pure functions turning raw ERP JSON into typed value objects.
 * OData metadata keys are read in v3 spelling first (`odata.count`),
 * then v4 (`@odata.count`).
 */

import type {
    ErpBusinessPartner,
    ErpDocumentLine,
    ErpErrorInfo,
    ErpOrder,
    ErpRecord,
    ItemStock,
    ParsedCollection,
    WarehouseStock,
} from './types.js';

const UNKNOWN_ERROR: ErpErrorInfo = { code: 'UNKNOWN', message: 'Unknown error occurred.' };

const TRUTHY_TOKENS = new Set(['TYES', 'Y', 'YES', '1', 'TRUE']);

const STRIPPED_METADATA_KEYS = ['@odata.context', '@odata.etag', 'odata.metadata'] as const;

// ============================================
// COERCION HELPERS
// ============================================

export function isRecord(value: unknown): value is ErpRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
    if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number.parseFloat(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

function toIntOrNull(value: unknown): number | null {
    if (value === null || value === undefined || value === '') return null;
    const parsed = Math.trunc(toNumber(value));
    return Number.isFinite(parsed) ? parsed : null;
}

function toStringOrNull(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

function records(value: unknown): ErpRecord[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

// ============================================
// GENERIC PARSERS
// ============================================

export function parseCollection(raw: unknown): ParsedCollection {
    if (!isRecord(raw)) return { items: [], count: null, nextLink: null };

    const countValue = raw['odata.count'] ?? raw['@odata.count'];
    const nextLink = raw['odata.nextLink'] ?? raw['@odata.nextLink'];

    return {
        items: records(raw.value),
        count: countValue === undefined ? null : toIntOrNull(countValue),
        nextLink: typeof nextLink === 'string' ? nextLink : null,
    };
}

/** Copy of the entity without transport metadata keys */
export function parseEntity(raw: unknown): ErpRecord {
    if (!isRecord(raw)) return {};
    const entity: ErpRecord = { ...raw };
    for (const key of STRIPPED_METADATA_KEYS) {
        delete entity[key];
    }
    return entity;
}

export function hasError(raw: unknown): boolean {
    return isRecord(raw) && isRecord(raw.error);
}

/**
 * Extract `{code, message}` from either error convention:
 * `{error: {code, message: {lang, value}}}` or `{error: {code, message: "..."}}`
 */
export function parseError(raw: unknown): ErpErrorInfo {
    if (!isRecord(raw) || !isRecord(raw.error)) return { ...UNKNOWN_ERROR };

    const { code, message } = raw.error;
    const codeText = toStringOrNull(code) ?? UNKNOWN_ERROR.code;

    if (isRecord(message) && typeof message.value === 'string') {
        return { code: codeText, message: message.value };
    }
    if (typeof message === 'string') {
        return { code: codeText, message };
    }
    return { ...UNKNOWN_ERROR };
}

/**
 * Case-insensitive truthy tokens: tYES, Y, YES, 1, TRUE.
 * Actual booleans pass through.
 */
export function normalizeBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    const text = toStringOrNull(value);
    return text !== null && TRUTHY_TOKENS.has(text.trim().toUpperCase());
}

// ============================================
// ENTITY PARSERS
// ============================================

export function parseItemStock(raw: unknown): ItemStock {
    const item = isRecord(raw) ? raw : {};
    const byWarehouse: Record<string, WarehouseStock> = {};

    for (const entry of records(item.ItemWarehouseInfoCollection)) {
        const code = toStringOrNull(entry.WarehouseCode);
        if (!code) continue;

        const inStock = toNumber(entry.InStock);
        const committed = toNumber(entry.Committed);
        byWarehouse[code] = { inStock, committed, available: inStock - committed };
    }

    return {
        itemCode: toStringOrNull(item.ItemCode),
        total: toNumber(item.QuantityOnStock),
        byWarehouse,
    };
}

export function parseDocumentLines(raw: unknown): ErpDocumentLine[] {
    return records(raw).map((line) => ({
        lineNum: toIntOrNull(line.LineNum) ?? 0,
        itemCode: toStringOrNull(line.ItemCode),
        description: toStringOrNull(line.ItemDescription),
        quantity: toNumber(line.Quantity),
        unitPrice: toNumber(line.UnitPrice),
        lineTotal: toNumber(line.LineTotal),
        warehouseCode: toStringOrNull(line.WarehouseCode),
        taxCode: toStringOrNull(line.TaxCode),
    }));
}

export function parseOrder(raw: unknown): ErpOrder {
    const doc = isRecord(raw) ? raw : {};
    return {
        docEntry: toIntOrNull(doc.DocEntry),
        docNum: toIntOrNull(doc.DocNum),
        status: toStringOrNull(doc.DocumentStatus),
        docDate: toStringOrNull(doc.DocDate),
        dueDate: toStringOrNull(doc.DocDueDate),
        cardCode: toStringOrNull(doc.CardCode),
        cardName: toStringOrNull(doc.CardName),
        total: toNumber(doc.DocTotal),
        currency: toStringOrNull(doc.DocCurrency),
        lines: parseDocumentLines(doc.DocumentLines),
        comments: toStringOrNull(doc.Comments),
    };
}

export function parseBusinessPartner(raw: unknown): ErpBusinessPartner {
    const bp = isRecord(raw) ? raw : {};
    return {
        cardCode: toStringOrNull(bp.CardCode),
        cardName: toStringOrNull(bp.CardName),
        cardType: toStringOrNull(bp.CardType),
        email: toStringOrNull(bp.EmailAddress),
        phone: toStringOrNull(bp.Phone1),
        address: toStringOrNull(bp.Address),
        city: toStringOrNull(bp.City),
        country: toStringOrNull(bp.Country),
        zipCode: toStringOrNull(bp.ZipCode),
        valid: normalizeBoolean(bp.Valid ?? 'tYES'),
    };
}
