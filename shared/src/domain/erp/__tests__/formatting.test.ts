/**
 * Unit tests for ERP formatting helpers
 */

import {
    addDays,
    formatDateForErp,
    formatPriceForErp,
    generateCardCode,
    maskSensitive,
    parseDateFromErp,
    sanitizeItemCode,
} from '../formatting.js';

describe('formatDateForErp', () => {
    it('renders the UTC calendar day', () => {
        expect(formatDateForErp(new Date('2024-12-31T23:30:00Z'))).toBe('2024-12-31');
        expect(formatDateForErp(addDays(new Date('2024-12-28T00:00:00Z'), 7))).toBe('2025-01-04');
    });
});

describe('parseDateFromErp', () => {
    it('reads ISO and legacy forms', () => {
        expect(parseDateFromErp('2024-01-15T00:00:00Z')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
        expect(parseDateFromErp('/Date(86400000)/')?.toISOString()).toBe('1970-01-02T00:00:00.000Z');
    });

    it('returns null for unusable values', () => {
        expect(parseDateFromErp('')).toBeNull();
        expect(parseDateFromErp('not a date')).toBeNull();
        expect(parseDateFromErp(12)).toBeNull();
    });
});

describe('formatPriceForErp', () => {
    it('rounds to four decimals', () => {
        expect(formatPriceForErp(33.333333)).toBe(33.3333);
        expect(formatPriceForErp(10)).toBe(10);
    });
});

describe('sanitizeItemCode', () => {
    it('keeps letters, digits, dash, underscore and dot', () => {
        expect(sanitizeItemCode('TEE #42/blue')).toBe('TEE42blue');
        expect(sanitizeItemCode(' A-1_b.2 ')).toBe('A-1_b.2');
    });
});

describe('generateCardCode', () => {
    it('zero-pads ids to six digits', () => {
        expect(generateCardCode('WC', 42)).toBe('WC000042');
        expect(generateCardCode('WC', 999999)).toBe('WC999999');
    });

    it('keeps ids beyond six digits whole', () => {
        expect(generateCardCode('WC', 1234567)).toBe('WC1234567');
    });
});

describe('maskSensitive', () => {
    it('keeps only the tail visible', () => {
        expect(maskSensitive('test-secret')).toBe('*******cret');
        expect(maskSensitive('abc')).toBe('***');
    });
});
