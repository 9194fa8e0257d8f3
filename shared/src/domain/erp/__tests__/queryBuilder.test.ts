/**
 * Unit tests for the ERP OData query builder
 */

import { ErpQueryBuilder, formatODataLiteral, quoteODataString } from '../queryBuilder.js';

describe('formatODataLiteral', () => {
    it('quotes strings and doubles embedded quotes', () => {
        expect(quoteODataString("O'Brien")).toBe("'O''Brien'");
        expect(formatODataLiteral("it''s")).toBe("'it''''s'");
    });

    it('renders numbers, booleans and null bare', () => {
        expect(formatODataLiteral(42)).toBe('42');
        expect(formatODataLiteral(1.5)).toBe('1.5');
        expect(formatODataLiteral(true)).toBe('true');
        expect(formatODataLiteral(false)).toBe('false');
        expect(formatODataLiteral(null)).toBe('null');
    });

    it('renders dates as bare calendar days', () => {
        expect(formatODataLiteral(new Date('2024-03-05T10:00:00Z'))).toBe('2024-03-05');
    });
});

describe('ErpQueryBuilder', () => {
    it('returns an empty map when nothing was accumulated', () => {
        expect(new ErpQueryBuilder().build()).toEqual({});
    });

    it('escapes quotes in equality filters', () => {
        const params = new ErpQueryBuilder().whereEquals('CardCode', "O'Brien").build();
        expect(params.$filter).toBe("CardCode eq 'O''Brien'");
    });

    it('joins filters with and', () => {
        const params = new ErpQueryBuilder()
            .whereEquals('EmailAddress', 'a@example.com')
            .whereEquals('CardType', 'cCustomer')
            .whereGreaterThan('Balance', 100)
            .build();
        expect(params.$filter).toBe("EmailAddress eq 'a@example.com' and CardType eq 'cCustomer' and Balance gt 100");
    });

    it('supports every comparison operator', () => {
        const params = new ErpQueryBuilder()
            .whereNotEquals('A', 1)
            .whereGreaterOrEqual('B', 2)
            .whereLessThan('C', 3)
            .whereLessOrEqual('D', 4)
            .build();
        expect(params.$filter).toBe('A ne 1 and B ge 2 and C lt 3 and D le 4');
    });

    it('renders string functions', () => {
        const params = new ErpQueryBuilder()
            .whereContains('ItemName', 'shirt')
            .whereStartsWith('ItemCode', 'TS')
            .whereEndsWith('ItemCode', "'X")
            .build();
        expect(params.$filter).toBe("contains(ItemName, 'shirt') and startswith(ItemCode, 'TS') and endswith(ItemCode, '''X')");
    });

    it('expands whereIn into an OR group', () => {
        const params = new ErpQueryBuilder().whereIn('ItemCode', ['A1', 'B2', 'C3']).build();
        expect(params.$filter).toBe("(ItemCode eq 'A1' or ItemCode eq 'B2' or ItemCode eq 'C3')");
    });

    it('ignores whereIn with no values', () => {
        expect(new ErpQueryBuilder().whereIn('ItemCode', []).build()).toEqual({});
    });

    it('deduplicates select and expand', () => {
        const params = new ErpQueryBuilder()
            .select('ItemCode', 'ItemName')
            .select('ItemCode')
            .expand('DocumentLines', 'DocumentLines')
            .build();
        expect(params.$select).toBe('ItemCode,ItemName');
        expect(params.$expand).toBe('DocumentLines');
    });

    it('renders order-by clauses in call order', () => {
        const params = new ErpQueryBuilder().orderBy('DocDate').orderByDesc('DocEntry').build();
        expect(params.$orderby).toBe('DocDate asc,DocEntry desc');
    });

    it('derives skip from paginate', () => {
        expect(new ErpQueryBuilder().paginate(3, 25).build()).toEqual({ $top: 25, $skip: 50 });
        expect(new ErpQueryBuilder().paginate(1).build()).toEqual({ $top: 20 });
        expect(new ErpQueryBuilder().paginate(0, 10).build()).toEqual({ $top: 10 });
    });

    it('lets the last pagination call win', () => {
        const params = new ErpQueryBuilder().paginate(2, 10).limit(5).offset(7).build();
        expect(params).toEqual({ $top: 5, $skip: 7 });
    });

    it('adds $count when requested', () => {
        expect(new ErpQueryBuilder().withCount().build()).toEqual({ $count: 'true' });
    });

    it('appends raw expressions and resets state', () => {
        const builder = new ErpQueryBuilder().whereRaw("U_Channel eq 'web'").limit(1);
        expect(builder.build()).toEqual({ $filter: "U_Channel eq 'web'", $top: 1 });
        expect(builder.reset().build()).toEqual({});
    });
});
