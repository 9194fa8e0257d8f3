/**
 * ERP Query Builder
 *
 * Accumulates OData query options ($select, $filter, $expand, $orderby,
 * $top, $skip, $count) and renders them into a flat parameter map.
 *
 * Only string literals are quoted (embedded quotes doubled). Numbers,
 * booleans and null are rendered bare, dates as a bare `YYYY-MM-DD`.
 *
 * @example
 * const params = new ErpQueryBuilder()
 *     .select('ItemCode', 'QuantityOnStock')
 *     .whereIn('ItemCode', ['A1', 'B2'])
 *     .limit(50)
 *     .build();
 * // { $select: 'ItemCode,QuantityOnStock', $filter: "(ItemCode eq 'A1' or ItemCode eq 'B2')", $top: 50 }
 */

import { formatDateForErp } from './formatting.js';

// ============================================
// TYPES
// ============================================

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export type SortDirection = 'asc' | 'desc';

export type ODataLiteral = string | number | boolean | Date | null;

/** Rendered query options, ready to pass as request params */
export interface ErpQueryParams {
    $select?: string;
    $filter?: string;
    $expand?: string;
    $orderby?: string;
    $top?: number;
    $skip?: number;
    $count?: 'true';
}

const DEFAULT_PER_PAGE = 20;

// ============================================
// LITERALS
// ============================================

/**
 * Quote a string literal, doubling embedded single quotes
 *
 * @example
 * quoteODataString("O'Brien") // "'O''Brien'"
 */
export function quoteODataString(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

export function formatODataLiteral(value: ODataLiteral): string {
    if (value === null) return 'null';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'number') return String(value);
    if (value instanceof Date) return formatDateForErp(value);
    return quoteODataString(value);
}

// ============================================
// BUILDER
// ============================================

export class ErpQueryBuilder {
    private selectFields: string[] = [];
    private filters: string[] = [];
    private expandRelations: string[] = [];
    private orderClauses: string[] = [];
    private top: number | null = null;
    private skip: number | null = null;
    private count = false;

    select(...fields: string[]): this {
        for (const field of fields) {
            if (!this.selectFields.includes(field)) this.selectFields.push(field);
        }
        return this;
    }

    where(field: string, operator: ComparisonOperator, value: ODataLiteral): this {
        this.filters.push(`${field} ${operator} ${formatODataLiteral(value)}`);
        return this;
    }

    whereEquals(field: string, value: ODataLiteral): this {
        return this.where(field, 'eq', value);
    }

    whereNotEquals(field: string, value: ODataLiteral): this {
        return this.where(field, 'ne', value);
    }

    whereGreaterThan(field: string, value: ODataLiteral): this {
        return this.where(field, 'gt', value);
    }

    whereGreaterOrEqual(field: string, value: ODataLiteral): this {
        return this.where(field, 'ge', value);
    }

    whereLessThan(field: string, value: ODataLiteral): this {
        return this.where(field, 'lt', value);
    }

    whereLessOrEqual(field: string, value: ODataLiteral): this {
        return this.where(field, 'le', value);
    }

    whereContains(field: string, value: string): this {
        this.filters.push(`contains(${field}, ${quoteODataString(value)})`);
        return this;
    }

    whereStartsWith(field: string, value: string): this {
        this.filters.push(`startswith(${field}, ${quoteODataString(value)})`);
        return this;
    }

    whereEndsWith(field: string, value: string): this {
        this.filters.push(`endswith(${field}, ${quoteODataString(value)})`);
        return this;
    }

    /** OR of equality predicates; an empty list adds nothing */
    whereIn(field: string, values: readonly ODataLiteral[]): this {
        if (values.length === 0) return this;
        const parts = values.map((value) => `${field} eq ${formatODataLiteral(value)}`);
        this.filters.push(`(${parts.join(' or ')})`);
        return this;
    }

    /** Append a pre-rendered predicate as-is */
    whereRaw(expression: string): this {
        if (expression.trim() !== '') this.filters.push(expression);
        return this;
    }

    expand(...relations: string[]): this {
        for (const relation of relations) {
            if (!this.expandRelations.includes(relation)) this.expandRelations.push(relation);
        }
        return this;
    }

    orderBy(field: string, direction: SortDirection = 'asc'): this {
        this.orderClauses.push(`${field} ${direction}`);
        return this;
    }

    orderByDesc(field: string): this {
        return this.orderBy(field, 'desc');
    }

    limit(count: number): this {
        this.top = Math.max(0, Math.trunc(count));
        return this;
    }

    offset(count: number): this {
        this.skip = Math.max(0, Math.trunc(count));
        return this;
    }

    /** Page numbers start at 1; lower values are treated as page 1 */
    paginate(page: number, perPage: number = DEFAULT_PER_PAGE): this {
        const safePage = Math.max(1, Math.trunc(page));
        this.limit(perPage);
        this.skip = (safePage - 1) * (this.top ?? 0);
        return this;
    }

    withCount(enabled = true): this {
        this.count = enabled;
        return this;
    }

    reset(): this {
        this.selectFields = [];
        this.filters = [];
        this.expandRelations = [];
        this.orderClauses = [];
        this.top = null;
        this.skip = null;
        this.count = false;
        return this;
    }

    build(): ErpQueryParams {
        const params: ErpQueryParams = {};

        if (this.selectFields.length > 0) params.$select = this.selectFields.join(',');
        if (this.filters.length > 0) params.$filter = this.filters.join(' and ');
        if (this.expandRelations.length > 0) params.$expand = this.expandRelations.join(',');
        if (this.orderClauses.length > 0) params.$orderby = this.orderClauses.join(',');
        if (this.top !== null) params.$top = this.top;
        if (this.skip !== null && this.skip > 0) params.$skip = this.skip;
        if (this.count) params.$count = 'true';

        return params;
    }
}
