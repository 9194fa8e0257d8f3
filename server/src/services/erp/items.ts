import { parseCollection, parseEntity, type ErpQueryParams, type ErpRecord, type ParsedCollection } from '@erpsync/shared/domain';
import { entityPath } from './http.js';
import type { ErpRequester } from './types.js';

/**
 * Fetch a page of items
 */
export async function getItems(erp: ErpRequester, query: ErpQueryParams = {}): Promise<ParsedCollection> {
    return parseCollection(await erp.get('Items', query));
}

/**
 * Fetch one item by code. A missing item fails with ApiError(NOT_FOUND).
 */
export async function getItem(erp: ErpRequester, itemCode: string, query: ErpQueryParams = {}): Promise<ErpRecord> {
    return parseEntity(await erp.get(entityPath('Items', itemCode), query));
}

export async function updateItem(erp: ErpRequester, itemCode: string, data: ErpRecord): Promise<void> {
    await erp.patch(entityPath('Items', itemCode), data);
}
