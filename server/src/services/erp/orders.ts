import {
    parseCollection,
    parseOrder,
    type ErpOrder,
    type ErpOrderPayload,
    type ErpQueryParams,
    type ParsedCollection,
} from '@erpsync/shared/domain';
import { entityPath } from './http.js';
import type { ErpRequester } from './types.js';

/**
 * Fetch a page of sales orders
 */
export async function getOrders(erp: ErpRequester, query: ErpQueryParams = {}): Promise<ParsedCollection> {
    return parseCollection(await erp.get('Orders', query));
}

export async function getOrder(erp: ErpRequester, docEntry: number): Promise<ErpOrder> {
    return parseOrder(await erp.get(entityPath('Orders', docEntry)));
}

/**
 * Create a sales order; the ERP answers with the stored document
 */
export async function createOrder(erp: ErpRequester, payload: ErpOrderPayload): Promise<ErpOrder> {
    return parseOrder(await erp.post('Orders', payload));
}

/**
 * Cancel an open sales order (`Orders(n)/Cancel` action)
 */
export async function cancelOrder(erp: ErpRequester, docEntry: number): Promise<void> {
    await erp.post(`${entityPath('Orders', docEntry)}/Cancel`);
}
