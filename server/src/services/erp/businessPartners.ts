import {
    parseBusinessPartner,
    parseCollection,
    type ErpBusinessPartner,
    type ErpBusinessPartnerPayload,
    type ErpQueryParams,
    type ParsedCollection,
} from '@erpsync/shared/domain';
import { entityPath } from './http.js';
import type { ErpRequester } from './types.js';

export async function getBusinessPartners(erp: ErpRequester, query: ErpQueryParams = {}): Promise<ParsedCollection> {
    return parseCollection(await erp.get('BusinessPartners', query));
}

export async function getBusinessPartner(erp: ErpRequester, cardCode: string): Promise<ErpBusinessPartner> {
    return parseBusinessPartner(await erp.get(entityPath('BusinessPartners', cardCode)));
}

export async function createBusinessPartner(
    erp: ErpRequester,
    payload: ErpBusinessPartnerPayload,
): Promise<ErpBusinessPartner> {
    return parseBusinessPartner(await erp.post('BusinessPartners', payload));
}

export async function updateBusinessPartner(
    erp: ErpRequester,
    cardCode: string,
    data: Partial<ErpBusinessPartnerPayload>,
): Promise<void> {
    await erp.patch(entityPath('BusinessPartners', cardCode), data);
}
