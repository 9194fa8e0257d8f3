/**
 * Order billing details → ERP business partner
 */

import { generateCardCode } from '../erp/formatting.js';
import type { ErpBusinessPartnerPayload, ErpPartnerAddressPayload } from '../erp/types.js';
import type { StorefrontAddress, StorefrontOrder } from '../storefront/types.js';

export const DEFAULT_CARD_CODE_PREFIX = 'WC';

function fullName(address: StorefrontAddress): string {
    return `${address.firstName} ${address.lastName}`.trim();
}

function mapAddress(
    address: StorefrontAddress,
    name: ErpPartnerAddressPayload['AddressName'],
): ErpPartnerAddressPayload {
    return {
        AddressName: name,
        AddressType: name === 'BILL' ? 'bo_BillTo' : 'bo_ShipTo',
        Street: address.address1,
        Block: address.address2,
        City: address.city,
        State: address.state,
        ZipCode: address.postcode,
        Country: address.country,
    };
}

/** Single-line street address: address1, address2 */
export function formatStreet(address: StorefrontAddress): string {
    return [address.address1, address.address2].filter((part) => part.trim() !== '').join(', ');
}

/** Registered customers keep one code across orders; guests get one per order */
export function cardCodeForOrder(order: StorefrontOrder, prefix: string = DEFAULT_CARD_CODE_PREFIX): string {
    return generateCardCode(prefix, order.customerId ?? order.id);
}

export function mapOrderToBusinessPartner(
    order: StorefrontOrder,
    prefix: string = DEFAULT_CARD_CODE_PREFIX,
): ErpBusinessPartnerPayload {
    const billing = order.billing;
    const addresses = [mapAddress(billing, 'BILL')];
    if (order.shipping && order.shipping.address1.trim() !== '') {
        addresses.push(mapAddress(order.shipping, 'SHIP'));
    }

    return {
        CardCode: cardCodeForOrder(order, prefix),
        CardName: billing.company.trim() !== '' ? billing.company.trim() : fullName(billing),
        CardType: 'cCustomer',
        EmailAddress: billing.email,
        Phone1: billing.phone,
        Cellular: billing.phone,
        Address: formatStreet(billing),
        City: billing.city,
        Country: billing.country,
        ZipCode: billing.postcode,
        Currency: order.currency,
        BPAddresses: addresses,
        ContactEmployees: [
            {
                Name: fullName(billing),
                FirstName: billing.firstName,
                LastName: billing.lastName,
                E_Mail: billing.email,
                Phone1: billing.phone,
                MobilePhone: billing.phone,
            },
        ],
    };
}
