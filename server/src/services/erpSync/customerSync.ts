/**
 * Customer resolution for order sync
 *
 * Finds the ERP business partner for an order's billing email, creating one
 * when auto-create is on. Resolution for one email is serialized through a
 * keyed lock and re-checks the mapping table once inside it, so two orders
 * from a new customer produce one partner.
 */

import {
    ErpQueryBuilder,
    cardCodeForOrder,
    mapOrderToBusinessPartner,
    type StorefrontOrder,
} from '@erpsync/shared/domain';
import type { SyncSettings } from '../../config/syncSettings.js';
import type { CustomerMappingRepository } from '../../db/repositories/types.js';
import { errorMessage, isErpError } from '../../utils/errors.js';
import { KeyedLock } from '../../utils/keyedLock.js';
import { customerLogger } from '../../utils/logger.js';
import type { ErpClient } from '../erp/client.js';
import type { SyncLogRecorder } from '../syncLogRecorder.js';

export type CustomerSyncSettings = Pick<SyncSettings, 'autoCreateCustomers' | 'defaultCustomerCode' | 'cardCodePrefix'>;

export interface CustomerSyncDeps {
    erp: ErpClient;
    mappings: CustomerMappingRepository;
    audit: SyncLogRecorder;
    settings: CustomerSyncSettings;
    locks?: KeyedLock;
}

export interface PartnerMatch {
    cardCode: string;
    cardName: string | null;
}

function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export class CustomerSyncService {
    private readonly locks: KeyedLock;

    constructor(private readonly deps: CustomerSyncDeps) {
        this.locks = deps.locks ?? new KeyedLock();
    }

    /**
     * Partner code to use for the order's document
     */
    async ensureCustomer(order: StorefrontOrder): Promise<string> {
        const email = normalizeEmail(order.billing.email);
        const lockKey = email !== '' ? `email:${email}` : `code:${cardCodeForOrder(order, this.deps.settings.cardCodePrefix)}`;

        return this.locks.run(lockKey, async () => {
            if (email !== '') {
                const mapped = await this.deps.mappings.findByEmail(email);
                if (mapped) return mapped.erpCardCode;

                const existing = await this.findByEmail(email);
                if (existing) {
                    await this.saveMapping(order, existing);
                    return existing.cardCode;
                }
            }

            if (!this.deps.settings.autoCreateCustomers) {
                customerLogger.debug({ orderId: order.id }, 'Auto-create disabled, using default customer');
                return this.deps.settings.defaultCustomerCode;
            }

            return this.createCustomer(order);
        });
    }

    /**
     * First customer-type partner with this email. Lookup failures read as
     * "not found" so a flaky search never blocks the order.
     */
    async findByEmail(email: string): Promise<PartnerMatch | null> {
        const query = new ErpQueryBuilder()
            .select('CardCode', 'CardName', 'EmailAddress')
            .whereEquals('EmailAddress', email)
            .whereEquals('CardType', 'cCustomer')
            .limit(1)
            .build();

        try {
            const result = await this.deps.erp.getBusinessPartners(query);
            const first = result.items[0];
            if (!first || typeof first.CardCode !== 'string' || first.CardCode === '') return null;
            return {
                cardCode: first.CardCode,
                cardName: typeof first.CardName === 'string' ? first.CardName : null,
            };
        } catch (error: unknown) {
            if (!isErpError(error)) throw error;
            customerLogger.warn({ email, error: error.message }, 'Failed to search for customer by email');
            return null;
        }
    }

    async createCustomer(order: StorefrontOrder): Promise<string> {
        const payload = mapOrderToBusinessPartner(order, this.deps.settings.cardCodePrefix);
        customerLogger.info({ cardCode: payload.CardCode, orderId: order.id }, 'Creating customer in ERP');

        try {
            const created = await this.deps.erp.createBusinessPartner(payload);
            const match: PartnerMatch = {
                cardCode: created.cardCode ?? payload.CardCode,
                cardName: created.cardName ?? payload.CardName,
            };
            await this.saveMapping(order, match);
            await this.deps.audit.record({
                syncType: 'customer',
                localId: order.customerId,
                erpId: match.cardCode,
                status: 'success',
                direction: 'to_erp',
                message: `Customer ${match.cardCode} created`,
                requestData: payload,
            });
            return match.cardCode;
        } catch (error: unknown) {
            customerLogger.error({ cardCode: payload.CardCode, error: errorMessage(error) }, 'Failed to create customer in ERP');
            await this.deps.audit.record({
                syncType: 'customer',
                localId: order.customerId,
                erpId: payload.CardCode,
                status: 'error',
                direction: 'to_erp',
                message: `Customer creation failed: ${errorMessage(error)}`,
                requestData: payload,
            });
            throw error;
        }
    }

    private async saveMapping(order: StorefrontOrder, match: PartnerMatch): Promise<void> {
        const email = normalizeEmail(order.billing.email);
        if (email === '') return;
        await this.deps.mappings.upsert({
            localCustomerId: order.customerId,
            email,
            erpCardCode: match.cardCode,
            erpCardName: match.cardName,
            syncStatus: 'synced',
        });
    }
}
