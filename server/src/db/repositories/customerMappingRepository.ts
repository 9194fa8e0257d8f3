import { sql, type Kysely } from 'kysely';
import type { CustomerMapRow, DB } from '../types.js';
import { toMappingStatus } from './rowMapping.js';
import type { CustomerMapping, CustomerMappingRepository } from './types.js';

function toCustomerMapping(row: CustomerMapRow): CustomerMapping {
    return {
        localCustomerId: row.local_customer_id,
        email: row.email,
        erpCardCode: row.erp_card_code,
        erpCardName: row.erp_card_name,
        syncStatus: toMappingStatus(row.sync_status),
    };
}

/**
 * Emails are stored lower-cased; the unique index on email is what stops two
 * workers from mapping the same customer twice.
 */
export class KyselyCustomerMappingRepository implements CustomerMappingRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async findByCustomerId(localCustomerId: number): Promise<CustomerMapping | null> {
        const row = await this.db
            .selectFrom('erp_customer_map')
            .selectAll()
            .where('local_customer_id', '=', localCustomerId)
            .executeTakeFirst();
        return row ? toCustomerMapping(row) : null;
    }

    async findByEmail(email: string): Promise<CustomerMapping | null> {
        const row = await this.db
            .selectFrom('erp_customer_map')
            .selectAll()
            .where('email', '=', email.trim().toLowerCase())
            .executeTakeFirst();
        return row ? toCustomerMapping(row) : null;
    }

    async upsert(mapping: CustomerMapping): Promise<CustomerMapping> {
        const now = new Date();
        const row = await this.db
            .insertInto('erp_customer_map')
            .values({
                local_customer_id: mapping.localCustomerId,
                email: mapping.email.trim().toLowerCase(),
                erp_card_code: mapping.erpCardCode,
                erp_card_name: mapping.erpCardName,
                sync_status: mapping.syncStatus,
                updated_at: now,
            })
            .onConflict((oc) =>
                oc.column('email').doUpdateSet({
                    local_customer_id: sql<number | null>`coalesce(excluded.local_customer_id, erp_customer_map.local_customer_id)`,
                    erp_card_code: mapping.erpCardCode,
                    erp_card_name: mapping.erpCardName,
                    sync_status: mapping.syncStatus,
                    updated_at: now,
                }),
            )
            .returningAll()
            .executeTakeFirstOrThrow();
        return toCustomerMapping(row);
    }
}
