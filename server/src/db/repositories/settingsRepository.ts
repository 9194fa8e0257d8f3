import type { Kysely } from 'kysely';
import type { DB } from '../types.js';
import type { SettingsRepository } from './types.js';

export class KyselySettingsRepository implements SettingsRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async get(key: string): Promise<string | null> {
        const row = await this.db
            .selectFrom('erp_sync_settings')
            .select('value')
            .where('key', '=', key)
            .executeTakeFirst();
        return row?.value ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        await this.db
            .insertInto('erp_sync_settings')
            .values({ key, value, updated_at: new Date() })
            .onConflict((oc) => oc.column('key').doUpdateSet({ value, updated_at: new Date() }))
            .execute();
    }

    async getAll(): Promise<Record<string, string>> {
        const rows = await this.db.selectFrom('erp_sync_settings').select(['key', 'value']).execute();
        return Object.fromEntries(rows.map((row) => [row.key, row.value]));
    }
}
