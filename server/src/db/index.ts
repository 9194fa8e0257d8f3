/**
 * Kysely database access
 *
 * Usage:
 *   const db = createDatabase(env.DATABASE_URL);
 *   await migrateToLatest(db);
 *   const rows = await db.selectFrom('erp_order_map').selectAll().execute();
 */

import { Kysely, Migrator, PostgresDialect, type Migration, type MigrationProvider } from 'kysely';
import { Pool } from 'pg';
import { dbLogger } from '../utils/logger.js';
import * as initial from './migrations/001_initial.js';
import type { DB } from './types.js';

export function createDatabase(connectionString: string, maxConnections = 10): Kysely<DB> {
    return new Kysely<DB>({
        dialect: new PostgresDialect({
            pool: new Pool({
                connectionString,
                max: maxConnections,
            }),
        }),
    });
}

/**
 * Migrations compiled into the bundle, so no directory scan is needed
 */
class StaticMigrationProvider implements MigrationProvider {
    async getMigrations(): Promise<Record<string, Migration>> {
        return {
            '001_initial': initial,
        };
    }
}

export async function migrateToLatest(db: Kysely<DB>): Promise<void> {
    const migrator = new Migrator({ db, provider: new StaticMigrationProvider() });
    const { error, results } = await migrator.migrateToLatest();

    for (const result of results ?? []) {
        if (result.status === 'Success') {
            dbLogger.info({ migration: result.migrationName }, 'Migration applied');
        } else if (result.status === 'Error') {
            dbLogger.error({ migration: result.migrationName }, 'Migration failed');
        }
    }

    if (error) {
        throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
    }
}

// Type exports
export type { DB } from './types.js';
export type KyselyDB = Kysely<DB>;
