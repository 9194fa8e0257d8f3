/**
 * Kysely instance that compiles Postgres SQL without a database
 *
 * Queries are captured through the query log; the DummyDriver answers every
 * query with no rows.
 */

import {
    DummyDriver,
    Kysely,
    PostgresAdapter,
    PostgresIntrospector,
    PostgresQueryCompiler,
    type CompiledQuery,
} from 'kysely';
import type { DB } from '../db/types.js';

export function createRecordingDb() {
    const queries: CompiledQuery[] = [];
    const db = new Kysely<DB>({
        dialect: {
            createAdapter: () => new PostgresAdapter(),
            createDriver: () => new DummyDriver(),
            createIntrospector: (kysely) => new PostgresIntrospector(kysely),
            createQueryCompiler: () => new PostgresQueryCompiler(),
        },
        log: (event) => {
            if (event.level === 'query') queries.push(event.query);
        },
    });
    return { db, queries };
}
