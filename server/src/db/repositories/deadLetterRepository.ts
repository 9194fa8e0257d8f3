import type { Kysely } from 'kysely';
import type { DB, FailedJobRow } from '../types.js';
import { toPayload, toResolution } from './rowMapping.js';
import type { DeadLetterEntry, DeadLetterRepository, DeadLetterResolution, NewDeadLetter } from './types.js';

function toEntry(row: FailedJobRow): DeadLetterEntry {
    return {
        id: row.id,
        jobType: row.job_type,
        group: row.job_group,
        payload: toPayload(row.payload),
        errorMessage: row.error_message,
        attempts: row.attempts,
        maxAttempts: row.max_attempts,
        lifetimeAttempts: row.lifetime_attempts,
        failedAt: row.failed_at,
        resolvedAt: row.resolved_at,
        resolution: toResolution(row.resolution),
    };
}

export class KyselyDeadLetterRepository implements DeadLetterRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async insert(entry: NewDeadLetter): Promise<DeadLetterEntry> {
        const row = await this.db
            .insertInto('erp_failed_jobs')
            .values({
                job_type: entry.jobType,
                job_group: entry.group,
                payload: JSON.stringify(entry.payload),
                error_message: entry.errorMessage,
                attempts: entry.attempts,
                max_attempts: entry.maxAttempts,
                lifetime_attempts: entry.lifetimeAttempts,
                failed_at: entry.failedAt,
                resolved_at: null,
                resolution: null,
            })
            .returningAll()
            .executeTakeFirstOrThrow();
        return toEntry(row);
    }

    async findById(id: number): Promise<DeadLetterEntry | null> {
        const row = await this.db.selectFrom('erp_failed_jobs').selectAll().where('id', '=', id).executeTakeFirst();
        return row ? toEntry(row) : null;
    }

    async listUnresolved(limit: number): Promise<DeadLetterEntry[]> {
        const rows = await this.db
            .selectFrom('erp_failed_jobs')
            .selectAll()
            .where('resolved_at', 'is', null)
            .orderBy('failed_at', 'desc')
            .orderBy('id', 'desc')
            .limit(limit)
            .execute();
        return rows.map(toEntry);
    }

    async countUnresolved(): Promise<number> {
        const row = await this.db
            .selectFrom('erp_failed_jobs')
            .select((eb) => eb.fn.countAll<string>().as('count'))
            .where('resolved_at', 'is', null)
            .executeTakeFirstOrThrow();
        return Number(row.count);
    }

    async markResolved(id: number, resolution: DeadLetterResolution, resolvedAt: Date): Promise<boolean> {
        // Already-resolved entries stay as they are
        const result = await this.db
            .updateTable('erp_failed_jobs')
            .set({ resolved_at: resolvedAt, resolution })
            .where('id', '=', id)
            .where('resolved_at', 'is', null)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }
}
