import crypto from 'crypto';
import { sql, type Expression, type ExpressionBuilder, type Kysely, type SqlBool } from 'kysely';
import { ERP_SYNC } from '../../config/sync/erp.js';
import { toPayload } from '../../db/repositories/rowMapping.js';
import type { DB, SyncJobRow } from '../../db/types.js';
import type { ClaimedJob, ScheduledJob } from './jobs.js';
import type { JobFilter, JobScheduler, RescheduleRequest, ScheduleRequest } from './scheduler.js';

function toScheduledJob(row: SyncJobRow): ScheduledJob {
    return {
        id: row.id,
        type: row.job_type,
        group: row.job_group,
        payload: toPayload(row.payload),
        runAt: row.run_at,
        intervalMs: row.interval_ms,
    };
}

/**
 * Job scheduler over the erp_sync_jobs table
 *
 * Safe with several worker processes: claims lock rows with
 * `FOR UPDATE SKIP LOCKED` so two workers never take the same job, and
 * stamp a claim token that every later write of the claim must match.
 * `updated_at` doubles as the lease clock. Payload filters use JSONB
 * containment (`payload @> filter`).
 */
export class PostgresJobScheduler implements JobScheduler {
    constructor(
        private readonly db: Kysely<DB>,
        private readonly leaseMs: number = ERP_SYNC.queue.leaseMs,
    ) {}

    async scheduleOnce(request: ScheduleRequest): Promise<number> {
        return this.insert(request, null);
    }

    async scheduleRecurring(request: ScheduleRequest & { intervalMs: number }): Promise<number> {
        return this.insert(request, request.intervalMs);
    }

    async hasScheduled(filter: JobFilter): Promise<boolean> {
        const row = await this.db
            .selectFrom('erp_sync_jobs')
            .select('id')
            .where((eb) => this.matches(eb, filter))
            .where('status', 'in', ['pending', 'running'])
            .limit(1)
            .executeTakeFirst();
        return row !== undefined;
    }

    async cancelAll(filter: JobFilter): Promise<number> {
        const result = await this.db
            .deleteFrom('erp_sync_jobs')
            .where((eb) => this.matches(eb, filter))
            .where('status', '=', 'pending')
            .executeTakeFirst();
        return Number(result.numDeletedRows);
    }

    async countPending(group?: string): Promise<number> {
        let query = this.db
            .selectFrom('erp_sync_jobs')
            .select((eb) => eb.fn.countAll<string>().as('count'))
            .where('status', '=', 'pending');
        if (group !== undefined) {
            query = query.where('job_group', '=', group);
        }
        const row = await query.executeTakeFirst();
        return Number(row?.count ?? 0);
    }

    async claimNext(now: Date): Promise<ClaimedJob | null> {
        const leaseCutoff = new Date(now.getTime() - this.leaseMs);

        return this.db.transaction().execute(async (trx) => {
            const row = await trx
                .selectFrom('erp_sync_jobs')
                .selectAll()
                .where((eb) =>
                    eb.or([
                        eb.and([eb('status', '=', 'pending'), eb('run_at', '<=', now)]),
                        eb.and([eb('status', '=', 'running'), eb('updated_at', '<', leaseCutoff)]),
                    ]),
                )
                .orderBy('run_at')
                .orderBy('id')
                .limit(1)
                .forUpdate()
                .skipLocked()
                .executeTakeFirst();

            if (!row) return null;

            const claimToken = crypto.randomUUID();
            await trx
                .updateTable('erp_sync_jobs')
                .set({ status: 'running', updated_at: now, claim_token: claimToken })
                .where('id', '=', row.id)
                .execute();

            return { ...toScheduledJob(row), claimToken };
        });
    }

    async renewLease(job: ClaimedJob, now: Date): Promise<boolean> {
        const result = await this.db
            .updateTable('erp_sync_jobs')
            .set({ updated_at: now })
            .where('id', '=', job.id)
            .where('claim_token', '=', job.claimToken)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }

    async complete(job: ClaimedJob, now: Date): Promise<boolean> {
        if (job.intervalMs === null) {
            const result = await this.db
                .deleteFrom('erp_sync_jobs')
                .where('id', '=', job.id)
                .where('claim_token', '=', job.claimToken)
                .executeTakeFirst();
            return result.numDeletedRows > 0n;
        }
        const result = await this.db
            .updateTable('erp_sync_jobs')
            .set({
                status: 'pending',
                run_at: new Date(now.getTime() + job.intervalMs),
                claim_token: null,
                updated_at: now,
            })
            .where('id', '=', job.id)
            .where('claim_token', '=', job.claimToken)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }

    async reschedule(job: ClaimedJob, request: RescheduleRequest): Promise<boolean> {
        const result = await this.db
            .updateTable('erp_sync_jobs')
            .set({
                status: 'pending',
                payload: JSON.stringify(request.payload),
                run_at: request.runAt,
                claim_token: null,
                updated_at: request.runAt,
            })
            .where('id', '=', job.id)
            .where('claim_token', '=', job.claimToken)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }

    private async insert(request: ScheduleRequest, intervalMs: number | null): Promise<number> {
        const row = await this.db
            .insertInto('erp_sync_jobs')
            .values({
                job_type: request.type,
                job_group: request.group,
                payload: JSON.stringify(request.payload),
                status: 'pending',
                run_at: request.runAt,
                interval_ms: intervalMs,
                claim_token: null,
                updated_at: request.runAt,
            })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    private matches(eb: ExpressionBuilder<DB, 'erp_sync_jobs'>, filter: JobFilter): Expression<SqlBool> {
        const conditions: Expression<SqlBool>[] = [eb('job_type', '=', filter.type)];
        if (filter.group !== undefined) {
            conditions.push(eb('job_group', '=', filter.group));
        }
        if (filter.payload !== undefined) {
            conditions.push(sql<boolean>`payload @> ${JSON.stringify(filter.payload)}::jsonb`);
        }
        return eb.and(conditions);
    }
}
