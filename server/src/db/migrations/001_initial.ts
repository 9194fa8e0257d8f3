import { sql, type Kysely } from 'kysely';

// Migrations are typed against an unknown schema; they describe it
export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('erp_sync_settings')
        .addColumn('key', 'varchar(100)', (col) => col.primaryKey())
        .addColumn('value', 'text', (col) => col.notNull())
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('erp_order_map')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('local_order_id', 'integer', (col) => col.notNull().unique())
        .addColumn('erp_doc_entry', 'integer')
        .addColumn('erp_doc_num', 'integer')
        .addColumn('erp_doc_type', 'varchar(50)', (col) => col.notNull().defaultTo('Orders'))
        .addColumn('sync_status', 'varchar(20)', (col) => col.notNull().defaultTo('pending'))
        .addColumn('sync_attempts', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('last_error', 'text')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('synced_at', 'timestamptz')
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('erp_product_map')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('local_product_id', 'integer', (col) => col.notNull().unique())
        .addColumn('erp_item_code', 'varchar(50)', (col) => col.notNull().unique())
        .addColumn('sync_enabled', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('last_synced_at', 'timestamptz')
        .addColumn('last_stock_qty', 'double precision')
        .addColumn('last_price', 'double precision')
        .addColumn('sync_status', 'varchar(20)', (col) => col.notNull().defaultTo('pending'))
        .addColumn('error_message', 'text')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('erp_customer_map')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('local_customer_id', 'integer', (col) => col.unique())
        .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
        .addColumn('erp_card_code', 'varchar(50)', (col) => col.notNull())
        .addColumn('erp_card_name', 'varchar(200)')
        .addColumn('sync_status', 'varchar(20)', (col) => col.notNull().defaultTo('synced'))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('erp_sync_log')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('sync_type', 'varchar(50)', (col) => col.notNull())
        .addColumn('local_id', 'integer')
        .addColumn('erp_id', 'varchar(100)')
        .addColumn('status', 'varchar(20)', (col) => col.notNull())
        .addColumn('direction', 'varchar(20)', (col) => col.notNull())
        .addColumn('message', 'text', (col) => col.notNull())
        .addColumn('request_data', 'jsonb')
        .addColumn('response_data', 'jsonb')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema.createIndex('erp_sync_log_created_at_idx').on('erp_sync_log').column('created_at').execute();
    await db.schema.createIndex('erp_sync_log_type_status_idx').on('erp_sync_log').columns(['sync_type', 'status']).execute();

    await db.schema
        .createTable('erp_failed_jobs')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('job_type', 'varchar(50)', (col) => col.notNull())
        .addColumn('job_group', 'varchar(50)', (col) => col.notNull())
        .addColumn('payload', 'jsonb', (col) => col.notNull())
        .addColumn('error_message', 'text', (col) => col.notNull())
        .addColumn('attempts', 'integer', (col) => col.notNull())
        .addColumn('max_attempts', 'integer', (col) => col.notNull())
        .addColumn('lifetime_attempts', 'integer', (col) => col.notNull())
        .addColumn('failed_at', 'timestamptz', (col) => col.notNull())
        .addColumn('resolved_at', 'timestamptz')
        .addColumn('resolution', 'varchar(20)')
        .execute();

    await db.schema.createIndex('erp_failed_jobs_unresolved_idx').on('erp_failed_jobs').columns(['resolved_at', 'failed_at']).execute();

    await db.schema
        .createTable('erp_sync_jobs')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('job_type', 'varchar(50)', (col) => col.notNull())
        .addColumn('job_group', 'varchar(50)', (col) => col.notNull())
        .addColumn('payload', 'jsonb', (col) => col.notNull())
        .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('pending'))
        .addColumn('run_at', 'timestamptz', (col) => col.notNull())
        .addColumn('interval_ms', 'integer')
        .addColumn('claim_token', 'varchar(64)')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema.createIndex('erp_sync_jobs_due_idx').on('erp_sync_jobs').columns(['status', 'run_at']).execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    for (const table of [
        'erp_sync_jobs',
        'erp_failed_jobs',
        'erp_sync_log',
        'erp_customer_map',
        'erp_product_map',
        'erp_order_map',
        'erp_sync_settings',
    ]) {
        await db.schema.dropTable(table).ifExists().execute();
    }
}
