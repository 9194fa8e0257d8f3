/**
 * Kysely table definitions for the sync engine's own tables
 *
 * Kept in step with migrations/001_initial.ts.
 */

import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';

/** JSONB columns are written as serialized text and read back parsed */
export type Json = ColumnType<unknown, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type CreatedAt = ColumnType<Date, Date | string | undefined, never>;

export interface ErpSyncSettingsTable {
    key: string;
    value: string;
    updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface ErpOrderMapTable {
    id: Generated<number>;
    local_order_id: number;
    erp_doc_entry: number | null;
    erp_doc_num: number | null;
    erp_doc_type: Generated<string>;
    sync_status: string;
    sync_attempts: Generated<number>;
    last_error: string | null;
    created_at: CreatedAt;
    synced_at: Timestamp | null;
    updated_at: Timestamp;
}

export interface ErpProductMapTable {
    id: Generated<number>;
    local_product_id: number;
    erp_item_code: string;
    sync_enabled: Generated<boolean>;
    last_synced_at: Timestamp | null;
    last_stock_qty: number | null;
    last_price: number | null;
    sync_status: string;
    error_message: string | null;
    created_at: CreatedAt;
    updated_at: Timestamp;
}

export interface ErpCustomerMapTable {
    id: Generated<number>;
    local_customer_id: number | null;
    email: string;
    erp_card_code: string;
    erp_card_name: string | null;
    sync_status: string;
    created_at: CreatedAt;
    updated_at: Timestamp;
}

export interface ErpSyncLogTable {
    id: Generated<number>;
    sync_type: string;
    local_id: number | null;
    erp_id: string | null;
    status: string;
    direction: string;
    message: string;
    request_data: Json | null;
    response_data: Json | null;
    created_at: CreatedAt;
}

export interface ErpFailedJobsTable {
    id: Generated<number>;
    job_type: string;
    job_group: string;
    payload: Json;
    error_message: string;
    attempts: number;
    max_attempts: number;
    lifetime_attempts: number;
    failed_at: Timestamp;
    resolved_at: Timestamp | null;
    resolution: string | null;
}

export interface ErpSyncJobsTable {
    id: Generated<number>;
    job_type: string;
    job_group: string;
    payload: Json;
    status: string;
    run_at: Timestamp;
    interval_ms: number | null;
    /** Set while a worker holds the job */
    claim_token: string | null;
    created_at: CreatedAt;
    updated_at: Timestamp;
}

export interface DB {
    erp_sync_settings: ErpSyncSettingsTable;
    erp_order_map: ErpOrderMapTable;
    erp_product_map: ErpProductMapTable;
    erp_customer_map: ErpCustomerMapTable;
    erp_sync_log: ErpSyncLogTable;
    erp_failed_jobs: ErpFailedJobsTable;
    erp_sync_jobs: ErpSyncJobsTable;
}

export type OrderMapRow = Selectable<ErpOrderMapTable>;
export type ProductMapRow = Selectable<ErpProductMapTable>;
export type CustomerMapRow = Selectable<ErpCustomerMapTable>;
export type FailedJobRow = Selectable<ErpFailedJobsTable>;
export type SyncJobRow = Selectable<ErpSyncJobsTable>;
export type NewSyncLogRow = Insertable<ErpSyncLogTable>;
export type SyncJobUpdate = Updateable<ErpSyncJobsTable>;
