/**
 * Persistence contracts of the sync engine
 *
 * Each table has a Kysely implementation and an in-memory one (memory.ts).
 * Services depend on these interfaces only.
 */

// ============================================
// SETTINGS
// ============================================

export interface SettingsRepository {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<void>;
    getAll(): Promise<Record<string, string>>;
}

// ============================================
// MAPPINGS
// ============================================

export type MappingSyncStatus = 'pending' | 'synced' | 'failed' | 'not_found';

export interface OrderMapping {
    localOrderId: number;
    erpDocEntry: number | null;
    erpDocNum: number | null;
    erpDocType: string;
    syncStatus: MappingSyncStatus;
    syncAttempts: number;
    lastError: string | null;
    syncedAt: Date | null;
}

export interface OrderSyncedUpdate {
    docEntry: number;
    docNum: number | null;
    syncedAt: Date;
}

export interface OrderMappingRepository {
    findByOrderId(localOrderId: number): Promise<OrderMapping | null>;
    /** Upsert by local order id; attempts are counted, errors cleared */
    markSynced(localOrderId: number, update: OrderSyncedUpdate): Promise<void>;
    /** Upsert by local order id; increments attempts */
    recordFailure(localOrderId: number, error: string): Promise<void>;
}

export interface ProductMapping {
    localProductId: number;
    erpItemCode: string;
    syncEnabled: boolean;
    lastSyncedAt: Date | null;
    lastStockQty: number | null;
    syncStatus: MappingSyncStatus;
    errorMessage: string | null;
}

export interface ProductMappingUpsert {
    localProductId: number;
    erpItemCode: string;
    syncEnabled: boolean;
    syncStatus: MappingSyncStatus;
    errorMessage?: string | null;
}

export interface ProductMappingRepository {
    findByProductId(localProductId: number): Promise<ProductMapping | null>;
    listEnabled(): Promise<ProductMapping[]>;
    /** Upsert by local product id; the item code stays unique across products */
    upsert(mapping: ProductMappingUpsert): Promise<void>;
    recordStock(localProductId: number, quantity: number, syncedAt: Date): Promise<void>;
    recordError(localProductId: number, message: string): Promise<void>;
    remove(localProductId: number): Promise<boolean>;
}

export interface CustomerMapping {
    localCustomerId: number | null;
    email: string;
    erpCardCode: string;
    erpCardName: string | null;
    syncStatus: MappingSyncStatus;
}

export interface CustomerMappingRepository {
    findByCustomerId(localCustomerId: number): Promise<CustomerMapping | null>;
    findByEmail(email: string): Promise<CustomerMapping | null>;
    /** Insert, or update the row holding the same email */
    upsert(mapping: CustomerMapping): Promise<CustomerMapping>;
}

// ============================================
// AUDIT LOG
// ============================================

export type SyncLogStatus = 'success' | 'error' | 'warning' | 'info';

export type SyncDirection = 'to_erp' | 'from_erp' | 'internal';

export interface SyncLogEntry {
    syncType: string;
    localId: number | null;
    erpId: string | null;
    status: SyncLogStatus;
    direction: SyncDirection;
    message: string;
    requestData?: unknown;
    responseData?: unknown;
}

export interface SyncLogRecord extends SyncLogEntry {
    id: number;
    createdAt: Date;
}

export interface SyncLogRepository {
    append(entry: SyncLogEntry): Promise<void>;
    listRecent(limit: number): Promise<SyncLogRecord[]>;
    deleteOlderThan(cutoff: Date): Promise<number>;
}

// ============================================
// DEAD LETTERS
// ============================================

export type DeadLetterResolution = 'retried' | 'discarded';

export interface NewDeadLetter {
    jobType: string;
    group: string;
    payload: Record<string, unknown>;
    errorMessage: string;
    attempts: number;
    maxAttempts: number;
    /** Attempts across all dead-letter cycles of this job */
    lifetimeAttempts: number;
    failedAt: Date;
}

export interface DeadLetterEntry extends NewDeadLetter {
    id: number;
    resolvedAt: Date | null;
    resolution: DeadLetterResolution | null;
}

export interface DeadLetterRepository {
    insert(entry: NewDeadLetter): Promise<DeadLetterEntry>;
    findById(id: number): Promise<DeadLetterEntry | null>;
    /** Newest first */
    listUnresolved(limit: number): Promise<DeadLetterEntry[]>;
    countUnresolved(): Promise<number>;
    /** False when the entry is missing or already resolved */
    markResolved(id: number, resolution: DeadLetterResolution, resolvedAt: Date): Promise<boolean>;
}

// ============================================
// AGGREGATE
// ============================================

export interface Repositories {
    settings: SettingsRepository;
    orderMappings: OrderMappingRepository;
    productMappings: ProductMappingRepository;
    customerMappings: CustomerMappingRepository;
    syncLog: SyncLogRepository;
    deadLetters: DeadLetterRepository;
}
