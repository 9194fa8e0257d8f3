/**
 * In-memory repositories
 *
 * Used by the tests and by `createSyncEngine` when no DATABASE_URL is set.
 * They follow the same uniqueness rules as the Postgres schema.
 */

import { ConflictError } from '../../utils/errors.js';
import type {
    CustomerMapping,
    CustomerMappingRepository,
    DeadLetterEntry,
    DeadLetterRepository,
    DeadLetterResolution,
    NewDeadLetter,
    OrderMapping,
    OrderMappingRepository,
    OrderSyncedUpdate,
    ProductMapping,
    ProductMappingRepository,
    ProductMappingUpsert,
    Repositories,
    SettingsRepository,
    SyncLogEntry,
    SyncLogRecord,
    SyncLogRepository,
} from './types.js';

export class InMemorySettingsRepository implements SettingsRepository {
    private readonly values = new Map<string, string>();

    constructor(initial: Record<string, string> = {}) {
        for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
    }

    async get(key: string): Promise<string | null> {
        return this.values.get(key) ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        this.values.set(key, value);
    }

    async getAll(): Promise<Record<string, string>> {
        return Object.fromEntries(this.values);
    }
}

export class InMemoryOrderMappingRepository implements OrderMappingRepository {
    private readonly rows = new Map<number, OrderMapping>();

    async findByOrderId(localOrderId: number): Promise<OrderMapping | null> {
        const row = this.rows.get(localOrderId);
        return row ? { ...row } : null;
    }

    async markSynced(localOrderId: number, update: OrderSyncedUpdate): Promise<void> {
        const existing = this.rows.get(localOrderId);
        this.rows.set(localOrderId, {
            localOrderId,
            erpDocEntry: update.docEntry,
            erpDocNum: update.docNum,
            erpDocType: existing?.erpDocType ?? 'Orders',
            syncStatus: 'synced',
            syncAttempts: (existing?.syncAttempts ?? 0) + 1,
            lastError: null,
            syncedAt: update.syncedAt,
        });
    }

    async recordFailure(localOrderId: number, error: string): Promise<void> {
        const existing = this.rows.get(localOrderId);
        this.rows.set(localOrderId, {
            localOrderId,
            erpDocEntry: existing?.erpDocEntry ?? null,
            erpDocNum: existing?.erpDocNum ?? null,
            erpDocType: existing?.erpDocType ?? 'Orders',
            syncStatus: existing?.erpDocEntry != null ? existing.syncStatus : 'failed',
            syncAttempts: (existing?.syncAttempts ?? 0) + 1,
            lastError: error,
            syncedAt: existing?.syncedAt ?? null,
        });
    }
}

export class InMemoryProductMappingRepository implements ProductMappingRepository {
    private readonly rows = new Map<number, ProductMapping>();

    async findByProductId(localProductId: number): Promise<ProductMapping | null> {
        const row = this.rows.get(localProductId);
        return row ? { ...row } : null;
    }

    async listEnabled(): Promise<ProductMapping[]> {
        return [...this.rows.values()]
            .filter((row) => row.syncEnabled)
            .sort((a, b) => a.localProductId - b.localProductId)
            .map((row) => ({ ...row }));
    }

    async upsert(mapping: ProductMappingUpsert): Promise<void> {
        for (const row of this.rows.values()) {
            if (row.erpItemCode === mapping.erpItemCode && row.localProductId !== mapping.localProductId) {
                throw new ConflictError(
                    `Item code ${mapping.erpItemCode} is already mapped to product ${row.localProductId}`,
                    'duplicate_item_code',
                );
            }
        }
        const existing = this.rows.get(mapping.localProductId);
        this.rows.set(mapping.localProductId, {
            localProductId: mapping.localProductId,
            erpItemCode: mapping.erpItemCode,
            syncEnabled: mapping.syncEnabled,
            syncStatus: mapping.syncStatus,
            errorMessage: mapping.errorMessage ?? null,
            lastSyncedAt: existing?.lastSyncedAt ?? null,
            lastStockQty: existing?.lastStockQty ?? null,
        });
    }

    async recordStock(localProductId: number, quantity: number, syncedAt: Date): Promise<void> {
        const row = this.rows.get(localProductId);
        if (!row) return;
        this.rows.set(localProductId, {
            ...row,
            lastStockQty: quantity,
            lastSyncedAt: syncedAt,
            syncStatus: 'synced',
            errorMessage: null,
        });
    }

    async recordError(localProductId: number, message: string): Promise<void> {
        const row = this.rows.get(localProductId);
        if (!row) return;
        this.rows.set(localProductId, { ...row, syncStatus: 'failed', errorMessage: message });
    }

    async remove(localProductId: number): Promise<boolean> {
        return this.rows.delete(localProductId);
    }
}

export class InMemoryCustomerMappingRepository implements CustomerMappingRepository {
    private readonly byEmail = new Map<string, CustomerMapping>();

    /** Number of upserts, for asserting that racing callers created one mapping */
    upsertCount = 0;

    async findByCustomerId(localCustomerId: number): Promise<CustomerMapping | null> {
        for (const row of this.byEmail.values()) {
            if (row.localCustomerId === localCustomerId) return { ...row };
        }
        return null;
    }

    async findByEmail(email: string): Promise<CustomerMapping | null> {
        const row = this.byEmail.get(email.trim().toLowerCase());
        return row ? { ...row } : null;
    }

    async upsert(mapping: CustomerMapping): Promise<CustomerMapping> {
        this.upsertCount++;
        const email = mapping.email.trim().toLowerCase();
        const existing = this.byEmail.get(email);
        const row: CustomerMapping = {
            ...mapping,
            email,
            localCustomerId: mapping.localCustomerId ?? existing?.localCustomerId ?? null,
        };
        this.byEmail.set(email, row);
        return { ...row };
    }
}

export class InMemorySyncLogRepository implements SyncLogRepository {
    readonly records: SyncLogRecord[] = [];
    private nextId = 1;

    constructor(private readonly now: () => Date = () => new Date()) {}

    async append(entry: SyncLogEntry): Promise<void> {
        this.records.push({ ...entry, id: this.nextId++, createdAt: this.now() });
    }

    async listRecent(limit: number): Promise<SyncLogRecord[]> {
        return [...this.records].reverse().slice(0, limit);
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        const before = this.records.length;
        const kept = this.records.filter((record) => record.createdAt.getTime() >= cutoff.getTime());
        this.records.splice(0, this.records.length, ...kept);
        return before - kept.length;
    }
}

export class InMemoryDeadLetterRepository implements DeadLetterRepository {
    private readonly rows = new Map<number, DeadLetterEntry>();
    private nextId = 1;

    async insert(entry: NewDeadLetter): Promise<DeadLetterEntry> {
        const row: DeadLetterEntry = { ...entry, id: this.nextId++, resolvedAt: null, resolution: null };
        this.rows.set(row.id, row);
        return { ...row };
    }

    async findById(id: number): Promise<DeadLetterEntry | null> {
        const row = this.rows.get(id);
        return row ? { ...row } : null;
    }

    async listUnresolved(limit: number): Promise<DeadLetterEntry[]> {
        return [...this.rows.values()]
            .filter((row) => row.resolvedAt === null)
            .sort((a, b) => b.failedAt.getTime() - a.failedAt.getTime() || b.id - a.id)
            .slice(0, limit)
            .map((row) => ({ ...row }));
    }

    async countUnresolved(): Promise<number> {
        return [...this.rows.values()].filter((row) => row.resolvedAt === null).length;
    }

    async markResolved(id: number, resolution: DeadLetterResolution, resolvedAt: Date): Promise<boolean> {
        const row = this.rows.get(id);
        if (!row || row.resolvedAt !== null) return false;
        this.rows.set(id, { ...row, resolvedAt, resolution });
        return true;
    }
}

export function createInMemoryRepositories(): Repositories {
    return {
        settings: new InMemorySettingsRepository(),
        orderMappings: new InMemoryOrderMappingRepository(),
        productMappings: new InMemoryProductMappingRepository(),
        customerMappings: new InMemoryCustomerMappingRepository(),
        syncLog: new InMemorySyncLogRepository(),
        deadLetters: new InMemoryDeadLetterRepository(),
    };
}
