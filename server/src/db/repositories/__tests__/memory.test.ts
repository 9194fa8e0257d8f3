/**
 * Unit tests for the in-memory repositories
 */

import { ConflictError } from '../../../utils/errors.js';
import {
    InMemoryCustomerMappingRepository,
    InMemoryDeadLetterRepository,
    InMemoryOrderMappingRepository,
    InMemoryProductMappingRepository,
    InMemorySyncLogRepository,
} from '../memory.js';

describe('InMemoryOrderMappingRepository', () => {
    it('counts attempts across failures and the final sync', async () => {
        const repo = new InMemoryOrderMappingRepository();
        await repo.recordFailure(5001, 'ERP down');
        await repo.markSynced(5001, { docEntry: 88, docNum: 1088, syncedAt: new Date('2024-06-01T10:00:00Z') });

        await expect(repo.findByOrderId(5001)).resolves.toMatchObject({
            erpDocEntry: 88,
            syncStatus: 'synced',
            syncAttempts: 2,
            lastError: null,
        });
    });

    it('keeps a synced status when a later attempt fails', async () => {
        const repo = new InMemoryOrderMappingRepository();
        await repo.markSynced(5001, { docEntry: 88, docNum: 1088, syncedAt: new Date('2024-06-01T10:00:00Z') });
        await repo.recordFailure(5001, 'Cancel failed');

        await expect(repo.findByOrderId(5001)).resolves.toMatchObject({
            syncStatus: 'synced',
            lastError: 'Cancel failed',
        });
    });
});

describe('InMemoryProductMappingRepository', () => {
    it('rejects an item code already bound to another product', async () => {
        const repo = new InMemoryProductMappingRepository();
        await repo.upsert({ localProductId: 1, erpItemCode: 'TEE-100', syncEnabled: true, syncStatus: 'pending' });

        await expect(
            repo.upsert({ localProductId: 2, erpItemCode: 'TEE-100', syncEnabled: true, syncStatus: 'pending' }),
        ).rejects.toBeInstanceOf(ConflictError);
    });

    it('keeps stock history across upserts', async () => {
        const repo = new InMemoryProductMappingRepository();
        await repo.upsert({ localProductId: 1, erpItemCode: 'TEE-100', syncEnabled: true, syncStatus: 'pending' });
        await repo.recordStock(1, 12, new Date('2024-06-01T00:00:00Z'));
        await repo.upsert({ localProductId: 1, erpItemCode: 'TEE-100', syncEnabled: false, syncStatus: 'synced' });

        await expect(repo.findByProductId(1)).resolves.toMatchObject({ lastStockQty: 12, syncEnabled: false });
        await expect(repo.listEnabled()).resolves.toEqual([]);
    });
});

describe('InMemoryCustomerMappingRepository', () => {
    it('matches emails case-insensitively', async () => {
        const repo = new InMemoryCustomerMappingRepository();
        await repo.upsert({
            localCustomerId: 42,
            email: 'Ada@Example.com',
            erpCardCode: 'WC000042',
            erpCardName: 'Ada Lovelace',
            syncStatus: 'synced',
        });

        await expect(repo.findByEmail(' ada@example.com ')).resolves.toMatchObject({ erpCardCode: 'WC000042' });
        await expect(repo.findByCustomerId(42)).resolves.toMatchObject({ email: 'ada@example.com' });
    });
});

describe('InMemorySyncLogRepository', () => {
    it('prunes entries older than the cutoff', async () => {
        let now = new Date('2024-05-01T00:00:00Z');
        const repo = new InMemorySyncLogRepository(() => now);
        const entry = { syncType: 'stock', localId: null, erpId: null, status: 'info', direction: 'internal', message: 'x' } as const;

        await repo.append(entry);
        now = new Date('2024-06-01T00:00:00Z');
        await repo.append(entry);

        await expect(repo.deleteOlderThan(new Date('2024-05-15T00:00:00Z'))).resolves.toBe(1);
        expect(repo.records.map((r) => r.id)).toEqual([2]);
    });
});

describe('InMemoryDeadLetterRepository', () => {
    it('resolves an entry only once', async () => {
        const repo = new InMemoryDeadLetterRepository();
        const entry = await repo.insert({
            jobType: 'order-sync',
            group: 'erp-sync-orders',
            payload: { orderId: 5001 },
            errorMessage: 'ERP down',
            attempts: 5,
            maxAttempts: 5,
            lifetimeAttempts: 5,
            failedAt: new Date('2024-06-01T00:00:00Z'),
        });

        await expect(repo.markResolved(entry.id, 'discarded', new Date())).resolves.toBe(true);
        await expect(repo.markResolved(entry.id, 'retried', new Date())).resolves.toBe(false);
        await expect(repo.countUnresolved()).resolves.toBe(0);
    });
});
