/**
 * Engine composition: settings loading, reloads and job dispatch end to end
 */

import { buildOrder, buildProduct } from '@erpsync/shared/testing';
import type { SettingsEnv } from '../config/syncSettings.js';
import { SyncEngine, createSyncEngine } from '../container.js';
import { createInMemoryRepositories } from '../db/repositories/memory.js';
import type { Repositories } from '../db/repositories/types.js';
import { InMemoryJobScheduler } from '../services/queue/scheduler.js';
import { InMemoryStorefront } from '../services/storefront/memory.js';
import { FakeErpServer, TEST_ERP_CONFIG, testSecrets } from '../testing/fakeErp.js';
import { ValidationError } from '../utils/errors.js';

const NOW = new Date('2024-06-01T10:00:00Z');

const CONFIGURED_ENV: SettingsEnv = {
    ERP_SERVICE_URL: TEST_ERP_CONFIG.serviceUrl,
    ERP_COMPANY_DB: TEST_ERP_CONFIG.companyDb,
    ERP_USERNAME: TEST_ERP_CONFIG.username,
    ERP_API_VERSION: 'v1',
    ERP_ALLOW_HTTP: false,
    ERP_REQUEST_TIMEOUT_MS: TEST_ERP_CONFIG.requestTimeoutMs,
};

const EMPTY_ENV: SettingsEnv = {
    ERP_SERVICE_URL: undefined,
    ERP_COMPANY_DB: undefined,
    ERP_USERNAME: undefined,
    ERP_API_VERSION: 'v1',
    ERP_ALLOW_HTTP: false,
    ERP_REQUEST_TIMEOUT_MS: 5_000,
};

async function setup(env: SettingsEnv, repositories: Repositories = createInMemoryRepositories()) {
    const erp = new FakeErpServer();
    const storefront = new InMemoryStorefront({ orders: [buildOrder()], products: [buildProduct({ stockQuantity: 10 })] });
    const engine: SyncEngine = await createSyncEngine({
        env,
        repositories,
        scheduler: new InMemoryJobScheduler(),
        storefront,
        secrets: testSecrets,
        now: () => NOW,
        adapter: erp.adapter,
        sleep: async () => undefined,
    });
    return { erp, storefront, engine, repositories };
}

describe('SyncEngine without connection settings', () => {
    it('starts unconfigured', async () => {
        const { engine } = await setup(EMPTY_ENV);

        expect(engine.isConfigured).toBe(false);
        expect(engine.settings).toBeNull();
        expect(engine.configurationError).toBe('Invalid ERP sync settings');
        expect(() => engine.services()).toThrow(ValidationError);
    });

    it('does not queue orders from events', async () => {
        const { engine } = await setup(EMPTY_ENV);

        await expect(engine.events.onOrderCreated(buildOrder())).resolves.toBeNull();
        await expect(engine.events.onOrderStatusChanged(buildOrder(), 'pending', 'processing')).resolves.toBeNull();
    });

    it('does not queue product or stock jobs from events', async () => {
        const { engine, repositories } = await setup(EMPTY_ENV);
        await repositories.productMappings.upsert({
            localProductId: 100,
            erpItemCode: 'TEE-100',
            syncEnabled: true,
            syncStatus: 'synced',
        });

        await expect(engine.events.onProductSaved(buildProduct())).resolves.toBeNull();
        await expect(engine.events.onStockReduced(buildOrder())).resolves.toBeNull();
        await expect(engine.queue.getPendingCount()).resolves.toBe(0);

        await expect(engine.worker.runOnce()).resolves.toEqual({ claimed: 0, succeeded: 0, failed: 0 });
        await expect(engine.queue.countFailedJobs()).resolves.toBe(0);

        await expect(engine.events.onProductDeleted(100)).resolves.toBe(true);
        await expect(repositories.productMappings.findByProductId(100)).resolves.toBeNull();
    });

    it('dead-letters jobs that need the ERP', async () => {
        const { engine } = await setup(EMPTY_ENV);
        await engine.queue.queueOrderSync(5001);

        await expect(engine.worker.runOnce()).resolves.toEqual({ claimed: 1, succeeded: 0, failed: 1 });

        const [entry] = await engine.queue.getFailedJobs();
        expect(entry).toMatchObject({ jobType: 'order-sync', errorMessage: 'ERP connection is not configured' });
    });
});

describe('SyncEngine with connection settings', () => {
    it('resolves settings from env', async () => {
        const { engine } = await setup(CONFIGURED_ENV);

        expect(engine.isConfigured).toBe(true);
        expect(engine.configurationError).toBeNull();
        expect(engine.settings).toMatchObject({ companyDb: 'TESTDB', autoSyncOrders: true, stockSyncInterval: 5 });
    });

    it('runs a queued stock pull through the ERP client', async () => {
        const { engine, erp, storefront, repositories } = await setup(CONFIGURED_ENV);
        await repositories.productMappings.upsert({
            localProductId: 100,
            erpItemCode: 'TEE-100',
            syncEnabled: true,
            syncStatus: 'synced',
        });
        erp.reply('GET', "Items('TEE-100')", { status: 200, body: { ItemCode: 'TEE-100', QuantityOnStock: 3 } });
        await engine.queue.queueStockPull(100);

        await expect(engine.worker.runOnce()).resolves.toEqual({ claimed: 1, succeeded: 1, failed: 0 });

        expect(storefront.products.get(100)).toMatchObject({ stockQuantity: 3, stockStatus: 'instock' });
        await expect(engine.queue.getPendingCount()).resolves.toBe(0);
    });

    it('picks up stored settings on reload and logs out the old session', async () => {
        const { engine, erp, repositories } = await setup(CONFIGURED_ENV);
        await engine.services().session.getSession();
        await repositories.settings.set('autoSyncOrders', 'false');

        await engine.reload();

        expect(engine.settings?.autoSyncOrders).toBe(false);
        expect(erp.callsTo('POST', 'Logout')).toHaveLength(1);
        await expect(engine.events.onOrderCreated(buildOrder())).resolves.toBeNull();
    });

    it('queues orders from events when auto sync is on', async () => {
        const { engine, storefront } = await setup(CONFIGURED_ENV);

        await expect(engine.events.onOrderCreated(buildOrder())).resolves.toBe(1);
        expect(storefront.notesFor(5001)).toEqual(['Order queued for ERP sync (Job #1)']);
    });
});
