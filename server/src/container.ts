/**
 * Sync engine composition
 *
 * Builds every component explicitly from its dependencies. The ERP-facing
 * services depend on the operator settings, so they are rebuilt as a unit
 * whenever the settings change; the queue, worker and storefront outlive
 * those rebuilds.
 */

import type { AxiosAdapter } from 'axios';
import { loadSyncSettings, toConnectionConfig, type SettingsEnv, type SyncSettings } from './config/syncSettings.js';
import type { Repositories } from './db/repositories/types.js';
import { createDomainEventHandlers, createInactiveEventHandlers, type DomainEventHandlers } from './events/domainEvents.js';
import { ErpClient, ErpSessionManager, type SecretProvider, type Sleep } from './services/erp/index.js';
import { CustomerSyncService } from './services/erpSync/customerSync.js';
import { OrderSyncService } from './services/erpSync/orderSync.js';
import { ProductSyncService } from './services/erpSync/productSync.js';
import { StockSyncService } from './services/erpSync/stockSync.js';
import { QueueManager } from './services/queue/queueManager.js';
import type { JobScheduler } from './services/queue/scheduler.js';
import { SyncWorker, type JobHandlers } from './services/queue/worker.js';
import type { StorefrontGateway } from './services/storefront/types.js';
import { SyncLogRecorder } from './services/syncLogRecorder.js';
import { ValidationError, errorMessage } from './utils/errors.js';
import { syncLogger } from './utils/logger.js';

export interface SyncEngineDeps {
    env: SettingsEnv;
    repositories: Repositories;
    scheduler: JobScheduler;
    storefront: StorefrontGateway;
    secrets: SecretProvider;
    pollIntervalMs?: number;
    now?: () => Date;
    /** Test seams for the ERP transport */
    adapter?: AxiosAdapter;
    sleep?: Sleep;
}

/** Components that talk to the ERP, built from one settings snapshot */
export interface ErpServices {
    settings: SyncSettings;
    session: ErpSessionManager;
    client: ErpClient;
    customers: CustomerSyncService;
    orders: OrderSyncService;
    stock: StockSyncService;
    products: ProductSyncService;
}

export class SyncEngine {
    readonly repositories: Repositories;
    readonly storefront: StorefrontGateway;
    readonly audit: SyncLogRecorder;
    readonly queue: QueueManager;
    readonly worker: SyncWorker;

    private erp: ErpServices | null = null;
    private eventHandlers: DomainEventHandlers;
    private configError: string | null = 'Settings not loaded';

    private constructor(private readonly deps: SyncEngineDeps) {
        const now = deps.now ?? (() => new Date());
        this.repositories = deps.repositories;
        this.storefront = deps.storefront;
        this.audit = new SyncLogRecorder(deps.repositories.syncLog, now);
        this.queue = new QueueManager({ scheduler: deps.scheduler, deadLetters: deps.repositories.deadLetters, now });
        this.worker = new SyncWorker({
            scheduler: deps.scheduler,
            queue: this.queue,
            handlers: this.jobHandlers(),
            pollIntervalMs: deps.pollIntervalMs,
            now,
        });
        this.eventHandlers = createInactiveEventHandlers(deps.repositories.productMappings);
    }

    /** Build the engine and load settings. Missing settings leave it unconfigured, not failed. */
    static async create(deps: SyncEngineDeps): Promise<SyncEngine> {
        const engine = new SyncEngine(deps);
        await engine.reload();
        return engine;
    }

    get isConfigured(): boolean {
        return this.erp !== null;
    }

    /** Why the ERP services are unavailable; null once configured */
    get configurationError(): string | null {
        return this.configError;
    }

    get settings(): SyncSettings | null {
        return this.erp?.settings ?? null;
    }

    get events(): DomainEventHandlers {
        return this.eventHandlers;
    }

    /** The ERP services, or a ValidationError when the connection is not configured */
    services(): ErpServices {
        if (!this.erp) {
            throw new ValidationError('ERP connection is not configured', { reason: this.configError });
        }
        return this.erp;
    }

    /**
     * Re-read the settings and rebuild the ERP services. The previous session
     * is logged out first.
     */
    async reload(): Promise<void> {
        const previous = this.erp;
        this.erp = null;
        if (previous) {
            await previous.session.logout();
        }

        let settings: SyncSettings;
        try {
            settings = await loadSyncSettings(this.deps.repositories.settings, this.deps.env);
        } catch (error: unknown) {
            if (!(error instanceof ValidationError)) throw error;
            this.configError = errorMessage(error);
            this.eventHandlers = createInactiveEventHandlers(this.repositories.productMappings);
            syncLogger.warn({ details: error.details }, 'ERP sync not configured');
            return;
        }

        this.erp = this.buildErpServices(settings);
        this.configError = null;
        this.eventHandlers = this.buildEventHandlers(settings.autoSyncOrders);
        syncLogger.info({ serviceUrl: settings.serviceUrl, companyDb: settings.companyDb }, 'ERP sync configured');
    }

    async shutdown(): Promise<void> {
        await this.worker.stop();
        if (this.erp) {
            await this.erp.session.logout();
        }
    }

    // ============================================
    // WIRING
    // ============================================

    private buildErpServices(settings: SyncSettings): ErpServices {
        const { deps, audit } = this;
        const now = deps.now ?? (() => new Date());
        const config = toConnectionConfig(settings);

        const session = new ErpSessionManager({ config, secrets: deps.secrets, adapter: deps.adapter });
        const client = new ErpClient({ config, session, adapter: deps.adapter, sleep: deps.sleep });
        const customers = new CustomerSyncService({
            erp: client,
            mappings: deps.repositories.customerMappings,
            audit,
            settings,
        });
        const orders = new OrderSyncService({
            erp: client,
            storefront: deps.storefront,
            orderMappings: deps.repositories.orderMappings,
            customerMappings: deps.repositories.customerMappings,
            customers,
            audit,
            settings,
            now,
        });
        const stock = new StockSyncService({
            erp: client,
            storefront: deps.storefront,
            productMappings: deps.repositories.productMappings,
            audit,
            now,
        });
        const products = new ProductSyncService({
            erp: client,
            storefront: deps.storefront,
            productMappings: deps.repositories.productMappings,
            stock,
            audit,
        });

        return { settings, session, client, customers, orders, stock, products };
    }

    private buildEventHandlers(autoSyncOrders: boolean): DomainEventHandlers {
        return createDomainEventHandlers({
            queue: this.queue,
            storefront: this.storefront,
            productMappings: this.repositories.productMappings,
            audit: this.audit,
            settings: { autoSyncOrders },
        });
    }

    /** Handlers resolve the services per job, so a settings reload applies to the next job */
    private jobHandlers(): JobHandlers {
        return {
            orderSync: ({ orderId }) => this.services().orders.syncOrder(orderId),
            orderCancel: ({ orderId }) => this.services().orders.cancelOrder(orderId),
            stockPull: ({ productId }) => this.services().stock.syncProductStock(productId),
            fullStockSync: () => this.services().stock.syncAllStock(),
            productSync: ({ productId }) => this.services().products.syncProduct(productId),
        };
    }
}

export function createSyncEngine(deps: SyncEngineDeps): Promise<SyncEngine> {
    return SyncEngine.create(deps);
}
