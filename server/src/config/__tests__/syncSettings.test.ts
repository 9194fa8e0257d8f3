/**
 * Unit tests for sync settings resolution
 */

import { InMemorySettingsRepository } from '../../db/repositories/memory.js';
import { ValidationError } from '../../utils/errors.js';
import { loadSyncSettings, resolveSyncSettings, saveSyncSettings, toConnectionConfig, type SettingsEnv } from '../syncSettings.js';

const ENV: SettingsEnv = {
    ERP_SERVICE_URL: 'https://erp.test:50000',
    ERP_COMPANY_DB: 'TESTDB',
    ERP_USERNAME: 'manager',
    ERP_API_VERSION: 'v1',
    ERP_ALLOW_HTTP: false,
    ERP_REQUEST_TIMEOUT_MS: 15_000,
};

describe('resolveSyncSettings', () => {
    it('fills defaults around the env connection values', () => {
        const settings = resolveSyncSettings({}, ENV);

        expect(settings).toMatchObject({
            serviceUrl: 'https://erp.test:50000',
            companyDb: 'TESTDB',
            stockSyncInterval: 5,
            autoSyncOrders: true,
            defaultCustomerCode: 'WALKIN',
            defaultWarehouse: null,
            requestTimeoutMs: 15_000,
        });
        expect(Object.isFrozen(settings)).toBe(true);
    });

    it('lets stored values win and clamps numbers into range', () => {
        const settings = resolveSyncSettings(
            { companyDb: 'LIVEDB', stockSyncInterval: '9999', autoSyncOrders: 'no', defaultWarehouse: 'WH01', username: '' },
            ENV,
        );

        expect(settings.companyDb).toBe('LIVEDB');
        expect(settings.stockSyncInterval).toBe(1440);
        expect(settings.autoSyncOrders).toBe(false);
        expect(settings.defaultWarehouse).toBe('WH01');
        expect(settings.username).toBe('manager');
    });

    it('rejects a plain-http service url unless allowed', () => {
        const env = { ...ENV, ERP_SERVICE_URL: 'http://erp.test:50000' };

        const error = (() => {
            try {
                return resolveSyncSettings({}, env);
            } catch (e: unknown) {
                return e;
            }
        })();
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ details: [{ path: 'serviceUrl', message: 'Service URL must use HTTPS' }] });

        expect(resolveSyncSettings({}, { ...env, ERP_ALLOW_HTTP: true }).serviceUrl).toBe('http://erp.test:50000');
    });
});

describe('saveSyncSettings', () => {
    it('stores every key as text and reads back the same settings', async () => {
        const repo = new InMemorySettingsRepository();

        await saveSyncSettings(repo, {
            serviceUrl: 'https://erp.example.com',
            companyDb: 'LIVEDB',
            username: 'sync',
            autoCreateCustomers: false,
        });

        const stored = await repo.getAll();
        expect(stored).toMatchObject({
            serviceUrl: 'https://erp.example.com',
            autoCreateCustomers: 'false',
            stockSyncInterval: '5',
            defaultWarehouse: '',
        });

        const loaded = await loadSyncSettings(repo, ENV);
        expect(loaded.autoCreateCustomers).toBe(false);
        expect(toConnectionConfig(loaded)).toEqual({
            serviceUrl: 'https://erp.example.com',
            companyDb: 'LIVEDB',
            username: 'sync',
            apiVersion: 'v1',
            requestTimeoutMs: 15_000,
        });
    });
});
