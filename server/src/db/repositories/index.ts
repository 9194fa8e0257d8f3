import type { Kysely } from 'kysely';
import type { DB } from '../types.js';
import { KyselyCustomerMappingRepository } from './customerMappingRepository.js';
import { KyselyDeadLetterRepository } from './deadLetterRepository.js';
import { KyselyOrderMappingRepository } from './orderMappingRepository.js';
import { KyselyProductMappingRepository } from './productMappingRepository.js';
import { KyselySettingsRepository } from './settingsRepository.js';
import { KyselySyncLogRepository } from './syncLogRepository.js';
import type { Repositories } from './types.js';

export function createKyselyRepositories(db: Kysely<DB>): Repositories {
    return {
        settings: new KyselySettingsRepository(db),
        orderMappings: new KyselyOrderMappingRepository(db),
        productMappings: new KyselyProductMappingRepository(db),
        customerMappings: new KyselyCustomerMappingRepository(db),
        syncLog: new KyselySyncLogRepository(db),
        deadLetters: new KyselyDeadLetterRepository(db),
    };
}

export { createInMemoryRepositories } from './memory.js';
export * from './types.js';
