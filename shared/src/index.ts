/**
 * @erpsync/shared - Domain logic and schemas shared by the sync server
 */

export * from './domain/index.js';
export * from './schemas/index.js';
