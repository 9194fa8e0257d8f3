/**
 * Domain Layer
 *
 * Pure ERP and storefront logic, free of I/O. The server wires these into
 * the sync handlers.
 */

export * from './erp/index.js';
export * from './mappers/index.js';
export * from './orders/erpValidation.js';
export * from './storefront/types.js';
