export * from './erpSettings.js';
