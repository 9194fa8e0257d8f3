export * from './types.js';
export * from './formatting.js';
export * from './queryBuilder.js';
export * from './responseNormalizer.js';
