export * from './orderMapper.js';
export * from './customerMapper.js';
