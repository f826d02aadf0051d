export * from './domain/market.js';
export * from './domain/order.js';
export * from './domain/trade.js';
export * from './domain/transaction.js';
export * from './errors/index.js';
export * from './schemas/primitives.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
