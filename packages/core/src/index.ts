export * from './errors/index.js';
export * from './types/chain.js';
export * from './types/chain-context.js';
export * from './types/transfer.js';
export * from './utils/decimal-utils.js';
export * from './utils/error-utils.js';
