// packages/utils/src/index.ts
export * from './bytes.js';
export * from './errors.js';
export * from './hash.js';
export * from './base58.js';
export * from './script_hash.js';
export * from './logging.js';
