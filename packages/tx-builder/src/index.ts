// packages/tx-builder/src/index.ts
export * from './constants.js';
export * from './config.js';
export * from './witness_scope.js';
export * from './witness_condition.js';
export * from './witness_rule.js';
export * from './account.js';
export * from './signer.js';
export * from './witness.js';
export * from './transaction_attribute.js';
export * from './transaction.js';
export * from './provider.js';
export * from './transaction_builder.js';
