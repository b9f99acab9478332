// packages/crypto/src/index.ts
export * from './constants.js';
export * from './wif.js';
export * from './address.js';
export * from './key_pair.js';
export * from './nep2.js';
