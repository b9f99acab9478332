// packages/codec/src/index.ts
export * from './varint.js';
export * from './binary_writer.js';
export * from './binary_reader.js';
export type { Serializable, Decoder } from './serializable.js';
