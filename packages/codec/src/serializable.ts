// packages/codec/src/serializable.ts
import type { BinaryWriter } from './binary_writer.js';
import type { BinaryReader } from './binary_reader.js';

/** Anything with a canonical wire form. `size` must equal the serialized length. */
export interface Serializable {
  readonly size: number;
  serialize(writer: BinaryWriter): void;
}

export type Decoder<T> = (reader: BinaryReader) => T;
