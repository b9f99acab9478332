// packages/codec/src/binary_writer.ts
import { FormatError, utf8ToBytes } from '@n3tx/utils';

import type { Serializable } from './serializable.js';
import { encodeVarInt, MAX_U64, varIntSize } from './varint.js';

const INITIAL_CAPACITY = 64;

const MIN_I64 = -(1n << 63n);
const MAX_I64 = (1n << 63n) - 1n;

function checkRange(label: string, v: number, max: number): void {
  if (!Number.isInteger(v) || v < 0 || v > max) {
    throw new FormatError(`${label}: ${v} out of range 0..${max}`);
  }
}

/**
 * Little-endian byte writer over a growable buffer.
 * All write methods return `this` so calls can be chained.
 */
export class BinaryWriter {
  private buf: Uint8Array;
  private len = 0;

  constructor(capacity = INITIAL_CAPACITY) {
    this.buf = new Uint8Array(Math.max(1, capacity));
  }

  get size(): number {
    return this.len;
  }

  private ensure(extra: number): void {
    const need = this.len + extra;
    if (need <= this.buf.length) return;

    let cap = this.buf.length * 2;
    while (cap < need) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }

  private view(width: number): DataView {
    this.ensure(width);
    const v = new DataView(this.buf.buffer, this.buf.byteOffset + this.len, width);
    this.len += width;
    return v;
  }

  writeU8(v: number): this {
    checkRange('writeU8', v, 0xff);
    this.ensure(1);
    this.buf[this.len++] = v;
    return this;
  }

  writeBool(v: boolean): this {
    return this.writeU8(v ? 1 : 0);
  }

  writeU16(v: number): this {
    checkRange('writeU16', v, 0xffff);
    this.view(2).setUint16(0, v, true);
    return this;
  }

  writeU32(v: number): this {
    checkRange('writeU32', v, 0xffff_ffff);
    this.view(4).setUint32(0, v, true);
    return this;
  }

  writeI32(v: number): this {
    if (!Number.isInteger(v) || v < -0x8000_0000 || v > 0x7fff_ffff) {
      throw new FormatError(`writeI32: ${v} out of range`);
    }
    this.view(4).setInt32(0, v, true);
    return this;
  }

  writeU64(v: bigint | number): this {
    const b = BigInt(v);
    if (b < 0n || b > MAX_U64) throw new FormatError(`writeU64: ${b} out of range`);
    this.view(8).setBigUint64(0, b, true);
    return this;
  }

  writeI64(v: bigint | number): this {
    const b = BigInt(v);
    if (b < MIN_I64 || b > MAX_I64) throw new FormatError(`writeI64: ${b} out of range`);
    this.view(8).setBigInt64(0, b, true);
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
    return this;
  }

  writeVarInt(v: number | bigint): this {
    return this.writeBytes(encodeVarInt(v));
  }

  writeVarBytes(bytes: Uint8Array): this {
    return this.writeVarInt(bytes.length).writeBytes(bytes);
  }

  writeVarString(s: string): this {
    return this.writeVarBytes(utf8ToBytes(s));
  }

  /** UTF-8 bytes zero-padded to exactly `width`; longer strings are rejected. */
  writeFixedString(s: string, width: number): this {
    const bytes = utf8ToBytes(s);
    if (bytes.length > width) {
      throw new FormatError(`writeFixedString: ${bytes.length} bytes exceed fixed width ${width}`);
    }
    const padded = new Uint8Array(width);
    padded.set(bytes);
    return this.writeBytes(padded);
  }

  writeSerializable(item: Serializable): this {
    item.serialize(this);
    return this;
  }

  writeSerializableList(items: readonly Serializable[]): this {
    this.writeVarInt(items.length);
    for (const item of items) item.serialize(this);
    return this;
  }

  reset(): void {
    this.len = 0;
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

export function serializeToBytes(item: Serializable): Uint8Array {
  return new BinaryWriter(item.size).writeSerializable(item).toBytes();
}

/** Serialized length of a var-int-prefixed list. */
export function serializableListSize(items: readonly Serializable[]): number {
  let total = varIntSize(items.length);
  for (const item of items) total += item.size;
  return total;
}
