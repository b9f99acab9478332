// packages/codec/src/binary_reader.ts
import { bytesToUtf8, FormatError, OutOfBoundsError, signedLEToBigInt } from '@n3tx/utils';

import type { Decoder } from './serializable.js';

// VM push opcodes understood by the readPush* helpers.
const PUSHINT8 = 0x00;
const PUSHINT256 = 0x05;
const PUSHDATA1 = 0x0c;
const PUSHDATA2 = 0x0d;
const PUSHDATA4 = 0x0e;
const PUSHM1 = 0x0f;
const PUSH0 = 0x10;
const PUSH16 = 0x20;

const PUSHINT_WIDTHS = [1, 2, 4, 8, 16, 32] as const;

/**
 * Little-endian reader over a borrowed byte slice.
 *
 * Every read is bounds-checked and throws OutOfBoundsError instead of
 * returning short data. mark()/reset() rewind to a checkpoint for speculative
 * parses.
 */
export class BinaryReader {
  private readonly data: Uint8Array;
  private pos = 0;
  private marker = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get position(): number {
    return this.pos;
  }

  get available(): number {
    return this.data.length - this.pos;
  }

  get length(): number {
    return this.data.length;
  }

  mark(): void {
    this.marker = this.pos;
  }

  reset(): void {
    this.pos = this.marker;
  }

  private take(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0 || n > this.available) {
      throw new OutOfBoundsError(this.pos, n, this.available);
    }
    const out = this.data.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  private view(n: number): DataView {
    const bytes = this.take(n);
    return new DataView(bytes.buffer, bytes.byteOffset, n);
  }

  readU8(): number {
    return this.take(1)[0];
  }

  readBool(): boolean {
    const b = this.readU8();
    if (b > 1) throw new FormatError(`readBool: invalid boolean byte 0x${b.toString(16)}`);
    return b === 1;
  }

  readU16(): number {
    return this.view(2).getUint16(0, true);
  }

  readU32(): number {
    return this.view(4).getUint32(0, true);
  }

  readI32(): number {
    return this.view(4).getInt32(0, true);
  }

  readU64(): bigint {
    return this.view(8).getBigUint64(0, true);
  }

  readI64(): bigint {
    return this.view(8).getBigInt64(0, true);
  }

  /** Copy of the next `count` bytes. */
  readBytes(count: number): Uint8Array {
    return Uint8Array.from(this.take(count));
  }

  readVarInt(max: number = Number.MAX_SAFE_INTEGER): number {
    const fb = this.readU8();
    let value: bigint;
    if (fb < 0xfd) value = BigInt(fb);
    else if (fb === 0xfd) value = BigInt(this.readU16());
    else if (fb === 0xfe) value = BigInt(this.readU32());
    else value = this.readU64();

    if (value > BigInt(max)) {
      throw new FormatError(`readVarInt: ${value} exceeds maximum ${max}`);
    }
    return Number(value);
  }

  /** Length-prefixed bytes; a declared length past the end fails without consuming data. */
  readVarBytes(max: number = Number.MAX_SAFE_INTEGER): Uint8Array {
    const start = this.pos;
    const len = this.readVarInt(max);
    if (len > this.available) {
      const avail = this.available;
      this.pos = start;
      throw new OutOfBoundsError(start, len, avail);
    }
    return this.readBytes(len);
  }

  readVarString(max?: number): string {
    return bytesToUtf8(this.readVarBytes(max));
  }

  /** Fixed-width zero-padded string; trailing zero bytes are stripped. */
  readFixedString(width: number): string {
    const bytes = this.take(width);
    let end = bytes.length;
    while (end > 0 && bytes[end - 1] === 0) end--;
    return bytesToUtf8(bytes.subarray(0, end));
  }

  /** 33-byte compressed EC point. */
  readEncodedEcPoint(): Uint8Array {
    if (this.available < 1) throw new OutOfBoundsError(this.pos, 1, 0);
    const prefix = this.data[this.pos];
    if (prefix !== 0x02 && prefix !== 0x03) {
      throw new FormatError(`readEncodedEcPoint: invalid point prefix 0x${prefix.toString(16)}`);
    }
    return this.readBytes(33);
  }

  /** Payload of a PUSHDATA1/2/4 instruction. */
  readPushData(): Uint8Array {
    const op = this.readU8();
    let len: number;
    if (op === PUSHDATA1) len = this.readU8();
    else if (op === PUSHDATA2) len = this.readU16();
    else if (op === PUSHDATA4) len = this.readU32();
    else throw new FormatError(`readPushData: expected PUSHDATA opcode, got 0x${op.toString(16)}`);
    return this.readBytes(len);
  }

  readPushString(): string {
    return bytesToUtf8(this.readPushData());
  }

  /** Value of a PUSHM1/PUSH0..PUSH16 or PUSHINT8..PUSHINT256 instruction. */
  readPushInteger(): bigint {
    const op = this.readU8();
    if (op === PUSHM1) return -1n;
    if (op >= PUSH0 && op <= PUSH16) return BigInt(op - PUSH0);
    if (op >= PUSHINT8 && op <= PUSHINT256) {
      return signedLEToBigInt(this.readBytes(PUSHINT_WIDTHS[op - PUSHINT8]));
    }
    throw new FormatError(`readPushInteger: expected integer push opcode, got 0x${op.toString(16)}`);
  }

  readSerializableList<T>(decode: Decoder<T>, max: number = Number.MAX_SAFE_INTEGER): T[] {
    const count = this.readVarInt(max);
    const out: T[] = [];
    for (let i = 0; i < count; i++) out.push(decode(this));
    return out;
  }
}
