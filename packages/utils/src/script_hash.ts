// packages/utils/src/script_hash.ts
// Fixed-width identifiers. Bytes are held in wire order (little-endian);
// toString() returns the byte-reversed hex used for display and RPC.

import { arraysEqual, bytesToHex, compareBytes, hexToBytes, reverseBytes } from './bytes.js';
import { FormatError } from './errors.js';
import { hash160, sha256 } from './hash.js';

abstract class FixedHash {
  protected readonly le: Uint8Array;

  protected constructor(bytes: Uint8Array, size: number, label: string) {
    if (bytes.length !== size) {
      throw new FormatError(`${label} must be ${size} bytes, got ${bytes.length}`);
    }
    this.le = Uint8Array.from(bytes);
  }

  /** Wire-order (little-endian) bytes. */
  toLittleEndian(): Uint8Array {
    return Uint8Array.from(this.le);
  }

  /** Display-order (big-endian) bytes. */
  toBigEndian(): Uint8Array {
    return reverseBytes(this.le);
  }

  toString(): string {
    return bytesToHex(this.toBigEndian());
  }

  toJSON(): string {
    return `0x${this.toString()}`;
  }

  compareTo(other: FixedHash): number {
    return compareBytes(this.toBigEndian(), other.toBigEndian());
  }
}

export class Hash160 extends FixedHash {
  static readonly SIZE = 20;
  static readonly ZERO = new Hash160(new Uint8Array(20));

  constructor(littleEndian: Uint8Array) {
    super(littleEndian, Hash160.SIZE, 'Hash160');
  }

  /** Parse display hex (big-endian, optional 0x prefix). */
  static fromHex(hex: string): Hash160 {
    return new Hash160(reverseBytes(hexToBytes(hex)));
  }

  /** Script hash of raw VM bytecode: RIPEMD160(SHA256(script)). */
  static fromScript(script: Uint8Array): Hash160 {
    return new Hash160(hash160(script));
  }

  equals(other: Hash160): boolean {
    return arraysEqual(this.le, other.le);
  }
}

export class Hash256 extends FixedHash {
  static readonly SIZE = 32;
  static readonly ZERO = new Hash256(new Uint8Array(32));

  constructor(littleEndian: Uint8Array) {
    super(littleEndian, Hash256.SIZE, 'Hash256');
  }

  static fromHex(hex: string): Hash256 {
    return new Hash256(reverseBytes(hexToBytes(hex)));
  }

  /** SHA256 of the data, kept in wire order. */
  static digest(data: Uint8Array): Hash256 {
    return new Hash256(sha256(data));
  }

  equals(other: Hash256): boolean {
    return arraysEqual(this.le, other.le);
  }
}
