// packages/utils/src/bytes.ts
import { base64 } from '@scure/base';

import { FormatError } from './errors.js';

/** Accept hex string, Uint8Array, or number[] and return Uint8Array. */
export function hexToBytes(hex: string | Uint8Array | number[]): Uint8Array {
  if (hex instanceof Uint8Array) return hex;
  if (Array.isArray(hex)) return Uint8Array.from(hex);

  const h = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (h.length % 2 !== 0) throw new FormatError('hexToBytes: hex length must be even');
  if (!/^[0-9a-fA-F]*$/.test(h)) throw new FormatError('hexToBytes: invalid hex character');
  if (h.length === 0) return new Uint8Array();

  const out = new Uint8Array(h.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = Number.parseInt(h.slice(i * 2, i * 2 + 2), 16);
  return out;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/** Concatenate Uint8Array chunks. */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  let totalLen = 0;
  for (const a of arrays) totalLen += a.length;

  const res = new Uint8Array(totalLen);
  let offset = 0;
  for (const a of arrays) {
    res.set(a, offset);
    offset += a.length;
  }
  return res;
}

export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

/** Lexicographic comparison by unsigned byte value; shorter prefix sorts first. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

export function reverseBytes(bytes: Uint8Array): Uint8Array {
  const rev = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) rev[i] = bytes[bytes.length - 1 - i];
  return rev;
}

export function xorBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) throw new FormatError(`xorBytes: length mismatch ${a.length} != ${b.length}`);
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) out[i] = a[i] ^ b[i];
  return out;
}

const textEncoder = new TextEncoder();
// A leading U+FEFF is content, not a byte-order mark.
const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function utf8ToBytes(s: string): Uint8Array {
  return textEncoder.encode(s);
}

export function bytesToUtf8(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (err) {
    throw new FormatError('bytesToUtf8: invalid UTF-8 sequence', { cause: err });
  }
}

export function bytesToBase64(bytes: Uint8Array): string {
  return base64.encode(bytes);
}

export function base64ToBytes(s: string): Uint8Array {
  try {
    return base64.decode(s);
  } catch (err) {
    throw new FormatError('base64ToBytes: invalid base64 string', { cause: err });
  }
}

/**
 * Two's-complement little-endian encoding of a bigint using the fewest bytes
 * that keep the sign bit correct. Zero encodes as a single 0x00 byte.
 */
export function bigIntToSignedLE(value: bigint): Uint8Array {
  if (value === 0n) return new Uint8Array([0]);

  const out: number[] = [];
  let v = value;
  for (;;) {
    const byte = Number(v & 0xffn);
    out.push(byte);
    v >>= 8n;
    const signBit = (byte & 0x80) !== 0;
    if ((v === 0n && !signBit) || (v === -1n && signBit)) break;
  }
  return Uint8Array.from(out);
}

export function signedLEToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;

  let acc = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) acc = (acc << 8n) | BigInt(bytes[i]);

  const negative = (bytes[bytes.length - 1] & 0x80) !== 0;
  return negative ? acc - (1n << BigInt(bytes.length * 8)) : acc;
}
