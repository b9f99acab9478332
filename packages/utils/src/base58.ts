// packages/utils/src/base58.ts
// Base58 / Base58Check helpers (checksum = first 4 bytes of SHA256(SHA256(data)))

import { base58, createBase58check } from '@scure/base';
import { sha256 } from '@noble/hashes/sha2.js';

import { concat } from './bytes.js';
import { FormatError } from './errors.js';

const b58check = createBase58check(sha256);

export function base58encode(data: Uint8Array): string {
  return base58.encode(data);
}

export function base58decode(str: string): Uint8Array {
  try {
    return base58.decode(str);
  } catch (err) {
    throw new FormatError('base58decode: invalid base58 string', { cause: err });
  }
}

/** Encode raw bytes with a trailing 4-byte checksum. */
export function base58checkEncodeBytes(data: Uint8Array): string {
  return b58check.encode(data);
}

/** Decode and verify the trailing checksum; returns the bytes without it. */
export function base58checkDecodeBytes(str: string): Uint8Array {
  try {
    return b58check.decode(str);
  } catch (err) {
    throw new FormatError('base58checkDecode: invalid string or checksum mismatch', { cause: err });
  }
}

export function base58checkEncode(version: number, payload: Uint8Array): string {
  return base58checkEncodeBytes(concat(new Uint8Array([version]), payload));
}

export function base58checkDecode(str: string): { version: number; payload: Uint8Array } {
  const data = base58checkDecodeBytes(str);
  if (data.length < 1) throw new FormatError('base58checkDecode: empty payload');
  return { version: data[0], payload: data.slice(1) };
}
