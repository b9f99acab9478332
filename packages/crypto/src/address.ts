// packages/crypto/src/address.ts
import { base58checkDecode, base58checkEncode, FormatError, Hash160 } from '@n3tx/utils';
import { buildVerificationScript } from '@n3tx/script';

import { ADDRESS_VERSION } from './constants.js';

/** Address = base58check(version | scriptHash), script hash in wire order. */
export function scriptHashToAddress(scriptHash: Hash160, version: number = ADDRESS_VERSION): string {
  return base58checkEncode(version, scriptHash.toLittleEndian());
}

export function addressToScriptHash(address: string, version: number = ADDRESS_VERSION): Hash160 {
  const { version: v, payload } = base58checkDecode(address);
  if (v !== version) {
    throw new FormatError(`addressToScriptHash: address version 0x${v.toString(16)} != 0x${version.toString(16)}`);
  }
  if (payload.length !== Hash160.SIZE) {
    throw new FormatError(`addressToScriptHash: payload must be ${Hash160.SIZE} bytes, got ${payload.length}`);
  }
  return new Hash160(payload);
}

export function isValidAddress(address: string, version: number = ADDRESS_VERSION): boolean {
  try {
    addressToScriptHash(address, version);
    return true;
  } catch (err) {
    if (err instanceof FormatError) return false;
    throw err;
  }
}

/** Script hash of the single-signature verification script for `publicKey`. */
export function publicKeyToScriptHash(publicKey: Uint8Array): Hash160 {
  return Hash160.fromScript(buildVerificationScript(publicKey));
}

export function publicKeyToAddress(publicKey: Uint8Array, version: number = ADDRESS_VERSION): string {
  return scriptHashToAddress(publicKeyToScriptHash(publicKey), version);
}
