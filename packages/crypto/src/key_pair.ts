// packages/crypto/src/key_pair.ts
import { p256 } from '@noble/curves/nist.js';
import { arraysEqual, FormatError, Hash160, sha256 } from '@n3tx/utils';
import { buildVerificationScript } from '@n3tx/script';

import { publicKeyToAddress, publicKeyToScriptHash } from './address.js';
import { ADDRESS_VERSION, PRIVATE_KEY_SIZE } from './constants.js';
import { privateKeyToWif, wifToPrivateKey } from './wif.js';

/**
 * ECDSA over SHA-256(message) on secp256r1. Signatures are 64-byte
 * r|s; the message is hashed here, so callers pass raw signing data.
 */
export function signMessage(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
  return p256.sign(sha256(message), privateKey, { prehash: false });
}

export function verifySignature(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
  if (signature.length !== 64) return false;
  try {
    return p256.verify(signature, sha256(message), publicKey, { prehash: false, lowS: false });
  } catch {
    // malformed public key
    return false;
  }
}

/** Compressed 33-byte public key. */
export function getPublicKey(privateKey: Uint8Array): Uint8Array {
  if (privateKey.length !== PRIVATE_KEY_SIZE || !p256.utils.isValidSecretKey(privateKey)) {
    throw new FormatError('getPublicKey: invalid P-256 private key');
  }
  return p256.getPublicKey(privateKey, true);
}

export class KeyPair {
  readonly privateKey: Uint8Array;
  readonly publicKey: Uint8Array;

  private constructor(privateKey: Uint8Array) {
    this.publicKey = getPublicKey(privateKey);
    this.privateKey = Uint8Array.from(privateKey);
  }

  static generate(): KeyPair {
    return new KeyPair(p256.utils.randomSecretKey());
  }

  static fromPrivateKey(privateKey: Uint8Array): KeyPair {
    return new KeyPair(privateKey);
  }

  static fromWif(wif: string): KeyPair {
    return new KeyPair(wifToPrivateKey(wif));
  }

  get verificationScript(): Uint8Array {
    return buildVerificationScript(this.publicKey);
  }

  get scriptHash(): Hash160 {
    return publicKeyToScriptHash(this.publicKey);
  }

  address(version: number = ADDRESS_VERSION): string {
    return publicKeyToAddress(this.publicKey, version);
  }

  exportWif(): string {
    return privateKeyToWif(this.privateKey);
  }

  sign(message: Uint8Array): Uint8Array {
    return signMessage(message, this.privateKey);
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return verifySignature(message, signature, this.publicKey);
  }

  equals(other: KeyPair): boolean {
    return arraysEqual(this.privateKey, other.privateKey);
  }
}
