// packages/crypto/src/nep2.ts
// Password-protected private keys:
//   base58check(01 42 E0 | addressHash(4) | AES-256-ECB(key XOR half1, half2))
// where half1|half2 = scrypt(password, addressHash, N, r, p, 64).

import { ecb } from '@noble/ciphers/aes.js';
import { scrypt } from '@noble/hashes/scrypt.js';
import {
  arraysEqual,
  base58checkDecodeBytes,
  base58checkEncodeBytes,
  concat,
  FormatError,
  hash256,
  PassphraseError,
  utf8ToBytes,
  xorBytes,
} from '@n3tx/utils';

import { publicKeyToScriptHash } from './address.js';
import { NEP2_ENCRYPTED_SIZE, NEP2_FLAG, NEP2_PREFIX_1, NEP2_PREFIX_2, PRIVATE_KEY_SIZE } from './constants.js';
import { getPublicKey, KeyPair } from './key_pair.js';

export type ScryptParams = { N: number; r: number; p: number };

export const DEFAULT_SCRYPT_PARAMS: Readonly<ScryptParams> = Object.freeze({ N: 16384, r: 8, p: 8 });

const DERIVED_KEY_SIZE = 64;

/** First four bytes of SHA256(SHA256(scriptHash)) for the key's single-sig account. */
export function addressHash(publicKey: Uint8Array): Uint8Array {
  return hash256(publicKeyToScriptHash(publicKey).toLittleEndian()).slice(0, 4);
}

function deriveKey(password: string, salt: Uint8Array, params: ScryptParams): Uint8Array {
  return scrypt(utf8ToBytes(password), salt, { ...params, dkLen: DERIVED_KEY_SIZE });
}

export function encryptPrivateKey(
  password: string,
  privateKey: Uint8Array,
  params: ScryptParams = DEFAULT_SCRYPT_PARAMS
): string {
  if (privateKey.length !== PRIVATE_KEY_SIZE) {
    throw new FormatError(`encryptPrivateKey: private key must be ${PRIVATE_KEY_SIZE} bytes`);
  }
  const salt = addressHash(getPublicKey(privateKey));
  const derived = deriveKey(password, salt, params);
  const half1 = derived.subarray(0, 32);
  const half2 = derived.subarray(32, 64);

  const encrypted = ecb(half2, { disablePadding: true }).encrypt(xorBytes(privateKey, half1));
  return base58checkEncodeBytes(
    concat(new Uint8Array([NEP2_PREFIX_1, NEP2_PREFIX_2, NEP2_FLAG]), salt, encrypted)
  );
}

export function decryptPrivateKey(
  password: string,
  encryptedKey: string,
  params: ScryptParams = DEFAULT_SCRYPT_PARAMS
): Uint8Array {
  const data = base58checkDecodeBytes(encryptedKey);
  if (data.length !== NEP2_ENCRYPTED_SIZE) {
    throw new FormatError(`decryptPrivateKey: expected ${NEP2_ENCRYPTED_SIZE} bytes, got ${data.length}`);
  }
  if (data[0] !== NEP2_PREFIX_1 || data[1] !== NEP2_PREFIX_2 || data[2] !== NEP2_FLAG) {
    throw new FormatError('decryptPrivateKey: invalid prefix');
  }

  const salt = data.slice(3, 7);
  const derived = deriveKey(password, salt, params);
  const half1 = derived.subarray(0, 32);
  const half2 = derived.subarray(32, 64);

  const privateKey = xorBytes(ecb(half2, { disablePadding: true }).decrypt(data.subarray(7)), half1);

  let publicKey: Uint8Array;
  try {
    publicKey = getPublicKey(privateKey);
  } catch (err) {
    // a wrong password usually yields a valid scalar, but not always
    throw new PassphraseError(undefined, { cause: err });
  }
  if (!arraysEqual(addressHash(publicKey), salt)) throw new PassphraseError();
  return privateKey;
}

export function encryptKeyPair(password: string, keyPair: KeyPair, params?: ScryptParams): string {
  return encryptPrivateKey(password, keyPair.privateKey, params);
}

export function decryptKeyPair(password: string, encryptedKey: string, params?: ScryptParams): KeyPair {
  return KeyPair.fromPrivateKey(decryptPrivateKey(password, encryptedKey, params));
}
