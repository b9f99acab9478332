// packages/crypto/src/wif.ts
import { base58checkDecodeBytes, base58checkEncodeBytes, concat, FormatError } from '@n3tx/utils';

import { PRIVATE_KEY_SIZE, WIF_COMPRESSED_FLAG, WIF_VERSION } from './constants.js';

/** WIF = base58check(0x80 | key(32) | 0x01) */
export function privateKeyToWif(privateKey: Uint8Array): string {
  if (privateKey.length !== PRIVATE_KEY_SIZE) {
    throw new FormatError(`privateKeyToWif: private key must be ${PRIVATE_KEY_SIZE} bytes, got ${privateKey.length}`);
  }
  return base58checkEncodeBytes(
    concat(new Uint8Array([WIF_VERSION]), privateKey, new Uint8Array([WIF_COMPRESSED_FLAG]))
  );
}

export function wifToPrivateKey(wif: string): Uint8Array {
  const data = base58checkDecodeBytes(wif);
  if (data.length !== PRIVATE_KEY_SIZE + 2) {
    throw new FormatError(`wifToPrivateKey: expected ${PRIVATE_KEY_SIZE + 2} bytes, got ${data.length}`);
  }
  if (data[0] !== WIF_VERSION || data[data.length - 1] !== WIF_COMPRESSED_FLAG) {
    throw new FormatError('wifToPrivateKey: not a compressed-key WIF');
  }
  return data.slice(1, 1 + PRIVATE_KEY_SIZE);
}
