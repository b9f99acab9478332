// packages/crypto/src/tests/nep2.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { base58checkDecodeBytes, base58checkEncodeBytes, bytesToHex, FormatError, hexToBytes, PassphraseError } from '@n3tx/utils';

import { addressHash, decryptKeyPair, decryptPrivateKey, encryptKeyPair, encryptPrivateKey, KeyPair } from '../index.js';
import type { ScryptParams } from '../index.js';

// Cheap parameters so the suite stays fast; the default set is exercised once below.
const FAST: ScryptParams = { N: 16, r: 1, p: 1 };

const SK_1 = hexToBytes('01'.repeat(32));
const PUB_1 = '026ff03b949241ce1dadd43519e6960e0a85b41a69a05c328103aa2bce1594ca16';

test('addressHash: first four bytes of hash256(scriptHash)', () => {
  assert.equal(bytesToHex(addressHash(hexToBytes(PUB_1))), '3f31d58a');
});

test('encryptPrivateKey: prefix, address hash and 32-byte body', () => {
  const enc = encryptPrivateKey('test-secret', SK_1, FAST);
  const raw = base58checkDecodeBytes(enc);
  assert.equal(raw.length, 39);
  assert.equal(bytesToHex(raw.subarray(0, 3)), '0142e0');
  assert.equal(bytesToHex(raw.subarray(3, 7)), '3f31d58a');
  assert.ok(enc.startsWith('6P'));
  assert.equal(encryptPrivateKey('test-secret', SK_1, FAST), enc);
});

test('decryptPrivateKey: recovers the key with the right password', () => {
  const enc = encryptPrivateKey('test-secret', SK_1, FAST);
  assert.deepEqual(decryptPrivateKey('test-secret', enc, FAST), SK_1);
});

test('decryptPrivateKey: wrong password is a PassphraseError', () => {
  const enc = encryptPrivateKey('test-secret', SK_1, FAST);
  assert.throws(() => decryptPrivateKey('wrong-secret', enc, FAST), PassphraseError);
});

test('decryptPrivateKey: scrypt parameters must match', () => {
  const enc = encryptPrivateKey('test-secret', SK_1, FAST);
  assert.throws(() => decryptPrivateKey('test-secret', enc, { N: 32, r: 1, p: 1 }), PassphraseError);
});

test('decryptPrivateKey: bad length or prefix is a FormatError', () => {
  const raw = base58checkDecodeBytes(encryptPrivateKey('test-secret', SK_1, FAST));
  assert.throws(() => decryptPrivateKey('test-secret', base58checkEncodeBytes(raw.subarray(0, 38)), FAST), FormatError);

  const badPrefix = Uint8Array.from(raw);
  badPrefix[2] = 0xc0;
  assert.throws(() => decryptPrivateKey('test-secret', base58checkEncodeBytes(badPrefix), FAST), FormatError);
  assert.throws(() => decryptPrivateKey('test-secret', 'not-base58!', FAST), FormatError);
});

test('encryptKeyPair/decryptKeyPair: default scrypt parameters', () => {
  const kp = KeyPair.fromPrivateKey(hexToBytes('03'.repeat(32)));
  const enc = encryptKeyPair('test-secret', kp);
  assert.equal(bytesToHex(base58checkDecodeBytes(enc).subarray(3, 7)), '36a09a9d');
  assert.ok(decryptKeyPair('test-secret', enc).equals(kp));
});
