// packages/tx-builder/src/tests/account.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { encryptKeyPair, KeyPair } from '@n3tx/crypto';
import { ConfigurationError, FormatError, Hash160, hexToBytes, PassphraseError } from '@n3tx/utils';

import { Account, loadTxConfig } from '../index.js';

const WIF_1 = 'KwFfNUhSDaASSAwtG7ssQM1uVX8RgX5GHWnnLfhfiQDigjioWXHH';
const ADDR_1 = 'NUz6PKTAM7NbPJzkKJFNay3VckQtcDkgWo';

const keys = ['01', '02', '03'].map((b) => KeyPair.fromPrivateKey(hexToBytes(b.repeat(32))).publicKey);

test('Account.fromWif: single-sig account with key', () => {
  const a = Account.fromWif(WIF_1);
  assert.equal(a.address(), ADDR_1);
  assert.equal(a.scriptHash.toString(), '902e0d38da5e513b6d07c1c55b85e77d3dce8063');
  assert.ok(a.keyPair);
  assert.equal(a.isMultiSig, false);
  assert.equal(a.signingThreshold, 1);
  assert.equal(a.nrOfParticipants, 1);
});

test('Account.createMultiSigAccount: 2-of-3', () => {
  const a = Account.createMultiSigAccount(keys, 2);
  assert.equal(a.address(), 'Nhvj6Ek884FF9mWHAvGdKNMX5rHkzTEAFY');
  assert.ok(a.isMultiSig);
  assert.equal(a.signingThreshold, 2);
  assert.equal(a.nrOfParticipants, 3);
  assert.equal(a.keyPair, undefined);
});

test('Account.fromAddress: watch-only', () => {
  const a = Account.fromAddress(ADDR_1);
  assert.ok(a.scriptHash.equals(Hash160.fromHex('902e0d38da5e513b6d07c1c55b85e77d3dce8063')));
  assert.equal(a.verificationScript, undefined);
  assert.equal(a.isMultiSig, false);
  assert.throws(() => a.signingThreshold, ConfigurationError);
  assert.throws(() => a.encryptPrivateKey('test-secret'), ConfigurationError);
  assert.throws(() => Account.fromAddress('NUz6PKTAM7NbPJzkKJFNay3VckQtcDkgWp'), FormatError);
});

test('Account.encryptPrivateKey/fromEncryptedKey', () => {
  const config = { scrypt: { N: 16, r: 1, p: 1 } };
  const a = Account.fromWif(WIF_1);
  const enc = a.encryptPrivateKey('test-secret', config);
  const back = Account.fromEncryptedKey(enc, 'test-secret', config);
  assert.equal(back.address(), ADDR_1);
  assert.equal(back.keyPair?.exportWif(), WIF_1);
});

test('Account.fromEncryptedKey: scrypt parameters come from the config', () => {
  const config = loadTxConfig({ N3TX_SCRYPT_N: '32', N3TX_SCRYPT_R: '2', N3TX_SCRYPT_P: '1' });
  const enc = Account.fromWif(WIF_1).encryptPrivateKey('test-secret', config);
  assert.equal(enc, encryptKeyPair('test-secret', KeyPair.fromWif(WIF_1), { N: 32, r: 2, p: 1 }));
  assert.equal(Account.fromEncryptedKey(enc, 'test-secret', config).address(), ADDR_1);
  assert.throws(
    () => Account.fromEncryptedKey(enc, 'test-secret', { scrypt: { N: 16, r: 2, p: 1 } }),
    PassphraseError
  );
});
