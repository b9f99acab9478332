// packages/tx-builder/src/tests/signers.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { BinaryReader, serializeToBytes } from '@n3tx/codec';
import { KeyPair } from '@n3tx/crypto';
import { bytesToHex, ConfigurationError, FormatError, Hash160, hexToBytes } from '@n3tx/utils';

import {
  Account,
  AccountSigner,
  assertUniqueSigners,
  ContractSigner,
  extractScopes,
  scopesToString,
  Signer,
  TransactionSigner,
  WitnessConditions as C,
  WitnessRule,
  WitnessScope,
} from '../index.js';

const GAS = Hash160.fromHex('d2a4cff31913016155e38e474a2c06d08be276cf');
const GAS_LE = 'cf76e28bd0062c4a478ee35561011319f3cfa4d2';
const HASH_1_LE = '6380ce3d7de7855bc5c1076d3b515eda380d2e90';
const PUB_2 = '02550f471003f3df97c3df506ac797f6721fb1a1fb7b8f6f83d224498a65c88e24';

const account1 = Account.fromKeyPair(KeyPair.fromPrivateKey(hexToBytes('01'.repeat(32))));

test('extractScopes: flags of a scope byte', () => {
  assert.deepEqual(extractScopes(0), [WitnessScope.None]);
  assert.deepEqual(extractScopes(0x31), [WitnessScope.CalledByEntry, WitnessScope.CustomContracts, WitnessScope.CustomGroups]);
  assert.deepEqual(extractScopes(0x80), [WitnessScope.Global]);
});

test('extractScopes: unknown bits and Global with other flags fail', () => {
  assert.throws(() => extractScopes(0x02), FormatError);
  assert.throws(() => extractScopes(0x81), FormatError);
});

test('scopesToString: comma-joined names', () => {
  assert.equal(scopesToString(0x11), 'CalledByEntry,CustomContracts');
  assert.equal(scopesToString(0), 'None');
  assert.equal(scopesToString(0x80), 'Global');
});

test('AccountSigner.calledByEntry: hash and scope byte', () => {
  const s = AccountSigner.calledByEntry(account1);
  assert.equal(bytesToHex(serializeToBytes(s)), HASH_1_LE + '01');
  assert.equal(s.size, 21);
  assert.ok(s.hasScope(WitnessScope.CalledByEntry));
  assert.ok(!s.hasScope(WitnessScope.None));
});

test('setAllowedContracts: adds the CustomContracts flag and list', () => {
  const s = AccountSigner.calledByEntry(account1).setAllowedContracts(GAS);
  assert.equal(s.scope, 0x11);
  assert.equal(bytesToHex(serializeToBytes(s)), HASH_1_LE + '11' + '01' + GAS_LE);
  assert.equal(s.size, 42);
  assert.deepEqual(s.toJSON(), {
    account: '0x902e0d38da5e513b6d07c1c55b85e77d3dce8063',
    scopes: 'CalledByEntry,CustomContracts',
    allowedcontracts: ['0xd2a4cff31913016155e38e474a2c06d08be276cf'],
  });
});

test('setAllowedGroups/setRules: lists follow in flag order', () => {
  const s = AccountSigner.none(account1)
    .setRules(WitnessRule.allow(C.boolean(true)))
    .setAllowedGroups(PUB_2);
  assert.equal(s.scope, 0x60);
  assert.equal(bytesToHex(serializeToBytes(s)), HASH_1_LE + '60' + '01' + PUB_2 + '01' + '01' + '0001');
  assert.equal(s.size, serializeToBytes(s).length);
});

test('Global signer: cannot be narrowed', () => {
  const s = AccountSigner.global(account1);
  assert.throws(() => s.setAllowedContracts(GAS), ConfigurationError);
  assert.throws(() => s.setAllowedGroups(PUB_2), ConfigurationError);
  assert.throws(() => s.setRules(WitnessRule.allow(C.calledByEntry())), ConfigurationError);
  assert.equal(s.scope, WitnessScope.Global);
  assert.equal(s.allowedContracts.length, 0);
});

test('setAllowedContracts: more than 16 entries leaves the signer unchanged', () => {
  const s = AccountSigner.calledByEntry(account1).setAllowedContracts(GAS);
  const many = Array.from({ length: 16 }, () => GAS);
  assert.throws(() => s.setAllowedContracts(...many), ConfigurationError);
  assert.equal(s.allowedContracts.length, 1);

  const fresh = AccountSigner.calledByEntry(account1);
  assert.throws(() => fresh.setAllowedContracts(...many, GAS), ConfigurationError);
  assert.equal(fresh.scope, WitnessScope.CalledByEntry);
});

test('setAllowedContracts: exactly 16 entries are accepted', () => {
  const s = AccountSigner.calledByEntry(account1).setAllowedContracts(...Array.from({ length: 16 }, () => GAS));
  assert.equal(s.allowedContracts.length, 16);
  assert.equal(s.size, 21 + 1 + 16 * 20);
});

test('setAllowedGroups: 16 entries pass, a 17th fails', () => {
  const s = AccountSigner.calledByEntry(account1).setAllowedGroups(...Array.from({ length: 16 }, () => PUB_2));
  assert.equal(s.allowedGroups.length, 16);
  assert.equal(s.scope, 0x21);
  assert.throws(() => s.setAllowedGroups(PUB_2), ConfigurationError);
  assert.equal(s.allowedGroups.length, 16);
});

test('setRules: 16 entries pass, a 17th fails', () => {
  const rule = WitnessRule.allow(C.calledByEntry());
  const s = AccountSigner.none(account1).setRules(...Array.from({ length: 16 }, () => rule));
  assert.equal(s.rules.length, 16);
  assert.equal(s.scope, WitnessScope.WitnessRules);
  assert.throws(() => s.setRules(rule), ConfigurationError);
  assert.equal(s.rules.length, 16);

  const fresh = AccountSigner.none(account1);
  assert.throws(() => fresh.setRules(...Array.from({ length: 17 }, () => rule)), ConfigurationError);
  assert.equal(fresh.scope, WitnessScope.None);
});

test('snapshot: same kind and bytes, independent lists', () => {
  const s = AccountSigner.calledByEntry(account1).setAllowedContracts(GAS);
  const copy = s.snapshot();
  assert.ok(copy instanceof AccountSigner);
  assert.equal(copy.account, account1);
  assert.equal(bytesToHex(serializeToBytes(copy)), bytesToHex(serializeToBytes(s)));

  s.setAllowedGroups(PUB_2);
  assert.equal(copy.scope, 0x11);
  assert.equal(copy.allowedGroups.length, 0);

  const c = ContractSigner.calledByEntry(GAS).snapshot();
  assert.ok(c instanceof ContractSigner);
  assert.equal(c.scope, WitnessScope.CalledByEntry);
});

test('setAllowedGroups: rejects keys that are not compressed points', () => {
  assert.throws(() => AccountSigner.calledByEntry(account1).setAllowedGroups('04' + '00'.repeat(32)), ConfigurationError);
});

test('Signer.decode: wire form back to a TransactionSigner', () => {
  const s = AccountSigner.calledByEntry(account1)
    .setAllowedContracts(GAS)
    .setAllowedGroups(PUB_2)
    .setRules(WitnessRule.deny(C.calledByContract(GAS)));
  const bytes = serializeToBytes(s);
  const back = Signer.decode(new BinaryReader(bytes));
  assert.ok(back instanceof TransactionSigner);
  assert.ok(back.signerHash.equals(account1.scriptHash));
  assert.equal(back.scope, s.scope);
  assert.equal(bytesToHex(serializeToBytes(back)), bytesToHex(bytes));
});

test('Signer.decode: invalid scope byte is a FormatError', () => {
  assert.throws(() => Signer.decode(new BinaryReader(hexToBytes(HASH_1_LE + '81'))), FormatError);
});

test('ContractSigner: keeps its verify parameters', () => {
  const s = ContractSigner.calledByEntry(GAS);
  assert.ok(s.signerHash.equals(GAS));
  assert.equal(s.verifyParams.length, 0);
  assert.equal(ContractSigner.global(GAS).scope, WitnessScope.Global);
});

test('assertUniqueSigners: the same hash twice fails', () => {
  assert.throws(
    () => assertUniqueSigners([AccountSigner.calledByEntry(account1), AccountSigner.global(account1)]),
    ConfigurationError
  );
  assert.doesNotThrow(() => assertUniqueSigners([AccountSigner.calledByEntry(account1), ContractSigner.calledByEntry(GAS)]));
});
