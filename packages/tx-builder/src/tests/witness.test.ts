// packages/tx-builder/src/tests/witness.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { BinaryReader, serializeToBytes } from '@n3tx/codec';
import { KeyPair } from '@n3tx/crypto';
import { ContractParam, VerificationScript } from '@n3tx/script';
import { bytesToHex, ConfigurationError, hexToBytes, utf8ToBytes } from '@n3tx/utils';

import { Witness } from '../index.js';

const kp1 = KeyPair.fromPrivateKey(hexToBytes('01'.repeat(32)));
const kp2 = KeyPair.fromPrivateKey(hexToBytes('02'.repeat(32)));
const kp3 = KeyPair.fromPrivateKey(hexToBytes('03'.repeat(32)));

test('Witness.create: signature push plus single-sig verification script', () => {
  const msg = utf8ToBytes('test-message');
  const w = Witness.create(msg, kp1);
  const sigs = w.invocationScript.getSignatures();
  assert.equal(sigs.length, 1);
  assert.ok(kp1.verify(msg, sigs[0]));
  assert.ok(w.verificationScript.isSingleSig());
  assert.equal(w.scriptHash?.toString(), '902e0d38da5e513b6d07c1c55b85e77d3dce8063');
  assert.equal(w.size, 67 + 41);
});

test('Witness.createMultiSigWitness: only the first threshold signatures', () => {
  const vs = VerificationScript.fromMultiSig([kp1, kp2, kp3].map((k) => k.publicKey), 2);
  const msg = utf8ToBytes('test-message');
  const sigs = [kp2, kp3, kp1].map((k) => k.sign(msg));
  const w = Witness.createMultiSigWitness(sigs, vs);
  assert.deepEqual(w.invocationScript.getSignatures(), sigs.slice(0, 2));
  assert.equal(w.scriptHash?.toString(), 'c96981fe9b114e393dcc13a2ca4df5e5cb6a77f1');
});

test('Witness.createMultiSigWitness: too few signatures', () => {
  const vs = VerificationScript.fromMultiSig([kp1, kp2, kp3].map((k) => k.publicKey), 2);
  assert.throws(() => Witness.createMultiSigWitness([kp1.sign(utf8ToBytes('x'))], vs), ConfigurationError);
});

test('Witness.createContractWitness: verify arguments in declared order', () => {
  const w = Witness.createContractWitness([ContractParam.integer(5), ContractParam.string('a')]);
  assert.equal(bytesToHex(w.invocationScript.script), '15' + '0c0161');
  assert.ok(w.verificationScript.isEmpty);
  assert.equal(w.scriptHash, undefined);
});

test('Witness.createContractWitness: no arguments is an empty witness', () => {
  const w = Witness.createContractWitness([]);
  assert.equal(bytesToHex(serializeToBytes(w)), '0000');
  assert.equal(w.size, 2);
});

test('Witness.decode: reads what serialize wrote', () => {
  const w = Witness.create(utf8ToBytes('test-message'), kp1);
  const bytes = serializeToBytes(w);
  const back = Witness.decode(new BinaryReader(bytes));
  assert.ok(back.invocationScript.equals(w.invocationScript));
  assert.ok(back.verificationScript.equals(w.verificationScript));
});
