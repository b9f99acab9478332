// packages/script/src/tests/contract_parameter.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { bytesToHex, ConfigurationError, FormatError, hexToBytes } from '@n3tx/utils';

import {
  ContractParam,
  contractParameterFromJson,
  contractParameterToJson,
  decodeContractParameter,
  encodeContractParameter,
} from '../index.js';
import type { ContractParameter } from '../index.js';

const PUB_1 = '026ff03b949241ce1dadd43519e6960e0a85b41a69a05c328103aa2bce1594ca16';

test('encodeContractParameter: type byte then value', () => {
  assert.equal(bytesToHex(encodeContractParameter(ContractParam.integer(128))), '11028000');
  assert.equal(bytesToHex(encodeContractParameter(ContractParam.integer(-1))), '1101ff');
  assert.equal(bytesToHex(encodeContractParameter(ContractParam.bool(true))), '1001');
  assert.equal(bytesToHex(encodeContractParameter(ContractParam.any())), '00');
  assert.equal(
    bytesToHex(encodeContractParameter(ContractParam.array(ContractParam.bool(true), ContractParam.string('a')))),
    '2002' + '1001' + '130161'
  );
  assert.equal(
    bytesToHex(encodeContractParameter(ContractParam.hash160('d2a4cff31913016155e38e474a2c06d08be276cf'))),
    '14cf76e28bd0062c4a478ee35561011319f3cfa4d2'
  );
});

test('decodeContractParameter: reads back a nested map', () => {
  const p = ContractParam.map([
    [ContractParam.string('key'), ContractParam.array(ContractParam.publicKey(PUB_1), ContractParam.integer(7))],
  ]);
  assert.deepEqual(decodeContractParameter(encodeContractParameter(p)), p);
});

test('decodeContractParameter: string with a leading U+FEFF', () => {
  const p = ContractParam.string('\uFEFFabc');
  assert.equal(bytesToHex(encodeContractParameter(p)), '1306efbbbf616263');
  assert.deepEqual(decodeContractParameter(encodeContractParameter(p)), p);
});

test('ContractParam.integer: at most 32 bytes', () => {
  const max = 2n ** 255n - 1n;
  const min = -(2n ** 255n);
  for (const v of [max, min]) {
    const p = ContractParam.integer(v);
    assert.deepEqual(decodeContractParameter(encodeContractParameter(p)), p);
  }
  assert.throws(() => ContractParam.integer(2n ** 255n), ConfigurationError);
  assert.throws(() => ContractParam.integer(-(2n ** 255n) - 1n), ConfigurationError);
  assert.throws(() => encodeContractParameter({ type: 'Integer', value: 2n ** 260n }), ConfigurationError);
});

test('decodeContractParameter: trailing bytes and unknown types', () => {
  assert.throws(() => decodeContractParameter(hexToBytes('0000')), FormatError);
  assert.throws(() => decodeContractParameter(hexToBytes('30')), FormatError);
  assert.throws(() => decodeContractParameter(hexToBytes('1702' + 'aabb')), FormatError);
});

test('decodeContractParameter: nesting is limited to 16 levels', () => {
  const nested = (levels: number) => hexToBytes('2001'.repeat(levels) + '00');
  const ok = decodeContractParameter(nested(16));
  assert.equal(ok.type, 'Array');
  assert.throws(() => decodeContractParameter(nested(17)), FormatError);
});

test('ContractParam: checked factories', () => {
  assert.throws(() => ContractParam.publicKey('04' + '11'.repeat(32)), ConfigurationError);
  assert.throws(() => ContractParam.signature(new Uint8Array(63)), ConfigurationError);
  assert.throws(() => ContractParam.integer(Number.MAX_SAFE_INTEGER + 1), ConfigurationError);
  assert.throws(() => ContractParam.map([[ContractParam.array(), ContractParam.any()]]), ConfigurationError);
});

test('contractParameterToJson: RPC value encodings', () => {
  const p = ContractParam.array(
    ContractParam.integer(10n ** 20n),
    ContractParam.byteArray('0102'),
    ContractParam.hash160('d2a4cff31913016155e38e474a2c06d08be276cf'),
    ContractParam.map([[ContractParam.string('k'), ContractParam.bool(false)]])
  );
  assert.deepEqual(contractParameterToJson(p), {
    type: 'Array',
    value: [
      { type: 'Integer', value: '100000000000000000000' },
      { type: 'ByteArray', value: 'AQI=' },
      { type: 'Hash160', value: 'd2a4cff31913016155e38e474a2c06d08be276cf' },
      { type: 'Map', value: [{ key: { type: 'String', value: 'k' }, value: { type: 'Boolean', value: false } }] },
    ],
  });
});

test('contractParameterFromJson: inverse of contractParameterToJson', () => {
  const p: ContractParameter = ContractParam.array(
    ContractParam.integer(-5),
    ContractParam.publicKey(PUB_1),
    ContractParam.signature(new Uint8Array(64).fill(7)),
    ContractParam.hash256('00'.repeat(31) + 'ff')
  );
  assert.deepEqual(contractParameterFromJson(contractParameterToJson(p)), p);
});

test('contractParameterFromJson: malformed input', () => {
  assert.throws(() => contractParameterFromJson({ type: 'Integer', value: '1.5' }), FormatError);
  assert.throws(() => contractParameterFromJson({ type: 'Boolean', value: 'yes' }), FormatError);
  assert.throws(() => contractParameterFromJson({ type: 'Nope' }), FormatError);
  assert.throws(() => contractParameterFromJson(null), FormatError);
});
