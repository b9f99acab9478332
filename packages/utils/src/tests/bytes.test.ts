// packages/utils/src/tests/bytes.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import {
  base64ToBytes,
  bigIntToSignedLE,
  bytesToBase64,
  bytesToHex,
  bytesToUtf8,
  compareBytes,
  concat,
  FormatError,
  hexToBytes,
  reverseBytes,
  signedLEToBigInt,
  xorBytes,
} from '../index.js';

test('hexToBytes: accepts 0x prefix and mixed case', () => {
  assert.deepEqual(hexToBytes('0xDeAd01'), Uint8Array.from([0xde, 0xad, 0x01]));
  assert.deepEqual(hexToBytes(''), new Uint8Array());
});

test('hexToBytes: rejects odd length and non-hex characters', () => {
  assert.throws(() => hexToBytes('abc'), FormatError);
  assert.throws(() => hexToBytes('zz'), FormatError);
});

test('hexToBytes: passes Uint8Array through and copies number[]', () => {
  const u8 = Uint8Array.from([1, 2]);
  assert.equal(hexToBytes(u8), u8);
  assert.deepEqual(hexToBytes([3, 4]), Uint8Array.from([3, 4]));
});

test('bytesToHex: zero-pads each byte', () => {
  assert.equal(bytesToHex(Uint8Array.from([0, 1, 0xab])), '0001ab');
});

test('concat/reverseBytes', () => {
  const out = concat(Uint8Array.from([1]), new Uint8Array(), Uint8Array.from([2, 3]));
  assert.equal(bytesToHex(out), '010203');
  assert.equal(bytesToHex(reverseBytes(out)), '030201');
});

test('compareBytes: unsigned order with shorter prefix first', () => {
  assert.ok(compareBytes(Uint8Array.from([0x02]), Uint8Array.from([0x80])) < 0);
  assert.ok(compareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1])) > 0);
  assert.equal(compareBytes(Uint8Array.from([9]), Uint8Array.from([9])), 0);
});

test('xorBytes: length mismatch is a FormatError', () => {
  assert.equal(bytesToHex(xorBytes(hexToBytes('ff00'), hexToBytes('0f0f'))), 'f00f');
  assert.throws(() => xorBytes(new Uint8Array(1), new Uint8Array(2)), FormatError);
});

test('bytesToUtf8: invalid sequence is a FormatError', () => {
  assert.equal(bytesToUtf8(hexToBytes('6869')), 'hi');
  assert.throws(() => bytesToUtf8(Uint8Array.from([0xc3])), FormatError);
});

test('bytesToUtf8: a leading U+FEFF is kept', () => {
  assert.equal(bytesToUtf8(hexToBytes('efbbbf78')), '\uFEFFx');
});

test('base64: encodes with padding and rejects garbage', () => {
  assert.equal(bytesToBase64(hexToBytes('010203')), 'AQID');
  assert.equal(bytesToBase64(hexToBytes('0102')), 'AQI=');
  assert.deepEqual(base64ToBytes('AQID'), Uint8Array.from([1, 2, 3]));
  assert.throws(() => base64ToBytes('!!!'), FormatError);
});

test('bigIntToSignedLE: minimal two-complement widths', () => {
  const cases: Array<[bigint, string]> = [
    [0n, '00'],
    [1n, '01'],
    [-1n, 'ff'],
    [127n, '7f'],
    [128n, '8000'],
    [255n, 'ff00'],
    [-128n, '80'],
    [-129n, '7fff'],
    [65536n, '000001'],
  ];
  for (const [v, hex] of cases) {
    assert.equal(bytesToHex(bigIntToSignedLE(v)), hex, `value ${v}`);
    assert.equal(signedLEToBigInt(hexToBytes(hex)), v, `hex ${hex}`);
  }
});

test('signedLEToBigInt: empty is zero', () => {
  assert.equal(signedLEToBigInt(new Uint8Array()), 0n);
});
