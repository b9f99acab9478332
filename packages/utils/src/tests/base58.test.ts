// packages/utils/src/tests/base58.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import {
  base58checkDecode,
  base58checkEncode,
  base58decode,
  base58encode,
  bytesToHex,
  FormatError,
  hexToBytes,
  utf8ToBytes,
} from '../index.js';

test('base58encode: leading zero bytes become 1s', () => {
  assert.equal(base58encode(hexToBytes('000001')), '112');
  assert.equal(base58encode(utf8ToBytes('hello world')), 'StV1DL6CwTryKyV');
});

test('base58decode: rejects characters outside the alphabet', () => {
  assert.deepEqual(base58decode('112'), hexToBytes('000001'));
  assert.throws(() => base58decode('0OIl'), FormatError);
});

test('base58checkEncode: version byte and checksum', () => {
  const payload = hexToBytes('6380ce3d7de7855bc5c1076d3b515eda380d2e90');
  const s = base58checkEncode(0x35, payload);
  assert.equal(s, 'NUz6PKTAM7NbPJzkKJFNay3VckQtcDkgWo');

  const { version, payload: back } = base58checkDecode(s);
  assert.equal(version, 0x35);
  assert.equal(bytesToHex(back), '6380ce3d7de7855bc5c1076d3b515eda380d2e90');
});

test('base58checkDecode: a changed character fails the checksum', () => {
  assert.throws(() => base58checkDecode('NUz6PKTAM7NbPJzkKJFNay3VckQtcDkgWp'), FormatError);
});
