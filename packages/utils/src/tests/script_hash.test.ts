// packages/utils/src/tests/script_hash.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { bytesToHex, FormatError, Hash160, Hash256, hash160, hash256, hexToBytes } from '../index.js';

test('hash160/hash256: digests of the empty input', () => {
  assert.equal(bytesToHex(hash160(new Uint8Array())), 'b472a266d0bd89c13706a4132ccfb16f7c3b9fcb');
  assert.equal(bytesToHex(hash256(new Uint8Array())), '5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456');
});

test('Hash160.fromHex: display hex is the reverse of wire order', () => {
  const h = Hash160.fromHex('0xd2a4cff31913016155e38e474a2c06d08be276cf');
  assert.equal(bytesToHex(h.toLittleEndian()), 'cf76e28bd0062c4a478ee35561011319f3cfa4d2');
  assert.equal(h.toString(), 'd2a4cff31913016155e38e474a2c06d08be276cf');
  assert.equal(h.toJSON(), '0xd2a4cff31913016155e38e474a2c06d08be276cf');
});

test('Hash160: wrong width is a FormatError', () => {
  assert.throws(() => new Hash160(new Uint8Array(19)), FormatError);
  assert.throws(() => Hash256.fromHex('00'), FormatError);
});

test('Hash160.fromScript: RIPEMD160(SHA256(script))', () => {
  const vs = hexToBytes('0c21026ff03b949241ce1dadd43519e6960e0a85b41a69a05c328103aa2bce1594ca164156e7b327');
  assert.equal(Hash160.fromScript(vs).toString(), '902e0d38da5e513b6d07c1c55b85e77d3dce8063');
});

test('Hash256.digest: sha256 held in wire order', () => {
  assert.equal(
    Hash256.digest(new Uint8Array()).toString(),
    '55b852781b9995a44c939b64e441ae2724b96f99c8f4fb9a141cfc9842c4b0e3'
  );
});

test('equals/compareTo', () => {
  const a = Hash160.fromHex('00'.repeat(19) + '01');
  const b = Hash160.fromHex('00'.repeat(19) + '02');
  assert.ok(a.equals(Hash160.fromHex('00'.repeat(19) + '01')));
  assert.ok(!a.equals(b));
  assert.ok(a.compareTo(b) < 0);
  assert.ok(Hash160.ZERO.equals(new Hash160(new Uint8Array(20))));
});
