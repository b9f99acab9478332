// packages/codec/src/varint.ts
// Compact-size integers: 0..0xfc in one byte, otherwise a 0xfd/0xfe/0xff marker
// followed by a u16/u32/u64 little-endian value.

import { FormatError, OutOfBoundsError } from '@n3tx/utils';

export const MAX_U64 = 0xffff_ffff_ffff_ffffn;

export type DecodedVarInt = { value: bigint; size: number };

function toBigInt(val: number | bigint): bigint {
  if (typeof val === 'number') {
    if (!Number.isSafeInteger(val)) throw new FormatError(`varInt: ${val} is not a safe integer`);
    return BigInt(val);
  }
  return val;
}

/** Encoded width in bytes of a var-int. */
export function varIntSize(val: number | bigint): number {
  const v = toBigInt(val);
  if (v < 0n || v > MAX_U64) throw new FormatError(`varInt: ${v} out of range`);
  if (v < 0xfdn) return 1;
  if (v <= 0xffffn) return 3;
  if (v <= 0xffff_ffffn) return 5;
  return 9;
}

export function varBytesSize(bytes: Uint8Array): number {
  return varIntSize(bytes.length) + bytes.length;
}

export function encodeVarInt(val: number | bigint): Uint8Array {
  const v = toBigInt(val);
  const size = varIntSize(v);
  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);

  if (size === 1) {
    out[0] = Number(v);
  } else if (size === 3) {
    out[0] = 0xfd;
    view.setUint16(1, Number(v), true);
  } else if (size === 5) {
    out[0] = 0xfe;
    view.setUint32(1, Number(v), true);
  } else {
    out[0] = 0xff;
    view.setBigUint64(1, v, true);
  }
  return out;
}

export function decodeVarInt(u8: Uint8Array, offset = 0): DecodedVarInt {
  if (!Number.isInteger(offset) || offset < 0 || offset >= u8.length) {
    throw new OutOfBoundsError(offset, 1, Math.max(0, u8.length - offset));
  }

  const fb = u8[offset];
  if (fb < 0xfd) return { value: BigInt(fb), size: 1 };

  const width = fb === 0xfd ? 2 : fb === 0xfe ? 4 : 8;
  if (offset + 1 + width > u8.length) {
    throw new OutOfBoundsError(offset + 1, width, u8.length - offset - 1);
  }

  const view = new DataView(u8.buffer, u8.byteOffset + offset + 1, width);
  const value =
    width === 2
      ? BigInt(view.getUint16(0, true))
      : width === 4
        ? BigInt(view.getUint32(0, true))
        : view.getBigUint64(0, true);

  return { value, size: 1 + width };
}
