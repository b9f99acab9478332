// packages/script/src/contract_parameter.ts
import { BinaryReader, BinaryWriter } from '@n3tx/codec';
import {
  base64ToBytes,
  bigIntToSignedLE,
  bytesToBase64,
  bytesToHex,
  ConfigurationError,
  FormatError,
  Hash160,
  Hash256,
  hexToBytes,
  signedLEToBigInt,
} from '@n3tx/utils';

import { MAX_PARAM_ITEMS, MAX_PARAM_NESTING, MAX_PUSHINT_BYTES, PUBLIC_KEY_SIZE, SIGNATURE_SIZE } from './constants.js';

export type ContractParameter =
  | { type: 'Any' }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Integer'; value: bigint }
  | { type: 'ByteArray'; value: Uint8Array }
  | { type: 'String'; value: string }
  | { type: 'Hash160'; value: Hash160 }
  | { type: 'Hash256'; value: Hash256 }
  | { type: 'PublicKey'; value: Uint8Array }
  | { type: 'Signature'; value: Uint8Array }
  | { type: 'Array'; value: ContractParameter[] }
  | { type: 'Map'; value: Array<[ContractParameter, ContractParameter]> };

export type ContractParameterType = ContractParameter['type'];

export const CONTRACT_PARAMETER_TYPE_BYTES: Record<ContractParameterType, number> = {
  Any: 0x00,
  Boolean: 0x10,
  Integer: 0x11,
  ByteArray: 0x12,
  String: 0x13,
  Hash160: 0x14,
  Hash256: 0x15,
  PublicKey: 0x16,
  Signature: 0x17,
  Array: 0x20,
  Map: 0x22,
};

function asBytes(v: Uint8Array | string): Uint8Array {
  return typeof v === 'string' ? hexToBytes(v) : Uint8Array.from(v);
}

function checkPublicKey(key: Uint8Array): Uint8Array {
  if (key.length !== PUBLIC_KEY_SIZE || (key[0] !== 0x02 && key[0] !== 0x03)) {
    throw new ConfigurationError(`publicKey: expected a 33-byte compressed point, got ${key.length} bytes`);
  }
  return key;
}

function integerBytes(value: bigint): Uint8Array {
  const bytes = bigIntToSignedLE(value);
  if (bytes.length > MAX_PUSHINT_BYTES) {
    throw new ConfigurationError(`integer: ${bytes.length} bytes exceed the ${MAX_PUSHINT_BYTES}-byte maximum`);
  }
  return bytes;
}

function checkSignature(sig: Uint8Array): Uint8Array {
  if (sig.length !== SIGNATURE_SIZE) {
    throw new ConfigurationError(`signature: expected ${SIGNATURE_SIZE} bytes, got ${sig.length}`);
  }
  return sig;
}

/** Factories for contract call arguments. */
export const ContractParam = {
  any(): ContractParameter {
    return { type: 'Any' };
  },
  bool(value: boolean): ContractParameter {
    return { type: 'Boolean', value };
  },
  integer(value: number | bigint): ContractParameter {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new ConfigurationError(`integer: ${value} is not a safe integer`);
    }
    const v = BigInt(value);
    integerBytes(v);
    return { type: 'Integer', value: v };
  },
  byteArray(value: Uint8Array | string): ContractParameter {
    return { type: 'ByteArray', value: asBytes(value) };
  },
  string(value: string): ContractParameter {
    return { type: 'String', value };
  },
  hash160(value: Hash160 | string): ContractParameter {
    return { type: 'Hash160', value: typeof value === 'string' ? Hash160.fromHex(value) : value };
  },
  hash256(value: Hash256 | string): ContractParameter {
    return { type: 'Hash256', value: typeof value === 'string' ? Hash256.fromHex(value) : value };
  },
  publicKey(value: Uint8Array | string): ContractParameter {
    return { type: 'PublicKey', value: checkPublicKey(asBytes(value)) };
  },
  signature(value: Uint8Array | string): ContractParameter {
    return { type: 'Signature', value: checkSignature(asBytes(value)) };
  },
  array(...items: ContractParameter[]): ContractParameter {
    return { type: 'Array', value: items };
  },
  map(entries: Array<[ContractParameter, ContractParameter]>): ContractParameter {
    for (const [key] of entries) {
      if (key.type === 'Array' || key.type === 'Map') {
        throw new ConfigurationError(`map: ${key.type} cannot be used as a map key`);
      }
    }
    return { type: 'Map', value: entries };
  },
};

// ---------------------------------------------------------------------------
// binary form: type byte followed by the value

export function writeContractParameter(w: BinaryWriter, p: ContractParameter): void {
  w.writeU8(CONTRACT_PARAMETER_TYPE_BYTES[p.type]);
  switch (p.type) {
    case 'Any':
      return;
    case 'Boolean':
      w.writeBool(p.value);
      return;
    case 'Integer':
      w.writeVarBytes(integerBytes(p.value));
      return;
    case 'ByteArray':
    case 'Signature':
      w.writeVarBytes(p.value);
      return;
    case 'String':
      w.writeVarString(p.value);
      return;
    case 'Hash160':
    case 'Hash256':
      w.writeBytes(p.value.toLittleEndian());
      return;
    case 'PublicKey':
      w.writeBytes(p.value);
      return;
    case 'Array':
      w.writeVarInt(p.value.length);
      for (const item of p.value) writeContractParameter(w, item);
      return;
    case 'Map':
      w.writeVarInt(p.value.length);
      for (const [k, v] of p.value) {
        writeContractParameter(w, k);
        writeContractParameter(w, v);
      }
      return;
  }
}

export function readContractParameter(r: BinaryReader, depth = MAX_PARAM_NESTING): ContractParameter {
  const typeByte = r.readU8();
  switch (typeByte) {
    case 0x00:
      return { type: 'Any' };
    case 0x10:
      return { type: 'Boolean', value: r.readBool() };
    case 0x11:
      return { type: 'Integer', value: signedLEToBigInt(r.readVarBytes(MAX_PUSHINT_BYTES)) };
    case 0x12:
      return { type: 'ByteArray', value: r.readVarBytes() };
    case 0x13:
      return { type: 'String', value: r.readVarString() };
    case 0x14:
      return { type: 'Hash160', value: new Hash160(r.readBytes(Hash160.SIZE)) };
    case 0x15:
      return { type: 'Hash256', value: new Hash256(r.readBytes(Hash256.SIZE)) };
    case 0x16:
      return { type: 'PublicKey', value: r.readEncodedEcPoint() };
    case 0x17: {
      const sig = r.readVarBytes(SIGNATURE_SIZE);
      if (sig.length !== SIGNATURE_SIZE) throw new FormatError(`readContractParameter: signature of ${sig.length} bytes`);
      return { type: 'Signature', value: sig };
    }
    case 0x20:
    case 0x22: {
      if (depth <= 0) throw new FormatError('readContractParameter: nesting too deep');
      const count = r.readVarInt(MAX_PARAM_ITEMS);
      if (typeByte === 0x20) {
        const items: ContractParameter[] = [];
        for (let i = 0; i < count; i++) items.push(readContractParameter(r, depth - 1));
        return { type: 'Array', value: items };
      }
      const entries: Array<[ContractParameter, ContractParameter]> = [];
      for (let i = 0; i < count; i++) {
        const k = readContractParameter(r, depth - 1);
        entries.push([k, readContractParameter(r, depth - 1)]);
      }
      return { type: 'Map', value: entries };
    }
    default:
      throw new FormatError(`readContractParameter: unknown parameter type 0x${typeByte.toString(16)}`);
  }
}

export function encodeContractParameter(p: ContractParameter): Uint8Array {
  const w = new BinaryWriter();
  writeContractParameter(w, p);
  return w.toBytes();
}

export function decodeContractParameter(bytes: Uint8Array): ContractParameter {
  const r = new BinaryReader(bytes);
  const p = readContractParameter(r);
  if (r.available !== 0) throw new FormatError(`decodeContractParameter: ${r.available} trailing byte(s)`);
  return p;
}

// ---------------------------------------------------------------------------
// RPC JSON form: { type, value } with byte values in base64

export type ContractParameterJson =
  | { type: 'Any'; value?: null }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Integer'; value: string }
  | { type: 'ByteArray' | 'Signature'; value: string }
  | { type: 'String' | 'Hash160' | 'Hash256' | 'PublicKey'; value: string }
  | { type: 'Array'; value: ContractParameterJson[] }
  | { type: 'Map'; value: Array<{ key: ContractParameterJson; value: ContractParameterJson }> };

export function contractParameterToJson(p: ContractParameter): ContractParameterJson {
  switch (p.type) {
    case 'Any':
      return { type: 'Any' };
    case 'Boolean':
      return { type: 'Boolean', value: p.value };
    case 'Integer':
      return { type: 'Integer', value: p.value.toString() };
    case 'ByteArray':
    case 'Signature':
      return { type: p.type, value: bytesToBase64(p.value) };
    case 'String':
      return { type: 'String', value: p.value };
    case 'Hash160':
    case 'Hash256':
      return { type: p.type, value: p.value.toString() };
    case 'PublicKey':
      return { type: 'PublicKey', value: bytesToHex(p.value) };
    case 'Array':
      return { type: 'Array', value: p.value.map(contractParameterToJson) };
    case 'Map':
      return {
        type: 'Map',
        value: p.value.map(([k, v]) => ({ key: contractParameterToJson(k), value: contractParameterToJson(v) })),
      };
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function expectString(v: unknown, type: string): string {
  if (typeof v !== 'string') throw new FormatError(`contractParameterFromJson: ${type} value must be a string`);
  return v;
}

function expectArray(v: unknown, type: string): unknown[] {
  if (!Array.isArray(v)) throw new FormatError(`contractParameterFromJson: ${type} value must be an array`);
  return v;
}

export function contractParameterFromJson(json: unknown): ContractParameter {
  if (!isRecord(json)) throw new FormatError('contractParameterFromJson: expected an object');
  const { type, value } = json;

  switch (type) {
    case 'Any':
      return { type: 'Any' };
    case 'Boolean':
      if (typeof value !== 'boolean') throw new FormatError('contractParameterFromJson: Boolean value must be a boolean');
      return { type: 'Boolean', value };
    case 'Integer': {
      const s = expectString(value, type);
      if (!/^-?\d+$/.test(s)) throw new FormatError(`contractParameterFromJson: invalid integer '${s}'`);
      return { type: 'Integer', value: BigInt(s) };
    }
    case 'ByteArray':
      return { type: 'ByteArray', value: base64ToBytes(expectString(value, type)) };
    case 'Signature': {
      const sig = base64ToBytes(expectString(value, type));
      if (sig.length !== SIGNATURE_SIZE) throw new FormatError(`contractParameterFromJson: signature of ${sig.length} bytes`);
      return { type: 'Signature', value: sig };
    }
    case 'String':
      return { type: 'String', value: expectString(value, type) };
    case 'Hash160':
      return { type: 'Hash160', value: Hash160.fromHex(expectString(value, type)) };
    case 'Hash256':
      return { type: 'Hash256', value: Hash256.fromHex(expectString(value, type)) };
    case 'PublicKey': {
      const key = hexToBytes(expectString(value, type));
      if (key.length !== PUBLIC_KEY_SIZE) throw new FormatError(`contractParameterFromJson: public key of ${key.length} bytes`);
      return { type: 'PublicKey', value: key };
    }
    case 'Array':
      return { type: 'Array', value: expectArray(value, type).map(contractParameterFromJson) };
    case 'Map':
      return {
        type: 'Map',
        value: expectArray(value, type).map((entry): [ContractParameter, ContractParameter] => {
          if (!isRecord(entry)) throw new FormatError('contractParameterFromJson: map entry must be an object');
          return [contractParameterFromJson(entry.key), contractParameterFromJson(entry.value)];
        }),
      };
    default:
      throw new FormatError(`contractParameterFromJson: unknown parameter type ${String(type)}`);
  }
}
