// packages/script/src/stack_item.ts
// VM results as returned by invokescript/invokefunction, with byte strings
// decoded from base64 and integers as bigint.

import {
  base64ToBytes,
  bigIntToSignedLE,
  bytesToUtf8,
  FormatError,
  signedLEToBigInt,
} from '@n3tx/utils';

export type StackItem =
  | { type: 'Any' }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Integer'; value: bigint }
  | { type: 'ByteString'; value: Uint8Array }
  | { type: 'Buffer'; value: Uint8Array }
  | { type: 'Array'; value: StackItem[] }
  | { type: 'Struct'; value: StackItem[] }
  | { type: 'Map'; value: Array<{ key: StackItem; value: StackItem }> }
  | { type: 'Pointer'; value: number }
  | { type: 'InteropInterface'; interface?: string; id?: string };

export type StackItemType = StackItem['type'];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fail(msg: string): never {
  throw new FormatError(`parseStackItem: ${msg}`);
}

function parseInteger(v: unknown): bigint {
  if (typeof v === 'number' && Number.isSafeInteger(v)) return BigInt(v);
  if (typeof v === 'string' && /^-?\d+$/.test(v)) return BigInt(v);
  return fail(`invalid integer value ${String(v)}`);
}

function parseBoolean(v: unknown): boolean {
  if (typeof v === 'boolean') return v;
  if (v === 'true' || v === 'false') return v === 'true';
  return fail(`invalid boolean value ${String(v)}`);
}

function parseBase64(v: unknown): Uint8Array {
  if (typeof v !== 'string') return fail('byte value must be a base64 string');
  return base64ToBytes(v);
}

function parseList(v: unknown): StackItem[] {
  if (!Array.isArray(v)) return fail('compound value must be an array');
  return v.map(parseStackItem);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

/** Parse one RPC stack item (`{ type, value }`). */
export function parseStackItem(json: unknown): StackItem {
  if (!isRecord(json)) return fail('expected an object');
  const { type, value } = json;

  switch (type) {
    case 'Any':
      return { type: 'Any' };
    case 'Boolean':
      return { type: 'Boolean', value: parseBoolean(value) };
    case 'Integer':
      return { type: 'Integer', value: parseInteger(value) };
    case 'ByteString':
      return { type: 'ByteString', value: parseBase64(value) };
    case 'Buffer':
      return { type: 'Buffer', value: parseBase64(value) };
    case 'Array':
      return { type: 'Array', value: parseList(value) };
    case 'Struct':
      return { type: 'Struct', value: parseList(value) };
    case 'Map': {
      if (!Array.isArray(value)) return fail('map value must be an array');
      return {
        type: 'Map',
        value: value.map((entry: unknown) => {
          if (!isRecord(entry)) return fail('map entry must be an object');
          return { key: parseStackItem(entry.key), value: parseStackItem(entry.value) };
        }),
      };
    }
    case 'Pointer':
      return { type: 'Pointer', value: Number(parseInteger(value)) };
    case 'InteropInterface':
      return { type: 'InteropInterface', interface: optionalString(json.interface), id: optionalString(json.id) };
    default:
      return fail(`unknown stack item type ${String(type)}`);
  }
}

export function stackItemToInteger(item: StackItem): bigint {
  switch (item.type) {
    case 'Integer':
      return item.value;
    case 'Boolean':
      return item.value ? 1n : 0n;
    case 'ByteString':
    case 'Buffer':
      return signedLEToBigInt(item.value);
    default:
      throw new FormatError(`stackItemToInteger: cannot convert ${item.type}`);
  }
}

export function stackItemToBytes(item: StackItem): Uint8Array {
  switch (item.type) {
    case 'ByteString':
    case 'Buffer':
      return item.value;
    case 'Integer':
      return bigIntToSignedLE(item.value);
    default:
      throw new FormatError(`stackItemToBytes: cannot convert ${item.type}`);
  }
}

export function stackItemToString(item: StackItem): string {
  return bytesToUtf8(stackItemToBytes(item));
}

export function stackItemToBoolean(item: StackItem): boolean {
  switch (item.type) {
    case 'Any':
      return false;
    case 'Boolean':
      return item.value;
    case 'Integer':
      return item.value !== 0n;
    case 'ByteString':
    case 'Buffer':
      return item.value.some((b) => b !== 0);
    default:
      throw new FormatError(`stackItemToBoolean: cannot convert ${item.type}`);
  }
}

export function stackItemToList(item: StackItem): StackItem[] {
  if (item.type === 'Array' || item.type === 'Struct') return item.value;
  throw new FormatError(`stackItemToList: cannot convert ${item.type}`);
}
