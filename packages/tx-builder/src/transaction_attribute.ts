// packages/tx-builder/src/transaction_attribute.ts
import { varBytesSize } from '@n3tx/codec';
import type { BinaryReader, BinaryWriter } from '@n3tx/codec';
import { ConfigurationError, FormatError, Hash256 } from '@n3tx/utils';

import { MAX_ORACLE_RESULT_SIZE } from './constants.js';

export const OracleResponseCode = {
  Success: 0x00,
  ProtocolNotSupported: 0x10,
  ConsensusUnreachable: 0x12,
  NotFound: 0x14,
  Timeout: 0x16,
  Forbidden: 0x18,
  ResponseTooLarge: 0x1a,
  InsufficientFunds: 0x1c,
  ContentTypeNotSupported: 0x1f,
  Error: 0xff,
} as const;

export type OracleResponseCode = (typeof OracleResponseCode)[keyof typeof OracleResponseCode];

const ORACLE_CODES: ReadonlySet<number> = new Set(Object.values(OracleResponseCode));

function isOracleResponseCode(v: number): v is OracleResponseCode {
  return ORACLE_CODES.has(v);
}

export type TransactionAttribute =
  | { type: 'HighPriority' }
  | { type: 'OracleResponse'; id: bigint; code: OracleResponseCode; result: Uint8Array }
  | { type: 'NotValidBefore'; height: number }
  | { type: 'Conflicts'; hash: Hash256 };

export type TransactionAttributeType = TransactionAttribute['type'];

export const TRANSACTION_ATTRIBUTE_TYPE_BYTES: Record<TransactionAttributeType, number> = {
  HighPriority: 0x01,
  OracleResponse: 0x11,
  NotValidBefore: 0x20,
  Conflicts: 0x21,
};

/** Only Conflicts may appear more than once in a transaction. */
export function allowsMultiple(type: TransactionAttributeType): boolean {
  return type === 'Conflicts';
}

export const TransactionAttributes = {
  highPriority(): TransactionAttribute {
    return { type: 'HighPriority' };
  },
  oracleResponse(id: bigint | number, code: OracleResponseCode, result: Uint8Array = new Uint8Array()): TransactionAttribute {
    if (code !== OracleResponseCode.Success && result.length > 0) {
      throw new ConfigurationError('oracleResponse: only a successful response carries a result');
    }
    if (result.length > MAX_ORACLE_RESULT_SIZE) {
      throw new ConfigurationError(`oracleResponse: result exceeds ${MAX_ORACLE_RESULT_SIZE} bytes`);
    }
    return { type: 'OracleResponse', id: BigInt(id), code, result };
  },
  notValidBefore(height: number): TransactionAttribute {
    if (!Number.isInteger(height) || height < 0 || height > 0xffff_ffff) {
      throw new ConfigurationError(`notValidBefore: invalid height ${height}`);
    }
    return { type: 'NotValidBefore', height };
  },
  conflicts(hash: Hash256 | string): TransactionAttribute {
    return { type: 'Conflicts', hash: typeof hash === 'string' ? Hash256.fromHex(hash) : hash };
  },
};

export function transactionAttributeSize(a: TransactionAttribute): number {
  switch (a.type) {
    case 'HighPriority':
      return 1;
    case 'OracleResponse':
      return 1 + 8 + 1 + varBytesSize(a.result);
    case 'NotValidBefore':
      return 1 + 4;
    case 'Conflicts':
      return 1 + Hash256.SIZE;
  }
}

export function writeTransactionAttribute(w: BinaryWriter, a: TransactionAttribute): void {
  w.writeU8(TRANSACTION_ATTRIBUTE_TYPE_BYTES[a.type]);
  switch (a.type) {
    case 'HighPriority':
      return;
    case 'OracleResponse':
      w.writeU64(a.id).writeU8(a.code).writeVarBytes(a.result);
      return;
    case 'NotValidBefore':
      w.writeU32(a.height);
      return;
    case 'Conflicts':
      w.writeBytes(a.hash.toLittleEndian());
      return;
  }
}

export function readTransactionAttribute(r: BinaryReader): TransactionAttribute {
  const typeByte = r.readU8();
  switch (typeByte) {
    case 0x01:
      return { type: 'HighPriority' };
    case 0x11: {
      const id = r.readU64();
      const code = r.readU8();
      if (!isOracleResponseCode(code)) {
        throw new FormatError(`readTransactionAttribute: unknown oracle response code 0x${code.toString(16)}`);
      }
      const result = r.readVarBytes(MAX_ORACLE_RESULT_SIZE);
      if (code !== OracleResponseCode.Success && result.length > 0) {
        throw new FormatError('readTransactionAttribute: failed oracle response carries a result');
      }
      return { type: 'OracleResponse', id, code, result };
    }
    case 0x20:
      return { type: 'NotValidBefore', height: r.readU32() };
    case 0x21:
      return { type: 'Conflicts', hash: new Hash256(r.readBytes(Hash256.SIZE)) };
    default:
      throw new FormatError(`readTransactionAttribute: unknown attribute type 0x${typeByte.toString(16)}`);
  }
}
