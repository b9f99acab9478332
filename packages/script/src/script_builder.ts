// packages/script/src/script_builder.ts
import { BinaryWriter } from '@n3tx/codec';
import {
  arraysEqual,
  bigIntToSignedLE,
  compareBytes,
  ConfigurationError,
  Hash160,
  utf8ToBytes,
} from '@n3tx/utils';

import { CallFlags } from './call_flags.js';
import {
  MAX_PUBLIC_KEYS_PER_MULTISIG,
  MAX_PUSHINT_BYTES,
  PUBLIC_KEY_SIZE,
} from './constants.js';
import type { ContractParameter } from './contract_parameter.js';
import { interopService } from './interop_service.js';
import type { InteropServiceName } from './interop_service.js';
import { OpCode } from './op_code.js';

const PUSHINT_OPS: Array<[width: number, op: OpCode]> = [
  [1, OpCode.PUSHINT8],
  [2, OpCode.PUSHINT16],
  [4, OpCode.PUSHINT32],
  [8, OpCode.PUSHINT64],
  [16, OpCode.PUSHINT128],
  [32, OpCode.PUSHINT256],
];

function toBigInt(n: number | bigint): bigint {
  if (typeof n === 'number' && !Number.isSafeInteger(n)) {
    throw new ConfigurationError(`pushInteger: ${n} is not a safe integer`);
  }
  return BigInt(n);
}

/**
 * Append-only builder for VM bytecode. Every method returns `this` so
 * instructions can be chained; `toBytes()` returns a copy of the script.
 */
export class ScriptBuilder {
  private readonly w = new BinaryWriter();

  get length(): number {
    return this.w.size;
  }

  opCode(...ops: OpCode[]): this {
    for (const op of ops) this.w.writeU8(op);
    return this;
  }

  opCodeWithArg(op: OpCode, arg: Uint8Array): this {
    this.w.writeU8(op).writeBytes(arg);
    return this;
  }

  /**
   * -1..16 use their dedicated opcodes. Anything else is written as the
   * minimal two's-complement little-endian value, sign-padded to the next
   * PUSHINT width.
   */
  pushInteger(n: number | bigint): this {
    const v = toBigInt(n);
    if (v === -1n) return this.opCode(OpCode.PUSHM1);
    if (v >= 0n && v <= 16n) {
      this.w.writeU8(OpCode.PUSH0 + Number(v));
      return this;
    }

    const raw = bigIntToSignedLE(v);
    if (raw.length > MAX_PUSHINT_BYTES) {
      throw new ConfigurationError(`pushInteger: ${raw.length} bytes exceed the ${MAX_PUSHINT_BYTES}-byte maximum`);
    }

    for (const [width, op] of PUSHINT_OPS) {
      if (raw.length > width) continue;
      const padded = new Uint8Array(width).fill(v < 0n ? 0xff : 0x00);
      padded.set(raw);
      return this.opCodeWithArg(op, padded);
    }
    throw new ConfigurationError(`pushInteger: no PUSHINT width for ${v}`);
  }

  /** PUSHDATA1/2/4 with a little-endian length; strings are pushed as UTF-8. */
  pushData(data: Uint8Array | string): this {
    const bytes = typeof data === 'string' ? utf8ToBytes(data) : data;
    if (bytes.length <= 0xff) this.w.writeU8(OpCode.PUSHDATA1).writeU8(bytes.length);
    else if (bytes.length <= 0xffff) this.w.writeU8(OpCode.PUSHDATA2).writeU16(bytes.length);
    else this.w.writeU8(OpCode.PUSHDATA4).writeU32(bytes.length);
    this.w.writeBytes(bytes);
    return this;
  }

  pushBoolean(b: boolean): this {
    return this.opCode(b ? OpCode.PUSHT : OpCode.PUSHF);
  }

  pushNull(): this {
    return this.opCode(OpCode.PUSHNULL);
  }

  pushParam(p: ContractParameter): this {
    switch (p.type) {
      case 'Any':
        return this.pushNull();
      case 'Boolean':
        return this.pushBoolean(p.value);
      case 'Integer':
        return this.pushInteger(p.value);
      case 'ByteArray':
      case 'PublicKey':
      case 'Signature':
      case 'String':
        return this.pushData(p.value);
      case 'Hash160':
      case 'Hash256':
        return this.pushData(p.value.toLittleEndian());
      case 'Array':
        return this.pushArray(p.value);
      case 'Map':
        return this.pushMap(p.value);
    }
  }

  /** Pushes the parameters as one packed array, in declared order. */
  pushParams(params: readonly ContractParameter[]): this {
    return this.pushArray(params);
  }

  /**
   * Items are pushed last-to-first so that PACK, which pops the top of the
   * stack into index 0, rebuilds them in their original order.
   */
  pushArray(items: readonly ContractParameter[]): this {
    if (items.length === 0) return this.opCode(OpCode.NEWARRAY0);
    for (let i = items.length - 1; i >= 0; i--) this.pushParam(items[i]);
    return this.pushInteger(items.length).pack();
  }

  pushMap(entries: ReadonlyArray<readonly [ContractParameter, ContractParameter]>): this {
    for (const [key, value] of entries) {
      this.pushParam(value);
      this.pushParam(key);
    }
    return this.pushInteger(entries.length).opCode(OpCode.PACKMAP);
  }

  pack(): this {
    return this.opCode(OpCode.PACK);
  }

  sysCall(name: InteropServiceName): this {
    return this.opCodeWithArg(OpCode.SYSCALL, interopService(name).hash);
  }

  contractCall(
    hash: Hash160,
    method: string,
    params: readonly ContractParameter[] = [],
    flags: CallFlags = CallFlags.All
  ): this {
    return this.pushParams(params)
      .pushInteger(flags)
      .pushData(method)
      .pushData(hash.toLittleEndian())
      .sysCall('System.Contract.Call');
  }

  toBytes(): Uint8Array {
    return this.w.toBytes();
  }
}

function checkPublicKey(key: Uint8Array, label: string): void {
  if (key.length !== PUBLIC_KEY_SIZE || (key[0] !== 0x02 && key[0] !== 0x03)) {
    throw new ConfigurationError(`${label}: expected a 33-byte compressed public key, got ${key.length} bytes`);
  }
}

/** PUSHDATA1 <33-byte key> SYSCALL System.Crypto.CheckSig */
export function buildVerificationScript(publicKey: Uint8Array): Uint8Array {
  checkPublicKey(publicKey, 'buildVerificationScript');
  return new ScriptBuilder().pushData(publicKey).sysCall('System.Crypto.CheckSig').toBytes();
}

/** Keys are emitted in ascending raw-byte order regardless of input order. */
export function buildMultiSigScript(publicKeys: readonly Uint8Array[], threshold: number): Uint8Array {
  const n = publicKeys.length;
  if (n === 0) throw new ConfigurationError('buildMultiSigScript: at least one public key is required');
  if (n > MAX_PUBLIC_KEYS_PER_MULTISIG) {
    throw new ConfigurationError(`buildMultiSigScript: ${n} keys exceed the maximum of ${MAX_PUBLIC_KEYS_PER_MULTISIG}`);
  }
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > n) {
    throw new ConfigurationError(`buildMultiSigScript: threshold ${threshold} must be within 1..${n}`);
  }

  const sorted = [...publicKeys].sort(compareBytes);
  for (let i = 0; i < sorted.length; i++) {
    checkPublicKey(sorted[i], 'buildMultiSigScript');
    if (i > 0 && arraysEqual(sorted[i - 1], sorted[i])) {
      throw new ConfigurationError('buildMultiSigScript: duplicate public key');
    }
  }

  const sb = new ScriptBuilder().pushInteger(threshold);
  for (const key of sorted) sb.pushData(key);
  return sb.pushInteger(n).sysCall('System.Crypto.CheckMultisig').toBytes();
}

/**
 * Calls a method returning an iterator and drains up to `maxItems` values
 * into an array, so the result can be read from a single test invocation.
 */
export function buildContractCallAndUnwrapIterator(
  hash: Hash160,
  method: string,
  params: readonly ContractParameter[],
  maxItems: number,
  flags: CallFlags = CallFlags.All
): Uint8Array {
  const sb = new ScriptBuilder().pushInteger(maxItems);
  sb.contractCall(hash, method, params, flags);
  sb.opCode(OpCode.NEWARRAY0);

  const cycleStart = sb.length;
  sb.opCode(OpCode.OVER).sysCall('System.Iterator.Next');

  const jmpIfNot = sb.length;
  sb.opCodeWithArg(OpCode.JMPIFNOT, new Uint8Array([0]));

  sb.opCode(OpCode.DUP, OpCode.PUSH2, OpCode.PICK)
    .sysCall('System.Iterator.Value')
    .opCode(OpCode.APPEND, OpCode.DUP, OpCode.SIZE, OpCode.PUSH3, OpCode.PICK, OpCode.GE);

  const jmpIfMax = sb.length;
  sb.opCodeWithArg(OpCode.JMPIF, new Uint8Array([0]));

  const jmp = sb.length;
  sb.opCodeWithArg(OpCode.JMP, new Uint8Array([(cycleStart - jmp) & 0xff]));

  const loadResult = sb.length;
  sb.opCode(OpCode.NIP, OpCode.NIP);

  const script = sb.toBytes();
  script[jmpIfNot + 1] = loadResult - jmpIfNot;
  script[jmpIfMax + 1] = loadResult - jmpIfMax;
  return script;
}

/** Script whose hash identifies a contract deployed by `sender`. */
export function buildContractHashScript(sender: Hash160, nefChecksum: number, name: string): Uint8Array {
  return new ScriptBuilder()
    .opCode(OpCode.ABORT)
    .pushData(sender.toLittleEndian())
    .pushInteger(nefChecksum)
    .pushData(name)
    .toBytes();
}

export function contractHash(sender: Hash160, nefChecksum: number, name: string): Hash160 {
  return Hash160.fromScript(buildContractHashScript(sender, nefChecksum, name));
}
