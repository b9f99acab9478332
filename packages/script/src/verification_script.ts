// packages/script/src/verification_script.ts
import { BinaryReader, varBytesSize } from '@n3tx/codec';
import type { BinaryWriter, Serializable } from '@n3tx/codec';
import { arraysEqual, FormatError, Hash160 } from '@n3tx/utils';

import {
  MAX_PUBLIC_KEYS_PER_MULTISIG,
  MAX_VERIFICATION_SCRIPT_SIZE,
  PUBLIC_KEY_SIZE,
  SINGLE_SIG_SCRIPT_SIZE,
} from './constants.js';
import { interopService } from './interop_service.js';
import { OpCode } from './op_code.js';
import { buildMultiSigScript, buildVerificationScript } from './script_builder.js';

// Smallest multi-sig script: PUSH1, one key, PUSH1, SYSCALL + tag.
const MIN_MULTISIG_SCRIPT_SIZE = 42;

type MultiSigLayout = { threshold: number; publicKeys: Uint8Array[] };

function parseMultiSig(script: Uint8Array): MultiSigLayout | null {
  if (script.length < MIN_MULTISIG_SCRIPT_SIZE) return null;
  const r = new BinaryReader(script);
  try {
    const threshold = r.readPushInteger();
    if (threshold < 1n || threshold > BigInt(MAX_PUBLIC_KEYS_PER_MULTISIG)) return null;

    const publicKeys: Uint8Array[] = [];
    r.mark();
    while (r.readU8() === OpCode.PUSHDATA1) {
      if (r.readU8() !== PUBLIC_KEY_SIZE) return null;
      publicKeys.push(r.readEncodedEcPoint());
      r.mark();
    }
    const m = publicKeys.length;
    if (BigInt(m) < threshold || m > MAX_PUBLIC_KEYS_PER_MULTISIG) return null;

    // the byte that ended the loop starts the key-count push
    r.reset();
    if (r.readPushInteger() !== BigInt(m)) return null;
    if (r.readU8() !== OpCode.SYSCALL) return null;
    if (!arraysEqual(r.readBytes(4), interopService('System.Crypto.CheckMultisig').hash)) return null;
    if (r.available !== 0) return null;

    return { threshold: Number(threshold), publicKeys };
  } catch (err) {
    if (err instanceof FormatError) return null;
    throw err;
  }
}

/** Witness script that decides whether the accompanying invocation script authorizes the signer. */
export class VerificationScript implements Serializable {
  readonly script: Uint8Array;

  constructor(script: Uint8Array = new Uint8Array()) {
    this.script = Uint8Array.from(script);
  }

  static fromPublicKey(publicKey: Uint8Array): VerificationScript {
    return new VerificationScript(buildVerificationScript(publicKey));
  }

  static fromMultiSig(publicKeys: readonly Uint8Array[], threshold: number): VerificationScript {
    return new VerificationScript(buildMultiSigScript(publicKeys, threshold));
  }

  static decode(r: BinaryReader): VerificationScript {
    return new VerificationScript(r.readVarBytes(MAX_VERIFICATION_SCRIPT_SIZE));
  }

  get size(): number {
    return varBytesSize(this.script);
  }

  get scriptHash(): Hash160 {
    return Hash160.fromScript(this.script);
  }

  get isEmpty(): boolean {
    return this.script.length === 0;
  }

  serialize(w: BinaryWriter): void {
    w.writeVarBytes(this.script);
  }

  isSingleSig(): boolean {
    const s = this.script;
    return (
      s.length === SINGLE_SIG_SCRIPT_SIZE &&
      s[0] === OpCode.PUSHDATA1 &&
      s[1] === PUBLIC_KEY_SIZE &&
      s[35] === OpCode.SYSCALL &&
      arraysEqual(s.subarray(36, 40), interopService('System.Crypto.CheckSig').hash)
    );
  }

  isMultiSig(): boolean {
    return parseMultiSig(this.script) !== null;
  }

  getSigningThreshold(): number {
    if (this.isSingleSig()) return 1;
    const multi = parseMultiSig(this.script);
    if (!multi) throw new FormatError('getSigningThreshold: not a single- or multi-sig verification script');
    return multi.threshold;
  }

  getNrOfAccounts(): number {
    return this.getPublicKeys().length;
  }

  getPublicKeys(): Uint8Array[] {
    if (this.isSingleSig()) return [this.script.slice(2, 2 + PUBLIC_KEY_SIZE)];
    const multi = parseMultiSig(this.script);
    if (!multi) throw new FormatError('getPublicKeys: not a single- or multi-sig verification script');
    return multi.publicKeys;
  }

  equals(other: VerificationScript): boolean {
    return arraysEqual(this.script, other.script);
  }
}
