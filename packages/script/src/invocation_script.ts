// packages/script/src/invocation_script.ts
import { BinaryReader, varBytesSize } from '@n3tx/codec';
import type { BinaryWriter, Serializable } from '@n3tx/codec';
import { arraysEqual, FormatError } from '@n3tx/utils';

import { MAX_INVOCATION_SCRIPT_SIZE, SIGNATURE_SIZE } from './constants.js';
import { OpCode } from './op_code.js';
import { ScriptBuilder } from './script_builder.js';

/** Witness script that pushes the arguments (usually signatures) for its verification script. */
export class InvocationScript implements Serializable {
  readonly script: Uint8Array;

  constructor(script: Uint8Array = new Uint8Array()) {
    this.script = Uint8Array.from(script);
  }

  static fromSignature(signature: Uint8Array): InvocationScript {
    return InvocationScript.fromSignatures([signature]);
  }

  static fromSignatures(signatures: readonly Uint8Array[]): InvocationScript {
    const sb = new ScriptBuilder();
    for (const sig of signatures) {
      if (sig.length !== SIGNATURE_SIZE) {
        throw new FormatError(`InvocationScript: signature must be ${SIGNATURE_SIZE} bytes, got ${sig.length}`);
      }
      sb.pushData(sig);
    }
    return new InvocationScript(sb.toBytes());
  }

  static decode(r: BinaryReader): InvocationScript {
    return new InvocationScript(r.readVarBytes(MAX_INVOCATION_SCRIPT_SIZE));
  }

  get size(): number {
    return varBytesSize(this.script);
  }

  serialize(w: BinaryWriter): void {
    w.writeVarBytes(this.script);
  }

  /** Signatures pushed by this script; fails on anything but a sequence of 64-byte pushes. */
  getSignatures(): Uint8Array[] {
    const r = new BinaryReader(this.script);
    const out: Uint8Array[] = [];
    while (r.available > 0) {
      if (r.readU8() !== OpCode.PUSHDATA1 || r.readU8() !== SIGNATURE_SIZE) {
        throw new FormatError('getSignatures: script is not a list of signature pushes');
      }
      out.push(r.readBytes(SIGNATURE_SIZE));
    }
    return out;
  }

  equals(other: InvocationScript): boolean {
    return arraysEqual(this.script, other.script);
  }
}
