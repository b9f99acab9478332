// packages/script/src/script_reader.ts
import { BinaryReader } from '@n3tx/codec';
import { bytesToHex, FormatError } from '@n3tx/utils';

import { findInteropService } from './interop_service.js';
import { isOpCode, OpCode, operandSize } from './op_code.js';

export type Instruction = { offset: number; opCode: OpCode; operand: Uint8Array };

/** Splits a script into instructions; an unknown opcode or truncated operand fails. */
export function readInstructions(script: Uint8Array): Instruction[] {
  const r = new BinaryReader(script);
  const out: Instruction[] = [];
  while (r.available > 0) {
    const offset = r.position;
    const b = r.readU8();
    if (!isOpCode(b)) throw new FormatError(`readInstructions: unknown opcode 0x${b.toString(16)} at ${offset}`);

    const size = operandSize(b);
    let operand: Uint8Array;
    if ('prefix' in size) {
      const len = size.prefix === 1 ? r.readU8() : size.prefix === 2 ? r.readU16() : r.readU32();
      operand = r.readBytes(len);
    } else {
      operand = r.readBytes(size.fixed);
    }
    out.push({ offset, opCode: b, operand });
  }
  return out;
}

/**
 * One instruction per line: opcode name, then for PUSHDATA the decimal
 * length and payload hex, or for fixed operands the operand hex. SYSCALL
 * operands are followed by the service name when known.
 */
export function toOpCodeString(script: Uint8Array): string {
  return readInstructions(script)
    .map(({ opCode, operand }) => {
      const name = OpCode[opCode];
      if ('prefix' in operandSize(opCode)) return `${name} ${operand.length} ${bytesToHex(operand)}`;
      if (operand.length === 0) return name;
      if (opCode === OpCode.SYSCALL) {
        const svc = findInteropService(operand);
        return svc ? `${name} ${bytesToHex(operand)} (${svc.name})` : `${name} ${bytesToHex(operand)}`;
      }
      return `${name} ${bytesToHex(operand)}`;
    })
    .join('\n');
}
