// packages/script/src/op_code.ts
// VM instruction set. Values are wire bytes and must never be renumbered.

export enum OpCode {
  // constants
  PUSHINT8 = 0x00,
  PUSHINT16 = 0x01,
  PUSHINT32 = 0x02,
  PUSHINT64 = 0x03,
  PUSHINT128 = 0x04,
  PUSHINT256 = 0x05,
  PUSHT = 0x08,
  PUSHF = 0x09,
  PUSHA = 0x0a,
  PUSHNULL = 0x0b,
  PUSHDATA1 = 0x0c,
  PUSHDATA2 = 0x0d,
  PUSHDATA4 = 0x0e,
  PUSHM1 = 0x0f,
  PUSH0 = 0x10,
  PUSH1 = 0x11,
  PUSH2 = 0x12,
  PUSH3 = 0x13,
  PUSH4 = 0x14,
  PUSH5 = 0x15,
  PUSH6 = 0x16,
  PUSH7 = 0x17,
  PUSH8 = 0x18,
  PUSH9 = 0x19,
  PUSH10 = 0x1a,
  PUSH11 = 0x1b,
  PUSH12 = 0x1c,
  PUSH13 = 0x1d,
  PUSH14 = 0x1e,
  PUSH15 = 0x1f,
  PUSH16 = 0x20,

  // flow control
  NOP = 0x21,
  JMP = 0x22,
  JMP_L = 0x23,
  JMPIF = 0x24,
  JMPIF_L = 0x25,
  JMPIFNOT = 0x26,
  JMPIFNOT_L = 0x27,
  JMPEQ = 0x28,
  JMPEQ_L = 0x29,
  JMPNE = 0x2a,
  JMPNE_L = 0x2b,
  JMPGT = 0x2c,
  JMPGT_L = 0x2d,
  JMPGE = 0x2e,
  JMPGE_L = 0x2f,
  JMPLT = 0x30,
  JMPLT_L = 0x31,
  JMPLE = 0x32,
  JMPLE_L = 0x33,
  CALL = 0x34,
  CALL_L = 0x35,
  CALLA = 0x36,
  CALLT = 0x37,
  ABORT = 0x38,
  ASSERT = 0x39,
  THROW = 0x3a,
  TRY = 0x3b,
  TRY_L = 0x3c,
  ENDTRY = 0x3d,
  ENDTRY_L = 0x3e,
  ENDFINALLY = 0x3f,
  RET = 0x40,
  SYSCALL = 0x41,

  // stack
  DEPTH = 0x43,
  DROP = 0x45,
  NIP = 0x46,
  XDROP = 0x48,
  CLEAR = 0x49,
  DUP = 0x4a,
  OVER = 0x4b,
  PICK = 0x4d,
  TUCK = 0x4e,
  SWAP = 0x50,
  ROT = 0x51,
  ROLL = 0x52,
  REVERSE3 = 0x53,
  REVERSE4 = 0x54,
  REVERSEN = 0x55,

  // slots
  INITSSLOT = 0x56,
  INITSLOT = 0x57,
  LDSFLD0 = 0x58,
  LDSFLD1 = 0x59,
  LDSFLD2 = 0x5a,
  LDSFLD3 = 0x5b,
  LDSFLD4 = 0x5c,
  LDSFLD5 = 0x5d,
  LDSFLD6 = 0x5e,
  LDSFLD = 0x5f,
  STSFLD0 = 0x60,
  STSFLD1 = 0x61,
  STSFLD2 = 0x62,
  STSFLD3 = 0x63,
  STSFLD4 = 0x64,
  STSFLD5 = 0x65,
  STSFLD6 = 0x66,
  STSFLD = 0x67,
  LDLOC0 = 0x68,
  LDLOC1 = 0x69,
  LDLOC2 = 0x6a,
  LDLOC3 = 0x6b,
  LDLOC4 = 0x6c,
  LDLOC5 = 0x6d,
  LDLOC6 = 0x6e,
  LDLOC = 0x6f,
  STLOC0 = 0x70,
  STLOC1 = 0x71,
  STLOC2 = 0x72,
  STLOC3 = 0x73,
  STLOC4 = 0x74,
  STLOC5 = 0x75,
  STLOC6 = 0x76,
  STLOC = 0x77,
  LDARG0 = 0x78,
  LDARG1 = 0x79,
  LDARG2 = 0x7a,
  LDARG3 = 0x7b,
  LDARG4 = 0x7c,
  LDARG5 = 0x7d,
  LDARG6 = 0x7e,
  LDARG = 0x7f,
  STARG0 = 0x80,
  STARG1 = 0x81,
  STARG2 = 0x82,
  STARG3 = 0x83,
  STARG4 = 0x84,
  STARG5 = 0x85,
  STARG6 = 0x86,
  STARG = 0x87,

  // splice
  NEWBUFFER = 0x88,
  MEMCPY = 0x89,
  CAT = 0x8b,
  SUBSTR = 0x8c,
  LEFT = 0x8d,
  RIGHT = 0x8e,

  // bitwise
  INVERT = 0x90,
  AND = 0x91,
  OR = 0x92,
  XOR = 0x93,
  EQUAL = 0x97,
  NOTEQUAL = 0x98,

  // arithmetic
  SIGN = 0x99,
  ABS = 0x9a,
  NEGATE = 0x9b,
  INC = 0x9c,
  DEC = 0x9d,
  ADD = 0x9e,
  SUB = 0x9f,
  MUL = 0xa0,
  DIV = 0xa1,
  MOD = 0xa2,
  POW = 0xa3,
  SQRT = 0xa4,
  MODMUL = 0xa5,
  MODPOW = 0xa6,
  SHL = 0xa8,
  SHR = 0xa9,
  NOT = 0xaa,
  BOOLAND = 0xab,
  BOOLOR = 0xac,
  NZ = 0xb1,
  NUMEQUAL = 0xb3,
  NUMNOTEQUAL = 0xb4,
  LT = 0xb5,
  LE = 0xb6,
  GT = 0xb7,
  GE = 0xb8,
  MIN = 0xb9,
  MAX = 0xba,
  WITHIN = 0xbb,

  // compound types
  PACKMAP = 0xbe,
  PACKSTRUCT = 0xbf,
  PACK = 0xc0,
  UNPACK = 0xc1,
  NEWARRAY0 = 0xc2,
  NEWARRAY = 0xc3,
  NEWARRAY_T = 0xc4,
  NEWSTRUCT0 = 0xc5,
  NEWSTRUCT = 0xc6,
  NEWMAP = 0xc8,
  SIZE = 0xca,
  HASKEY = 0xcb,
  KEYS = 0xcc,
  VALUES = 0xcd,
  PICKITEM = 0xce,
  APPEND = 0xcf,
  SETITEM = 0xd0,
  REVERSEITEMS = 0xd1,
  REMOVE = 0xd2,
  CLEARITEMS = 0xd3,
  POPITEM = 0xd4,

  // types
  ISNULL = 0xd8,
  ISTYPE = 0xd9,
  CONVERT = 0xdb,

  // extensions
  ABORTMSG = 0xe0,
  ASSERTMSG = 0xe1,
}

/**
 * Operand layout per opcode: `fixed` bytes follow the opcode, or a
 * little-endian length of `prefix` bytes followed by that many bytes.
 * Opcodes not listed take no operand.
 */
export type OperandSize = { fixed: number } | { prefix: 1 | 2 | 4 };

const OPERAND_SIZES: Partial<Record<OpCode, OperandSize>> = {
  [OpCode.PUSHINT8]: { fixed: 1 },
  [OpCode.PUSHINT16]: { fixed: 2 },
  [OpCode.PUSHINT32]: { fixed: 4 },
  [OpCode.PUSHINT64]: { fixed: 8 },
  [OpCode.PUSHINT128]: { fixed: 16 },
  [OpCode.PUSHINT256]: { fixed: 32 },
  [OpCode.PUSHA]: { fixed: 4 },
  [OpCode.PUSHDATA1]: { prefix: 1 },
  [OpCode.PUSHDATA2]: { prefix: 2 },
  [OpCode.PUSHDATA4]: { prefix: 4 },
  [OpCode.JMP]: { fixed: 1 },
  [OpCode.JMP_L]: { fixed: 4 },
  [OpCode.JMPIF]: { fixed: 1 },
  [OpCode.JMPIF_L]: { fixed: 4 },
  [OpCode.JMPIFNOT]: { fixed: 1 },
  [OpCode.JMPIFNOT_L]: { fixed: 4 },
  [OpCode.JMPEQ]: { fixed: 1 },
  [OpCode.JMPEQ_L]: { fixed: 4 },
  [OpCode.JMPNE]: { fixed: 1 },
  [OpCode.JMPNE_L]: { fixed: 4 },
  [OpCode.JMPGT]: { fixed: 1 },
  [OpCode.JMPGT_L]: { fixed: 4 },
  [OpCode.JMPGE]: { fixed: 1 },
  [OpCode.JMPGE_L]: { fixed: 4 },
  [OpCode.JMPLT]: { fixed: 1 },
  [OpCode.JMPLT_L]: { fixed: 4 },
  [OpCode.JMPLE]: { fixed: 1 },
  [OpCode.JMPLE_L]: { fixed: 4 },
  [OpCode.CALL]: { fixed: 1 },
  [OpCode.CALL_L]: { fixed: 4 },
  [OpCode.CALLT]: { fixed: 2 },
  [OpCode.TRY]: { fixed: 2 },
  [OpCode.TRY_L]: { fixed: 8 },
  [OpCode.ENDTRY]: { fixed: 1 },
  [OpCode.ENDTRY_L]: { fixed: 4 },
  [OpCode.SYSCALL]: { fixed: 4 },
  [OpCode.INITSSLOT]: { fixed: 1 },
  [OpCode.INITSLOT]: { fixed: 2 },
  [OpCode.LDSFLD]: { fixed: 1 },
  [OpCode.STSFLD]: { fixed: 1 },
  [OpCode.LDLOC]: { fixed: 1 },
  [OpCode.STLOC]: { fixed: 1 },
  [OpCode.LDARG]: { fixed: 1 },
  [OpCode.STARG]: { fixed: 1 },
  [OpCode.NEWARRAY_T]: { fixed: 1 },
  [OpCode.ISTYPE]: { fixed: 1 },
  [OpCode.CONVERT]: { fixed: 1 },
};

export function isOpCode(b: number): b is OpCode {
  return typeof OpCode[b] === 'string';
}

export function operandSize(op: OpCode): OperandSize {
  return OPERAND_SIZES[op] ?? { fixed: 0 };
}
