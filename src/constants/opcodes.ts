/**
 * Each instruction is 16 bits long; the left 4 bits hold the opcode and the
 * remaining 12 bits its parameters. All 16 values are assigned, RTI and RES
 * being unused by this machine.
 */
export enum OpCode {
  OP_BR = 0 /* branch */,
  OP_ADD = 1 /* add  */,
  OP_LD = 2 /* load */,
  OP_ST = 3 /* store */,
  OP_JSR = 4 /* jump register */,
  OP_AND = 5 /* bitwise and */,
  OP_LDR = 6 /* load register */,
  OP_STR = 7 /* store register */,
  OP_RTI = 8 /* unused */,
  OP_NOT = 9 /* bitwise not */,
  OP_LDI = 10 /* load indirect */,
  OP_STI = 11 /* store indirect */,
  OP_JMP = 12 /* jump */,
  OP_RES = 13 /* reserved (unused) */,
  OP_LEA = 14 /* load effective address */,
  OP_TRAP = 15 /* execute trap */,
}

/** Indexed by the 4-bit opcode field. */
const OP_CODES: readonly OpCode[] = [
  OpCode.OP_BR,
  OpCode.OP_ADD,
  OpCode.OP_LD,
  OpCode.OP_ST,
  OpCode.OP_JSR,
  OpCode.OP_AND,
  OpCode.OP_LDR,
  OpCode.OP_STR,
  OpCode.OP_RTI,
  OpCode.OP_NOT,
  OpCode.OP_LDI,
  OpCode.OP_STI,
  OpCode.OP_JMP,
  OpCode.OP_RES,
  OpCode.OP_LEA,
  OpCode.OP_TRAP,
];

/**
 * Maps a 4-bit opcode field to its tag. Returns `undefined` for anything
 * outside 0-15.
 */
export function opCodeFromBits(bits: number): OpCode | undefined {
  if (!Number.isInteger(bits) || bits < 0 || bits >= OP_CODES.length) {
    return undefined;
  }
  return OP_CODES[bits];
}

/** Mnemonics, used in diagnostics. */
export const OP_NAMES: Readonly<Record<OpCode, string>> = {
  [OpCode.OP_BR]: 'BR',
  [OpCode.OP_ADD]: 'ADD',
  [OpCode.OP_LD]: 'LD',
  [OpCode.OP_ST]: 'ST',
  [OpCode.OP_JSR]: 'JSR',
  [OpCode.OP_AND]: 'AND',
  [OpCode.OP_LDR]: 'LDR',
  [OpCode.OP_STR]: 'STR',
  [OpCode.OP_RTI]: 'RTI',
  [OpCode.OP_NOT]: 'NOT',
  [OpCode.OP_LDI]: 'LDI',
  [OpCode.OP_STI]: 'STI',
  [OpCode.OP_JMP]: 'JMP',
  [OpCode.OP_RES]: 'RES',
  [OpCode.OP_LEA]: 'LEA',
  [OpCode.OP_TRAP]: 'TRAP',
};
