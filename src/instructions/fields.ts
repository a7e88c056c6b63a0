import { OpCode, opCodeFromBits } from '../constants/opcodes';
import { Register } from '../hardware/register';

/**
 * Interprets the low `bitCount` bits of `x` as a two's-complement number.
 * `signExtend(0b10000, 5)` is -16, `signExtend(0b01111, 5)` is 15.
 */
export function signExtend(x: number, bitCount: number): number {
  const m = 1 << (bitCount - 1);
  x &= (1 << bitCount) - 1;
  return (x ^ m) - m;
}

/** Bits 15-12. Words outside 0x0000-0xffff do not decode. */
export function decodeOpCode(instr: number): OpCode | undefined {
  if (!Number.isInteger(instr) || instr < 0 || instr > 0xffff) {
    return undefined;
  }
  return opCodeFromBits((instr >> 12) & 0xf);
}

/** A single bit as a boolean, e.g. the immediate flag (5) or JSR mode (11). */
export function bit(instr: number, position: number): boolean {
  return ((instr >> position) & 0x1) === 1;
}

/** Bits 11-9: DR, or SR for stores. */
export function destinationRegister(instr: number): Register {
  return (instr >> 9) & 0x7;
}

/** Bits 8-6: SR1 or BaseR. */
export function baseRegister(instr: number): Register {
  return (instr >> 6) & 0x7;
}

/** Bits 2-0: SR2 in register mode. */
export function sourceRegister2(instr: number): Register {
  return instr & 0x7;
}

/** Bits 11-9 of BR: the n, z and p request bits, aligned with ConditionFlag. */
export function conditionMask(instr: number): number {
  return (instr >> 9) & 0x7;
}

export const isImmediate = (instr: number): boolean => bit(instr, 5);

export const imm5 = (instr: number): number => signExtend(instr & 0x1f, 5);

export const offset6 = (instr: number): number => signExtend(instr & 0x3f, 6);

export const pcOffset9 = (instr: number): number =>
  signExtend(instr & 0x1ff, 9);

export const pcOffset11 = (instr: number): number =>
  signExtend(instr & 0x7ff, 11);

export const trapVector = (instr: number): number => instr & 0xff;
