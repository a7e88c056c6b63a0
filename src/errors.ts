import { OP_NAMES } from './constants/opcodes';
import { ReservedOpCode } from './instructions/result';

const hex = (n: number): string => `0x${n.toString(16).padStart(4, '0')}`;

export class IllegalInstructionError extends Error {
  constructor(
    public readonly instr: number,
    public readonly address: number,
    public readonly opCode: ReservedOpCode | undefined
  ) {
    const what = opCode === undefined ? 'undecodable word' : OP_NAMES[opCode];
    super(`${what} ${hex(instr)} at ${hex(address)}`);
    this.name = 'IllegalInstructionError';
  }
}

export class ImageFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageFormatError';
  }
}
