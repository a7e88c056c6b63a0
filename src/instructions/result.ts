import { OpCode } from '../constants/opcodes';

/** Opcodes this machine does not execute. */
export type ReservedOpCode = OpCode.OP_RTI | OpCode.OP_RES;

export type ExecutionResult =
  | { readonly kind: 'continue' }
  | { readonly kind: 'halt' }
  /* opCode is undefined when the word did not decode at all */
  | {
      readonly kind: 'illegal';
      readonly instr: number;
      readonly opCode: ReservedOpCode | undefined;
    };

/* returned by every call */
export const CONTINUE: ExecutionResult = Object.freeze({
  kind: 'continue',
} as const);
export const HALT: ExecutionResult = Object.freeze({ kind: 'halt' } as const);
