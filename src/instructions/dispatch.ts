import { OpCode } from '../constants/opcodes';
import { MachineState } from '../hardware/machine';
import { TrapConsole } from '../io/console';
import { branch, jump, jumpRegister } from './control';
import { decodeOpCode } from './fields';
import {
  load,
  loadEffectiveAddress,
  loadIndirect,
  loadRegister,
  store,
  storeIndirect,
  storeRegister,
} from './memory-access';
import { add, bitwiseAnd, bitwiseNot } from './operate';
import { CONTINUE, ExecutionResult } from './result';
import { handleTrap } from './trap';

type Handler = (instr: number, state: MachineState) => void;

const HANDLERS: Readonly<
  Record<Exclude<OpCode, OpCode.OP_TRAP | OpCode.OP_RTI | OpCode.OP_RES>, Handler>
> = {
  [OpCode.OP_ADD]: add,
  [OpCode.OP_AND]: bitwiseAnd,
  [OpCode.OP_NOT]: bitwiseNot,
  [OpCode.OP_BR]: branch,
  [OpCode.OP_JMP]: jump,
  [OpCode.OP_JSR]: jumpRegister,
  [OpCode.OP_LD]: load,
  [OpCode.OP_LDI]: loadIndirect,
  [OpCode.OP_LDR]: loadRegister,
  [OpCode.OP_LEA]: loadEffectiveAddress,
  [OpCode.OP_ST]: store,
  [OpCode.OP_STI]: storeIndirect,
  [OpCode.OP_STR]: storeRegister,
};

/**
 * Executes one instruction against `state`. The PC must already point past
 * `instr`. RTI, RES and words that fail to decode leave the state untouched
 * and come back as `illegal`.
 */
export function executeInstruction(
  instr: number,
  state: MachineState,
  console: TrapConsole
): ExecutionResult {
  const op = decodeOpCode(instr);

  switch (op) {
    case OpCode.OP_TRAP:
      return handleTrap(instr, state, console);
    case OpCode.OP_RTI:
    case OpCode.OP_RES:
    case undefined:
      return { kind: 'illegal', instr, opCode: op };
    default:
      HANDLERS[op](instr, state);
      return CONTINUE;
  }
}
