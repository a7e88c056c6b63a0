import { MachineState } from '../hardware/machine';
import {
  baseRegister,
  destinationRegister,
  imm5,
  isImmediate,
  sourceRegister2,
} from './fields';

/** The second ADD/AND operand: imm5 or SR2. */
function secondOperand(instr: number, { registers }: MachineState): number {
  if (isImmediate(instr)) {
    return imm5(instr);
  }
  return registers.read(sourceRegister2(instr));
}

export function add(instr: number, state: MachineState): void {
  const { registers } = state;
  /* destination register (DR) */
  const r0 = destinationRegister(instr);
  /* first operand (SR1) */
  const r1 = baseRegister(instr);

  registers.write(r0, registers.read(r1) + secondOperand(instr, state));
  registers.updateFlags(r0);
}

export function bitwiseAnd(instr: number, state: MachineState): void {
  const { registers } = state;
  const r0 = destinationRegister(instr);
  const r1 = baseRegister(instr);

  registers.write(r0, registers.read(r1) & secondOperand(instr, state));
  registers.updateFlags(r0);
}

export function bitwiseNot(instr: number, { registers }: MachineState): void {
  const r0 = destinationRegister(instr);
  const r1 = baseRegister(instr);

  registers.write(r0, ~registers.read(r1));
  registers.updateFlags(r0);
}
