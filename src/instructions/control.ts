import { MachineState } from '../hardware/machine';
import { Register } from '../hardware/register';
import {
  baseRegister,
  bit,
  conditionMask,
  pcOffset11,
  pcOffset9,
} from './fields';

export function branch(instr: number, { registers }: MachineState): void {
  if (conditionMask(instr) & registers.cond) {
    registers.pc += pcOffset9(instr);
  }
}

/* Also handles RET */
export function jump(instr: number, { registers }: MachineState): void {
  registers.pc = registers.read(baseRegister(instr));
}

/** JSR when bit 11 is set, JSRR otherwise. */
export function jumpRegister(instr: number, { registers }: MachineState): void {
  const returnAddress = registers.pc;
  /* read before R7 is overwritten, so JSRR R7 jumps to the old R7 */
  const target = bit(instr, 11)
    ? returnAddress + pcOffset11(instr)
    : registers.read(baseRegister(instr));

  registers.write(Register.R_R7, returnAddress);
  registers.pc = target;
}
