import { MEMORY_MAX } from '../constants/memory';
import { IN_PROMPT, Trap } from '../constants/traps';
import { MachineState } from '../hardware/machine';
import { Register } from '../hardware/register';
import { TrapConsole, toCharCodes } from '../io/console';
import { trapVector } from './fields';
import { CONTINUE, ExecutionResult, HALT } from './result';

/**
 * Collects a zero-terminated string starting at `addr`, reading at most
 * MEMORY_MAX words.
 */
function readString(
  { memory }: MachineState,
  addr: number,
  packed: boolean
): number[] {
  const buf: number[] = [];
  for (let i = 0; i < MEMORY_MAX; i++) {
    const word = memory.peek(addr + i);
    if (word === 0) {
      break;
    }
    buf.push(word & 0xff);
    if (packed) {
      const char2 = word >> 8;
      if (char2) {
        buf.push(char2);
      }
    }
  }
  return buf;
}

/**
 * Saves the return address in R7 and runs the service routine named by the
 * low byte. Unknown vectors do nothing else. The condition flag is left alone.
 */
export function handleTrap(
  instr: number,
  state: MachineState,
  console: TrapConsole
): ExecutionResult {
  const { registers } = state;
  registers.write(Register.R_R7, registers.pc);

  switch (trapVector(instr)) {
    case Trap.TRAP_GETC: {
      /* read a single ASCII char */
      registers.write(Register.R_R0, console.getChar());
      break;
    }
    case Trap.TRAP_OUT: {
      console.putBuf([registers.read(Register.R_R0) & 0xff]);
      break;
    }
    case Trap.TRAP_PUTS: {
      /* one char per word */
      console.putBuf(readString(state, registers.read(Register.R_R0), false));
      break;
    }
    case Trap.TRAP_IN: {
      console.putBuf(toCharCodes(IN_PROMPT));
      const c = console.getChar();
      if (c) {
        console.putBuf([c & 0xff]);
      }
      registers.write(Register.R_R0, c);
      break;
    }
    case Trap.TRAP_PUTSP: {
      /* one char per byte (two bytes per word), low byte first */
      console.putBuf(readString(state, registers.read(Register.R_R0), true));
      break;
    }
    case Trap.TRAP_HALT: {
      console.putBuf(toCharCodes('HALT\n'));
      return HALT;
    }
  }
  return CONTINUE;
}
