import { createMachineState, MachineState } from '../src/hardware/machine';
import { Register } from '../src/hardware/register';
import { TrapConsole } from '../src/io/console';

/** Feeds queued key codes and records everything written. */
export class ScriptedConsole implements TrapConsole {
  public readonly output: number[] = [];

  constructor(private readonly input: number[] = []) {}

  public getChar(): number {
    return this.input.shift() ?? 0;
  }

  public putBuf(data: number[]): void {
    for (const c of data) {
      this.output.push(c);
    }
  }

  public get text(): string {
    return String.fromCharCode(...this.output);
  }
}

/** Machine state with the PC already past the instruction at 0x3000. */
export function mkState(pc = 0x3001, console?: TrapConsole): MachineState {
  const state = createMachineState(console);
  state.registers.pc = pc;
  return state;
}

export function setFlagsFrom(state: MachineState, value: number): void {
  state.registers.write(Register.R_R6, value);
  state.registers.updateFlags(Register.R_R6);
}
