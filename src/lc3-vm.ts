import { PC_START } from './constants/memory';
import { IllegalInstructionError } from './errors';
import { createMachineState, MachineState } from './hardware/machine';
import { readImage, readImageFile } from './image';
import { executeInstruction } from './instructions/dispatch';
import { ExecutionResult } from './instructions/result';
import { TrapConsole } from './io/console';

export class LC3VirtualMachine {
  public readonly state: MachineState;

  constructor(private readonly console: TrapConsole) {
    this.state = createMachineState(console);
  }

  public loadImage(image: Uint8Array): number {
    return readImage(this.state.memory, image);
  }

  public loadImageFile(imagePath: string): number {
    return readImageFile(this.state.memory, imagePath);
  }

  /** Fetches the word at PC, advances PC, then executes the word. */
  public step(): ExecutionResult {
    const { registers, memory } = this.state;
    const instr = memory.read(registers.pc);
    registers.pc++;
    return executeInstruction(instr, this.state, this.console);
  }

  /**
   * Runs from `startPc` until HALT and returns the number of instructions
   * executed, the HALT trap included.
   */
  public run(startPc: number = PC_START): number {
    const { registers } = this.state;
    registers.pc = startPc;

    let executed = 0;
    for (;;) {
      const address = registers.pc;
      const result = this.step();
      executed++;

      switch (result.kind) {
        case 'continue':
          break;
        case 'halt':
          return executed;
        case 'illegal':
          throw new IllegalInstructionError(
            result.instr,
            address,
            result.opCode
          );
      }
    }
  }
}
