import { Keyboard, Memory } from './memory';
import { RegisterFile } from './register';

/** Everything an instruction may read or mutate. */
export interface MachineState {
  readonly registers: RegisterFile;
  readonly memory: Memory;
}

export function createMachineState(keyboard?: Keyboard): MachineState {
  return {
    registers: new RegisterFile(),
    memory: new Memory(keyboard),
  };
}
