import {
  KBSR_READY,
  MEMORY_MAX,
  MemoryMappedRegister,
} from '../constants/memory';

/** Source of key presses behind the keyboard registers. */
export interface Keyboard {
  /** Blocks until a key arrives; 0 means nothing was typed. */
  getChar(): number;
}

/**
 * Flat 16-bit address space. Addresses wrap at 0xffff, so every computed
 * address is valid.
 */
export class Memory {
  private readonly cells = new Uint16Array(MEMORY_MAX);

  constructor(private readonly keyboard?: Keyboard) {}

  public read(address: number): number {
    const addr = address & 0xffff;
    if (addr === MemoryMappedRegister.MR_KBSR && this.keyboard) {
      const input = this.keyboard.getChar();
      if (input) {
        this.cells[MemoryMappedRegister.MR_KBSR] = KBSR_READY;
        this.cells[MemoryMappedRegister.MR_KBDR] = input;
      } else {
        this.cells[MemoryMappedRegister.MR_KBSR] = 0x00;
      }
    }
    return this.cells[addr];
  }

  /** Reads a cell without triggering device side effects. */
  public peek(address: number): number {
    return this.cells[address & 0xffff];
  }

  public write(address: number, val: number): void {
    this.cells[address & 0xffff] = val;
  }

  /** Copies `words` in starting at `origin`, wrapping past the top of memory. */
  public load(origin: number, words: ArrayLike<number>): void {
    for (let i = 0; i < words.length; i++) {
      this.cells[(origin + i) & 0xffff] = words[i];
    }
  }

  public reset(): void {
    this.cells.fill(0);
  }
}
