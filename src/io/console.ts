import { keyIn, keyInYN } from 'readline-sync';
import { Keyboard } from '../hardware/memory';

/** Character I/O behind the trap routines and the keyboard registers. */
export interface TrapConsole extends Keyboard {
  /** Writes each number as one byte. */
  putBuf(data: number[]): void;
}

/** Blocking terminal console on stdin/stdout. */
export class TerminalConsole implements TrapConsole {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  public getChar(): number {
    const input = keyIn('', { hideEchoBack: true, mask: '' });
    if (input.toLowerCase() === 'q') {
      if (keyInYN('Would you like to quit?')) {
        process.exit(0);
      }
    }
    return input.length > 0 ? input.charCodeAt(0) : 0;
  }

  public putBuf(data: number[]): void {
    this.out.write(Buffer.from(data).toString('utf8'));
  }
}

export function toCharCodes(text: string): number[] {
  return Array.from(text, (c) => c.charCodeAt(0));
}
