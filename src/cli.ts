import { Command, InvalidArgumentError } from 'commander';
import { PC_START } from './constants/memory';
import { IllegalInstructionError, ImageFormatError } from './errors';
import { TerminalConsole } from './io/console';
import { LC3VirtualMachine } from './lc3-vm';

export interface RunOptions {
  pc: number;
}

/** Accepts `0x3000`, `x3000` or decimal. */
export function parseAddress(value: string): number {
  const text = value.trim().toLowerCase();
  let parsed: number;
  if (/^0?x[0-9a-f]+$/.test(text)) {
    parsed = parseInt(text.slice(text.indexOf('x') + 1), 16);
  } else if (/^\d+$/.test(text)) {
    parsed = parseInt(text, 10);
  } else {
    throw new InvalidArgumentError(`'${value}' is not an address.`);
  }
  if (parsed > 0xffff) {
    throw new InvalidArgumentError(`'${value}' is outside 0x0000-0xffff.`);
  }
  return parsed;
}

export function createProgram(
  run: (images: string[], options: RunOptions) => void
): Command {
  return new Command('lc3')
    .description('Run LC-3 program images')
    .argument('<images...>', 'object files to load, in order')
    .option('--pc <address>', 'entry point', parseAddress, PC_START)
    .action((images: string[], options: RunOptions) => {
      run(images, options);
    });
}

export function runImages(images: string[], options: RunOptions): void {
  const vm = new LC3VirtualMachine(new TerminalConsole());
  try {
    for (const image of images) {
      vm.loadImageFile(image);
    }
    vm.run(options.pc);
  } catch (error) {
    if (
      error instanceof IllegalInstructionError ||
      error instanceof ImageFormatError
    ) {
      console.error(`lc3: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}
