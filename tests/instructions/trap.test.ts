import { describe, it, expect } from 'vitest';
import { ConditionFlag, Register } from '../../src/hardware/register';
import { handleTrap } from '../../src/instructions/trap';
import { mkState, ScriptedConsole, setFlagsFrom } from '../helpers';

describe('TRAP', () => {
  it('HALT stops and prints HALT', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    expect(handleTrap(0xf025, state, console)).toEqual({ kind: 'halt' });
    expect(console.text).toBe('HALT\n');
    expect(state.registers.read(Register.R_R7)).toBe(0x3001);
  });

  it('OUT writes the low byte of R0', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    state.registers.write(Register.R_R0, 0x141);
    expect(handleTrap(0xf021, state, console)).toEqual({ kind: 'continue' });
    expect(console.output).toEqual([0x41]);
  });

  it('PUTS writes one character per word', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    state.memory.load(0x4000, [0x0148, 0x69, 0, 0x41]);
    state.registers.write(Register.R_R0, 0x4000);
    handleTrap(0xf022, state, console);
    expect(console.text).toBe('Hi');
  });

  it('PUTSP writes two characters per word, low byte first', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    state.memory.load(0x4000, [0x6548, 0x006c, 0]);
    state.registers.write(Register.R_R0, 0x4000);
    handleTrap(0xf024, state, console);
    expect(console.text).toBe('Hel');
  });

  it('GETC reads into R0 without echo or flag change', () => {
    const console = new ScriptedConsole([0x61]);
    const state = mkState(0x3001, console);
    setFlagsFrom(state, 0x8000);
    handleTrap(0xf020, state, console);
    expect(state.registers.read(Register.R_R0)).toBe(0x61);
    expect(console.output).toEqual([]);
    expect(state.registers.cond).toBe(ConditionFlag.FL_NEG);
  });

  it('IN prompts and echoes', () => {
    const console = new ScriptedConsole([0x7a]);
    const state = mkState(0x3001, console);
    handleTrap(0xf023, state, console);
    expect(console.text).toBe('Enter a character: z');
    expect(state.registers.read(Register.R_R0)).toBe(0x7a);
  });

  it('IN does not echo when nothing was typed', () => {
    const console = new ScriptedConsole([]);
    const state = mkState(0x3001, console);
    handleTrap(0xf023, state, console);
    expect(console.text).toBe('Enter a character: ');
    expect(state.registers.read(Register.R_R0)).toBe(0);
  });

  it('PUTS stops after one pass over memory without a terminator', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    state.memory.load(0, new Array<number>(0x10000).fill(0x41));
    state.registers.write(Register.R_R0, 0x4000);
    handleTrap(0xf022, state, console);
    expect(console.output.length).toBe(0x10000);
    expect(console.output[0]).toBe(0x41);
  });

  it('unknown vectors only save the return address', () => {
    const console = new ScriptedConsole();
    const state = mkState(0x3001, console);
    expect(handleTrap(0xf0ff, state, console)).toEqual({ kind: 'continue' });
    expect(state.registers.read(Register.R_R7)).toBe(0x3001);
    expect(console.output).toEqual([]);
  });
});
