import { describe, it, expect } from 'vitest';
import { ConditionFlag, Register } from '../../src/hardware/register';
import {
  load,
  loadEffectiveAddress,
  loadIndirect,
  loadRegister,
  store,
  storeIndirect,
  storeRegister,
} from '../../src/instructions/memory-access';
import { mkState, setFlagsFrom } from '../helpers';

describe('loads', () => {
  it('LD reads PC-relative', () => {
    const state = mkState(0x3001);
    state.memory.write(0x3004, 0x8001);
    load(0x2403, state); // LD R2, #3
    expect(state.registers.read(Register.R_R2)).toBe(0x8001);
    expect(state.registers.cond).toBe(ConditionFlag.FL_NEG);
  });

  it('LDI follows one pointer', () => {
    const state = mkState(0x3001);
    state.memory.write(0x3003, 0x3000);
    state.memory.write(0x3000, 0x00ff);
    loadIndirect(0xa202, state); // LDI R1, #2
    expect(state.registers.read(Register.R_R1)).toBe(0x00ff);
    expect(state.registers.cond).toBe(ConditionFlag.FL_POS);
  });

  it('LDR reads base plus a negative offset', () => {
    const state = mkState();
    state.registers.write(Register.R_R4, 9);
    state.registers.write(Register.R_R5, 0x4002);
    loadRegister(0x697e, state); // LDR R4, R5, #-2
    expect(state.registers.read(Register.R_R4)).toBe(0);
    expect(state.registers.cond).toBe(ConditionFlag.FL_ZRO);
  });

  it('LDR wraps below address zero', () => {
    const state = mkState();
    state.memory.write(0xffff, 42);
    loadRegister(0x607f, state); // LDR R0, R1, #-1 with R1 = 0
    expect(state.registers.read(Register.R_R0)).toBe(42);
  });

  it('LEA loads the address, not its contents', () => {
    const state = mkState(0x3001);
    state.memory.write(0x3000, 0x1234);
    loadEffectiveAddress(0xe1ff, state); // LEA R0, #-1
    expect(state.registers.read(Register.R_R0)).toBe(0x3000);
    expect(state.registers.cond).toBe(ConditionFlag.FL_POS);
  });
});

describe('stores', () => {
  it('ST writes PC-relative without touching flags', () => {
    const state = mkState(0x3001);
    setFlagsFrom(state, 0);
    state.registers.write(Register.R_R3, 0xbeef);
    store(0x3604, state); // ST R3, #4
    expect(state.memory.peek(0x3005)).toBe(0xbeef);
    expect(state.registers.cond).toBe(ConditionFlag.FL_ZRO);
  });

  it('STI writes through a pointer', () => {
    const state = mkState(0x3001);
    state.memory.write(0x3002, 0x4000);
    state.registers.write(Register.R_R3, 0x0042);
    storeIndirect(0xb601, state); // STI R3, #1
    expect(state.memory.peek(0x4000)).toBe(0x0042);
    expect(state.memory.peek(0x3002)).toBe(0x4000);
  });

  it('STR writes base plus offset', () => {
    const state = mkState();
    state.registers.write(Register.R_R3, 7);
    state.registers.write(Register.R_R6, 0x4000);
    storeRegister(0x779f, state); // STR R3, R6, #31
    expect(state.memory.peek(0x401f)).toBe(7);
  });
});
