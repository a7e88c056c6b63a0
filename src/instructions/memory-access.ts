import { MachineState } from '../hardware/machine';
import {
  baseRegister,
  destinationRegister,
  offset6,
  pcOffset9,
} from './fields';

export function load(instr: number, { registers, memory }: MachineState): void {
  const r0 = destinationRegister(instr);
  registers.write(r0, memory.read(registers.pc + pcOffset9(instr)));
  registers.updateFlags(r0);
}

export function loadIndirect(
  instr: number,
  { registers, memory }: MachineState
): void {
  const r0 = destinationRegister(instr);
  /* add the offset to the current PC, look at that memory location to get the final address */
  const address = memory.read(registers.pc + pcOffset9(instr));
  registers.write(r0, memory.read(address));
  registers.updateFlags(r0);
}

export function loadRegister(
  instr: number,
  { registers, memory }: MachineState
): void {
  const r0 = destinationRegister(instr);
  const r1 = baseRegister(instr);
  registers.write(r0, memory.read(registers.read(r1) + offset6(instr)));
  registers.updateFlags(r0);
}

export function loadEffectiveAddress(
  instr: number,
  { registers }: MachineState
): void {
  const r0 = destinationRegister(instr);
  registers.write(r0, registers.pc + pcOffset9(instr));
  registers.updateFlags(r0);
}

export function store(instr: number, { registers, memory }: MachineState): void {
  const r0 = destinationRegister(instr);
  memory.write(registers.pc + pcOffset9(instr), registers.read(r0));
}

export function storeIndirect(
  instr: number,
  { registers, memory }: MachineState
): void {
  const r0 = destinationRegister(instr);
  const address = memory.read(registers.pc + pcOffset9(instr));
  memory.write(address, registers.read(r0));
}

export function storeRegister(
  instr: number,
  { registers, memory }: MachineState
): void {
  const r0 = destinationRegister(instr);
  const r1 = baseRegister(instr);
  memory.write(registers.read(r1) + offset6(instr), registers.read(r0));
}
