export * from './constants/memory';
export * from './constants/opcodes';
export * from './constants/traps';
export * from './errors';
export * from './hardware/machine';
export * from './hardware/memory';
export * from './hardware/register';
export * from './image';
export * from './instructions/dispatch';
export * from './instructions/fields';
export * from './instructions/result';
export * from './io/console';
export { LC3VirtualMachine } from './lc3-vm';
