/** 65536 addressable 16-bit words */
export const MEMORY_MAX = 1 << 16;

/** Default entry point for user programs */
export const PC_START = 0x3000;

/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
}

/** Bit set in KBSR when a key is waiting in KBDR */
export const KBSR_READY = 1 << 15;
