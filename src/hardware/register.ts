export enum Register {
  R_R0,
  R_R1,
  R_R2,
  R_R3,
  R_R4,
  R_R5,
  R_R6,
  R_R7,
  R_PC /* program counter */,
  R_COUNT,
}

export enum ConditionFlag {
  FL_POS = 1 << 0 /* P */,
  FL_ZRO = 1 << 1 /* Z */,
  FL_NEG = 1 << 2 /* N */,
}

const SIGN_BIT = 1 << 15;

/** Condition flag describing the sign of a 16-bit value. */
export function flagFor(value: number): ConditionFlag {
  const word = value & 0xffff;
  if (word & SIGN_BIT) {
    /* a 1 in the left-most bit indicates negative */
    return ConditionFlag.FL_NEG;
  }
  return word === 0 ? ConditionFlag.FL_ZRO : ConditionFlag.FL_POS;
}

/**
 * R0-R7, the program counter and the condition flag. Writes are truncated to
 * 16 bits, so arithmetic wraps the way the hardware does.
 */
export class RegisterFile {
  private readonly cells = new Uint16Array(Register.R_COUNT);
  private condition: ConditionFlag = ConditionFlag.FL_ZRO;

  public read(r: Register): number {
    return this.cells[r];
  }

  public write(r: Register, value: number): void {
    this.cells[r] = value;
  }

  public get pc(): number {
    return this.cells[Register.R_PC];
  }

  public set pc(value: number) {
    this.cells[Register.R_PC] = value;
  }

  public get cond(): ConditionFlag {
    return this.condition;
  }

  /** Sets the flag from the value now held in `r`. */
  public updateFlags(r: Register): void {
    this.condition = flagFor(this.cells[r]);
  }

  public reset(): void {
    this.cells.fill(0);
    this.condition = ConditionFlag.FL_ZRO;
  }
}
