import { PROGRAM_START } from '../bus/memory';
import { StackOverflowError, StackUnderflowError } from '../emulator/errors';

export const REGISTER_COUNT = 16;
export const FLAG_REGISTER = 0xf;
export const STACK_DEPTH = 16;

export interface RegisterState {
  V: number[];
  I: number;
  PC: number;
  stack: number[]; // bottom first
}

// V0-VF, I, PC and the return-address stack.
export class RegisterFile {
  readonly V = new Uint8Array(REGISTER_COUNT);
  private _I = 0;
  private _PC = PROGRAM_START;
  private readonly stack = new Uint16Array(STACK_DEPTH);
  private sp = 0;

  get I(): number { return this._I; }
  // Kept at 16 bits so an index walked past 0xFFF faults on access instead of wrapping.
  set I(v: number) { this._I = v & 0xffff; }

  get PC(): number { return this._PC; }
  set PC(v: number) { this._PC = v & 0xffff; }

  get VF(): number { return this.V[FLAG_REGISTER]; }
  set VF(v: number) { this.V[FLAG_REGISTER] = v & 0xff; }

  get depth(): number { return this.sp; }

  push(addr: number): void {
    if (this.sp >= STACK_DEPTH) throw new StackOverflowError(this.sp + 1);
    this.stack[this.sp++] = addr & 0xffff;
  }

  pop(): number {
    if (this.sp === 0) throw new StackUnderflowError();
    return this.stack[--this.sp];
  }

  reset(): void {
    this.V.fill(0);
    this._I = 0;
    this._PC = PROGRAM_START;
    this.stack.fill(0);
    this.sp = 0;
  }

  getState(): RegisterState {
    return {
      V: Array.from(this.V),
      I: this._I,
      PC: this._PC,
      stack: Array.from(this.stack.subarray(0, this.sp)),
    };
  }
}
