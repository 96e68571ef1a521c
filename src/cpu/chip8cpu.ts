import { Memory } from '../bus/memory';
import { fontAddress } from '../bus/font';
import { DisplayBuffer } from '../ppu/display';
import { Timers } from '../apu/timers';
import { Keypad } from '../input/keypad';
import { Chip8Error, CpuHaltedError, InvalidOpcodeError, UnsupportedInstructionError } from '../emulator/errors';
import { DEFAULT_QUIRKS, Quirks } from '../emulator/config';
import type { Nibble } from '../emulator/types';
import { RegisterFile, RegisterState } from './registers';
import { decode, Instruction } from './opcodes';

export type RunState =
  | { kind: 'running' }
  | { kind: 'awaitingKey'; register: Nibble }
  | { kind: 'halted'; fault: Chip8Error };

export interface CpuDevices {
  memory: Memory;
  display: DisplayBuffer;
  timers: Timers;
  keypad: Keypad;
}

export interface CpuOptions {
  quirks?: Partial<Quirks>;
  random?: () => number; // [0, 1)
}

export interface CpuState {
  registers: RegisterState;
  run: RunState['kind'];
  cycles: number;
}

export class Chip8CPU {
  readonly regs = new RegisterFile();
  private runState: RunState = { kind: 'running' };
  private readonly quirks: Quirks;
  private readonly random: () => number;
  // Instructions fetched and executed since reset; a pending key wait does not count.
  private _cycles = 0;
  // Execution context for tracing: last fetched opcode and its PC
  private _lastPC = 0;
  private _lastOpcode = 0;

  constructor(private readonly dev: CpuDevices, opts: CpuOptions = {}) {
    this.quirks = { ...DEFAULT_QUIRKS, ...opts.quirks };
    this.random = opts.random ?? Math.random;
  }

  get cycles(): number { return this._cycles; }
  get lastPC(): number { return this._lastPC; }
  get lastOpcode(): number { return this._lastOpcode; }
  get state(): RunState { return this.runState; }

  isAwaitingKey(): boolean { return this.runState.kind === 'awaitingKey'; }
  isHalted(): boolean { return this.runState.kind === 'halted'; }

  reset(): void {
    this.regs.reset();
    this.runState = { kind: 'running' };
    this._cycles = 0;
    this._lastPC = 0;
    this._lastOpcode = 0;
  }

  // Fetch, decode and execute one instruction. While a key wait is pending this
  // only polls the keypad. A fault halts the CPU and is rethrown; later calls
  // throw CpuHaltedError until reset().
  step(): void {
    const rs = this.runState;
    if (rs.kind === 'halted') throw new CpuHaltedError(rs.fault);
    if (rs.kind === 'awaitingKey') {
      this.pollKeyWait(rs.register);
      return;
    }
    const pc = this.regs.PC;
    try {
      const opcode = this.dev.memory.read16(pc);
      this._lastPC = pc;
      this._lastOpcode = opcode;
      const instr = decode(opcode);
      if (instr === null) throw new InvalidOpcodeError(opcode, pc);
      this.execute(instr);
      this._cycles++;
    } catch (e) {
      if (e instanceof Chip8Error) this.runState = { kind: 'halted', fault: e };
      throw e;
    }
  }

  // Apply one decoded instruction. PC is advanced here, not by the caller.
  execute(instr: Instruction): void {
    const r = this.regs;
    const V = r.V;
    const { memory, display, timers, keypad } = this.dev;
    let next = r.PC + 2;

    switch (instr.op) {
      case 'CLS':
        display.clear();
        break;
      case 'RET':
        next = r.pop();
        break;
      case 'SYS':
        throw new UnsupportedInstructionError(instr.nnn, r.PC);
      case 'JP':
        next = instr.nnn;
        break;
      case 'CALL':
        r.push(next);
        next = instr.nnn;
        break;
      case 'SE_IMM':
        if (V[instr.x] === instr.nn) next += 2;
        break;
      case 'SNE_IMM':
        if (V[instr.x] !== instr.nn) next += 2;
        break;
      case 'SE_REG':
        if (V[instr.x] === V[instr.y]) next += 2;
        break;
      case 'SNE_REG':
        if (V[instr.x] !== V[instr.y]) next += 2;
        break;
      case 'LD_IMM':
        V[instr.x] = instr.nn;
        break;
      case 'ADD_IMM':
        // carry flag untouched
        V[instr.x] = (V[instr.x] + instr.nn) & 0xff;
        break;
      case 'LD_REG':
        V[instr.x] = V[instr.y];
        break;
      case 'OR':
        V[instr.x] |= V[instr.y];
        if (this.quirks.logicResetsVf) r.VF = 0;
        break;
      case 'AND':
        V[instr.x] &= V[instr.y];
        if (this.quirks.logicResetsVf) r.VF = 0;
        break;
      case 'XOR':
        V[instr.x] ^= V[instr.y];
        if (this.quirks.logicResetsVf) r.VF = 0;
        break;
      case 'ADD_REG': {
        const sum = V[instr.x] + V[instr.y];
        V[instr.x] = sum & 0xff;
        r.VF = sum > 0xff ? 1 : 0;
        break;
      }
      case 'SUB': {
        const noBorrow = V[instr.x] >= V[instr.y] ? 1 : 0;
        V[instr.x] = (V[instr.x] - V[instr.y]) & 0xff;
        r.VF = noBorrow;
        break;
      }
      case 'SUBN': {
        const noBorrow = V[instr.y] >= V[instr.x] ? 1 : 0;
        V[instr.x] = (V[instr.y] - V[instr.x]) & 0xff;
        r.VF = noBorrow;
        break;
      }
      case 'SHR': {
        const src = this.quirks.shiftUsesVy ? V[instr.y] : V[instr.x];
        V[instr.x] = src >>> 1;
        r.VF = src & 0x01;
        break;
      }
      case 'SHL': {
        const src = this.quirks.shiftUsesVy ? V[instr.y] : V[instr.x];
        V[instr.x] = (src << 1) & 0xff;
        r.VF = (src >>> 7) & 0x01;
        break;
      }
      case 'LD_I':
        r.I = instr.nnn;
        break;
      case 'JP_V0':
        next = instr.nnn + V[0];
        break;
      case 'RND':
        V[instr.x] = (Math.floor(this.random() * 256) & 0xff) & instr.nn;
        break;
      case 'DRW': {
        const sprite = new Uint8Array(instr.n);
        for (let row = 0; row < instr.n; row++) sprite[row] = memory.read8(r.I + row);
        r.VF = display.draw(V[instr.x], V[instr.y], sprite) ? 1 : 0;
        break;
      }
      case 'SKP':
        if (keypad.isPressed(V[instr.x])) next += 2;
        break;
      case 'SKNP':
        if (!keypad.isPressed(V[instr.x])) next += 2;
        break;
      case 'LD_VX_DT':
        V[instr.x] = timers.getDelay();
        break;
      case 'LD_VX_K':
        // PC stays on this instruction until a key goes down.
        keypad.clearLatch();
        this.runState = { kind: 'awaitingKey', register: instr.x };
        next = r.PC;
        break;
      case 'LD_DT_VX':
        timers.setDelay(V[instr.x]);
        break;
      case 'LD_ST_VX':
        timers.setSound(V[instr.x]);
        break;
      case 'ADD_I':
        r.I = r.I + V[instr.x];
        break;
      case 'LD_F':
        r.I = fontAddress(V[instr.x]);
        break;
      case 'BCD': {
        const v = V[instr.x];
        memory.checkRange(r.I, 3, 'write');
        memory.write8(r.I, Math.floor(v / 100));
        memory.write8(r.I + 1, Math.floor(v / 10) % 10);
        memory.write8(r.I + 2, v % 10);
        break;
      }
      case 'STORE':
        memory.checkRange(r.I, instr.x + 1, 'write');
        for (let i = 0; i <= instr.x; i++) memory.write8(r.I + i, V[i]);
        if (this.quirks.loadStoreIncrementsI) r.I = r.I + instr.x + 1;
        break;
      case 'LOAD':
        memory.checkRange(r.I, instr.x + 1, 'read');
        for (let i = 0; i <= instr.x; i++) V[i] = memory.read8(r.I + i);
        if (this.quirks.loadStoreIncrementsI) r.I = r.I + instr.x + 1;
        break;
    }

    r.PC = next;
  }

  getState(): CpuState {
    return { registers: this.regs.getState(), run: this.runState.kind, cycles: this._cycles };
  }

  private pollKeyWait(register: Nibble): void {
    const key = this.dev.keypad.takeLatchedKey();
    if (key === null) return;
    this.regs.V[register] = key;
    this.regs.PC = this.regs.PC + 2;
    this.runState = { kind: 'running' };
  }
}
