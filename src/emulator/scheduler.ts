import { Emulator } from './core';
import { Chip8Error } from './errors';
import { CpuErrorMode, DEFAULT_IPF, clampIpf } from './config';
import type { FrameResult } from './types';
import { formatOpcode } from '../tools/disassembler';
import { hex } from '../utils/hex';

export type { CpuErrorMode } from './config';

export interface SchedulerOptions {
  instructionsPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, emit CPU state every N instructions
  trace?: (line: string) => void;
}

// One frame = up to N CPU steps, then a single 60 Hz timer tick.
// Frames end early while the CPU waits for a key or after a fault.
export class Scheduler {
  private ipf: number;
  private readonly onCpuError: CpuErrorMode;
  private readonly traceEveryInstr: number;
  private readonly trace: ((line: string) => void) | undefined;
  public lastCpuError: Chip8Error | undefined;
  private frameCount = 0;

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    this.ipf = clampIpf(opts.instructionsPerFrame ?? DEFAULT_IPF);
    this.onCpuError = opts.onCpuError ?? 'record';
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
    this.trace = opts.trace;
  }

  get instructionsPerFrame(): number { return this.ipf; }
  set instructionsPerFrame(v: number) { this.ipf = clampIpf(v); }

  get frames(): number { return this.frameCount; }

  stepFrame(): FrameResult {
    const cpu = this.emu.cpu;
    const before = cpu.cycles;

    if (!cpu.isHalted()) {
      // A reset or reload since the last fault brings the CPU back to running.
      this.lastCpuError = undefined;
      for (let i = 0; i < this.ipf; i++) {
        const prevCycles = cpu.cycles;
        try {
          this.emu.stepInstruction();
        } catch (e) {
          if (!(e instanceof Chip8Error)) throw e;
          this.lastCpuError = e;
          if (this.onCpuError === 'throw') throw e;
          break;
        }
        if (cpu.cycles !== prevCycles) this.maybeTrace();
        if (cpu.isAwaitingKey()) break;
      }
    }

    // Timers keep running during a key wait and after a halt
    this.emu.timers.tick();
    this.frameCount++;

    const result: FrameResult = {
      frame: this.frameCount,
      executed: cpu.cycles - before,
      display: this.emu.display.snapshot(),
      displayChanged: this.emu.display.consumeDirty(),
      soundActive: this.emu.isSoundActive(),
      awaitingKey: cpu.isAwaitingKey(),
    };
    if (this.lastCpuError) result.fault = this.lastCpuError;
    return result;
  }

  runFrames(count: number): FrameResult | undefined {
    let last: FrameResult | undefined;
    for (let f = 0; f < count; f++) {
      last = this.stepFrame();
      if (last.fault) break;
    }
    return last;
  }

  private maybeTrace(): void {
    if (!this.trace || this.traceEveryInstr <= 0) return;
    const cpu = this.emu.cpu;
    if ((cpu.cycles % this.traceEveryInstr) !== 0) return;
    const r = cpu.regs;
    const regs = Array.from(r.V, (b) => hex(b, 2)).join(' ');
    this.trace(`[TRACE] ${hex(cpu.lastPC, 3)} ${hex(cpu.lastOpcode, 4)} ${formatOpcode(cpu.lastOpcode).padEnd(16)} I=${hex(r.I, 3)} SP=${r.depth} V=${regs}`);
  }
}
