import { Memory } from '../bus/memory';
import { DisplayBuffer } from '../ppu/display';
import { Timers } from '../apu/timers';
import { Keypad } from '../input/keypad';
import { Chip8CPU, CpuOptions } from '../cpu/chip8cpu';
import { Cartridge } from '../cart/cartridge';
import type { IEmulator } from './types';

// Owns every piece of machine state. Adapters talk to it through setKey(),
// display snapshots and isSoundActive(); nothing here is global.
export class Emulator implements IEmulator {
  readonly memory = new Memory();
  readonly display = new DisplayBuffer();
  readonly timers = new Timers();
  readonly keypad = new Keypad();
  readonly cpu: Chip8CPU;
  private cart: Cartridge | null = null;

  constructor(opts: CpuOptions = {}) {
    this.cpu = new Chip8CPU(
      { memory: this.memory, display: this.display, timers: this.timers, keypad: this.keypad },
      opts,
    );
  }

  static fromCartridge(cart: Cartridge, opts: CpuOptions = {}): Emulator {
    const emu = new Emulator(opts);
    emu.loadCartridge(cart);
    return emu;
  }

  // Throws RomLoadError before touching any state when the image does not fit.
  static fromRom(rom: Uint8Array, opts: CpuOptions = {}): Emulator {
    return Emulator.fromCartridge(new Cartridge({ rom }), opts);
  }

  get cartridge(): Cartridge | null {
    return this.cart;
  }

  loadCartridge(cart: Cartridge): void {
    this.cart = cart;
    this.reset();
  }

  loadRom(rom: Uint8Array): void {
    this.loadCartridge(new Cartridge({ rom }));
  }

  // Power-on state; the current cartridge (if any) is copied back to 0x200.
  reset(): void {
    this.memory.reset();
    this.display.clear();
    this.display.consumeDirty();
    this.timers.reset();
    this.keypad.releaseAll();
    this.cpu.reset();
    if (this.cart) this.memory.loadProgram(this.cart.rom);
  }

  stepInstruction(): void {
    this.cpu.step();
  }

  setKey(key: number, pressed: boolean): void {
    this.keypad.setKey(key, pressed);
  }

  isSoundActive(): boolean {
    return this.timers.isSoundActive();
  }
}
