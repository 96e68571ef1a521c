import { describe, it, expect } from 'vitest';
import { Emulator } from '../../src/emulator/core';
import { MemoryAccessError, MemoryWriteProtectedError } from '../../src/emulator/errors';
import { FONT_GLYPHS } from '../../src/bus/font';
import type { CpuOptions } from '../../src/cpu/chip8cpu';

function romOf(words: number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 2);
  words.forEach((w, i) => { bytes[i * 2] = (w >>> 8) & 0xff; bytes[i * 2 + 1] = w & 0xff; });
  return bytes;
}

function run(words: number[], opts: CpuOptions = {}): Emulator {
  const emu = Emulator.fromRom(romOf(words), opts);
  for (let i = 0; i < words.length; i++) emu.stepInstruction();
  return emu;
}

describe('index register', () => {
  it('ANNN and FX1E', () => {
    const emu = run([0xa300, 0x6045, 0xf01e]);
    expect(emu.cpu.regs.I).toBe(0x345);
    expect(emu.cpu.regs.PC).toBe(0x206);
  });

  it('FX1E does not touch VF', () => {
    const emu = run([0x6f09, 0xaff0, 0x6020, 0xf01e]);
    expect(emu.cpu.regs.I).toBe(0x1010);
    expect(emu.cpu.regs.VF).toBe(9);
  });

  it('FX29 points I at the glyph for the low nibble of Vx', () => {
    const emu = run([0x6005, 0xf029]);
    expect(emu.cpu.regs.I).toBe(25);
    expect(Array.from(emu.memory.dump(emu.cpu.regs.I, 5))).toEqual([0xf0, 0x80, 0xf0, 0x10, 0xf0]);
    expect(Array.from(emu.memory.dump(emu.cpu.regs.I, 5))).toEqual(FONT_GLYPHS[5]);

    const high = run([0x601a, 0xf029]);
    expect(high.cpu.regs.I).toBe(0xa * 5);
  });
});

describe('BCD and register ranges', () => {
  it('FX33 writes hundreds, tens, ones', () => {
    const emu = run([0x6087, 0xa400, 0xf033]);
    expect(Array.from(emu.memory.dump(0x400, 3))).toEqual([1, 3, 5]);
  });

  it('FX33 of 255 and of 7', () => {
    expect(Array.from(run([0x60ff, 0xa400, 0xf033]).memory.dump(0x400, 3))).toEqual([2, 5, 5]);
    expect(Array.from(run([0x6007, 0xa400, 0xf033]).memory.dump(0x400, 3))).toEqual([0, 0, 7]);
  });

  it('FX55 then FX65 round-trips V0..Vx and leaves I alone', () => {
    const emu = run([0x6011, 0x6122, 0x6233, 0x63ff, 0xa500, 0xf255, 0x6000, 0x6100, 0x6200, 0xf265]);
    expect(Array.from(emu.memory.dump(0x500, 4))).toEqual([0x11, 0x22, 0x33, 0x00]);
    expect(Array.from(emu.cpu.regs.V.subarray(0, 4))).toEqual([0x11, 0x22, 0x33, 0xff]);
    expect(emu.cpu.regs.I).toBe(0x500);
  });

  it('loadStoreIncrementsI advances I by x + 1', () => {
    const store = run([0xa500, 0xf255], { quirks: { loadStoreIncrementsI: true } });
    expect(store.cpu.regs.I).toBe(0x503);
    const load = run([0xa500, 0xf065], { quirks: { loadStoreIncrementsI: true } });
    expect(load.cpu.regs.I).toBe(0x501);
  });

  it('writing into the interpreter area faults', () => {
    const emu = Emulator.fromRom(romOf([0xa100, 0xf055]));
    emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryWriteProtectedError);
    expect(emu.cpu.isHalted()).toBe(true);
  });

  it('range access past 0xFFF faults', () => {
    const emu = Emulator.fromRom(romOf([0xaffe, 0xf265]));
    emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryAccessError);
  });
});

describe('DRW', () => {
  it('draws from Memory[I] at (Vx, Vy) and reports collision in VF', () => {
    // glyph 0 at (10, 4), twice
    const emu = run([0x600a, 0x6104, 0xa000, 0xd015]);
    expect(emu.cpu.regs.VF).toBe(0);
    expect(emu.display.isSet(10, 4)).toBe(true);
    expect(emu.display.isSet(13, 4)).toBe(true);
    expect(emu.display.isSet(14, 4)).toBe(false);
    expect(emu.display.isSet(11, 5)).toBe(false);
    expect(emu.display.litCount()).toBe(14);
  });

  it('second draw of the same sprite erases it and sets VF', () => {
    const emu = run([0x600a, 0x6104, 0xa000, 0xd015, 0xd015]);
    expect(emu.cpu.regs.VF).toBe(1);
    expect(emu.display.litCount()).toBe(0);
  });

  it('sprite rows read past 0xFFF fault', () => {
    const emu = Emulator.fromRom(romOf([0xaffe, 0xd003]));
    emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryAccessError);
  });

  it('CLS clears the screen', () => {
    const emu = run([0xa000, 0xd005, 0x00e0]);
    expect(emu.display.litCount()).toBe(0);
  });
});

describe('timer opcodes', () => {
  it('FX15 / FX07 / FX18', () => {
    const emu = run([0x6030, 0xf015, 0x6110, 0xf118, 0xf207]);
    expect(emu.timers.getDelay()).toBe(0x30);
    expect(emu.timers.getSound()).toBe(0x10);
    expect(emu.cpu.regs.V[2]).toBe(0x30);
    expect(emu.isSoundActive()).toBe(true);
  });

  it('a failed FX55 leaves memory untouched', () => {
    const emu = Emulator.fromRom(romOf([0x6011, 0x6122, 0x6233, 0xaffe, 0xf255]));
    for (let i = 0; i < 4; i++) emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryAccessError);
    expect(Array.from(emu.memory.dump(0xffe, 2))).toEqual([0, 0]);
  });

  it('a failed FX65 leaves the registers untouched', () => {
    const emu = Emulator.fromRom(romOf([0x6077, 0x6188, 0x6299, 0xaffe, 0xf265]));
    for (let i = 0; i < 4; i++) emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryAccessError);
    expect(Array.from(emu.cpu.regs.V.subarray(0, 3))).toEqual([0x77, 0x88, 0x99]);
  });

  it('a failed FX33 writes no digits', () => {
    const emu = Emulator.fromRom(romOf([0x60ff, 0xaffe, 0xf033]));
    emu.stepInstruction();
    emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryAccessError);
    expect(Array.from(emu.memory.dump(0xffe, 2))).toEqual([0, 0]);
  });

  it('a range starting in the interpreter area writes nothing', () => {
    const emu = Emulator.fromRom(romOf([0x60ab, 0xa1ff, 0xf155]));
    emu.stepInstruction();
    emu.stepInstruction();
    expect(() => emu.stepInstruction()).toThrow(MemoryWriteProtectedError);
    expect(emu.memory.read8(0x200)).toBe(0x60);
  });
});
