import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Emulator } from '../../src/emulator/core';
import type { Quirks } from '../../src/emulator/config';

function romOf(words: number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 2);
  words.forEach((w, i) => { bytes[i * 2] = (w >>> 8) & 0xff; bytes[i * 2 + 1] = w & 0xff; });
  return bytes;
}

// Loads Vx=a, Vy=b, then applies 8XYn with x=1, y=2.
function alu(n: number, a: number, b: number, quirks: Partial<Quirks> = {}): Emulator {
  const emu = Emulator.fromRom(romOf([0x6100 | a, 0x6200 | b, 0x8120 | n]), { quirks });
  emu.stepInstruction();
  emu.stepInstruction();
  emu.stepInstruction();
  return emu;
}

const byte = fc.integer({ min: 0, max: 255 });

describe('8XYn arithmetic and logic', () => {
  it('LD/OR/AND/XOR', () => {
    expect(alu(0x0, 0x12, 0x34).cpu.regs.V[1]).toBe(0x34);
    expect(alu(0x1, 0xf0, 0x0f).cpu.regs.V[1]).toBe(0xff);
    expect(alu(0x2, 0xf0, 0x3c).cpu.regs.V[1]).toBe(0x30);
    expect(alu(0x3, 0xff, 0x0f).cpu.regs.V[1]).toBe(0xf0);
  });

  it('logic ops leave VF alone unless the quirk is on', () => {
    const rom = romOf([0x6f07, 0x6103, 0x6205, 0x8121]);
    const plain = Emulator.fromRom(rom);
    for (let i = 0; i < 4; i++) plain.stepInstruction();
    expect(plain.cpu.regs.VF).toBe(7);

    const quirky = Emulator.fromRom(rom, { quirks: { logicResetsVf: true } });
    for (let i = 0; i < 4; i++) quirky.stepInstruction();
    expect(quirky.cpu.regs.V[1]).toBe(0x07);
    expect(quirky.cpu.regs.VF).toBe(0);
  });

  it('ADD sets VF iff the sum overflows 255', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const emu = alu(0x4, a, b);
        expect(emu.cpu.regs.V[1]).toBe((a + b) & 0xff);
        expect(emu.cpu.regs.VF).toBe(a + b > 255 ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('SUB sets VF iff Vx >= Vy', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const emu = alu(0x5, a, b);
        expect(emu.cpu.regs.V[1]).toBe((a - b) & 0xff);
        expect(emu.cpu.regs.VF).toBe(a >= b ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('SUBN sets VF iff Vy >= Vx', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const emu = alu(0x7, a, b);
        expect(emu.cpu.regs.V[1]).toBe((b - a) & 0xff);
        expect(emu.cpu.regs.VF).toBe(b >= a ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('SHR/SHL put the shifted-out bit in VF', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const r = alu(0x6, a, b);
        expect(r.cpu.regs.V[1]).toBe(a >>> 1);
        expect(r.cpu.regs.VF).toBe(a & 1);
        const l = alu(0xe, a, b);
        expect(l.cpu.regs.V[1]).toBe((a << 1) & 0xff);
        expect(l.cpu.regs.VF).toBe(a >>> 7);
      }),
      { numRuns: 200 }
    );
  });

  it('shiftUsesVy shifts Vy into Vx', () => {
    const r = alu(0x6, 0x00, 0x03, { shiftUsesVy: true });
    expect(r.cpu.regs.V[1]).toBe(0x01);
    expect(r.cpu.regs.VF).toBe(1);
    const l = alu(0xe, 0x00, 0x81, { shiftUsesVy: true });
    expect(l.cpu.regs.V[1]).toBe(0x02);
    expect(l.cpu.regs.VF).toBe(1);
  });

  it('VF as destination ends up holding the flag', () => {
    // VF = 0xFF; V1 = 0x01; ADD VF, V1 -> carry
    const emu = Emulator.fromRom(romOf([0x6fff, 0x6101, 0x8f14]));
    for (let i = 0; i < 3; i++) emu.stepInstruction();
    expect(emu.cpu.regs.VF).toBe(1);
  });
});

describe('immediate ops', () => {
  it('7XNN wraps without touching VF', () => {
    const emu = Emulator.fromRom(romOf([0x6fAA, 0x60f0, 0x7020]));
    for (let i = 0; i < 3; i++) emu.stepInstruction();
    expect(emu.cpu.regs.V[0]).toBe(0x10);
    expect(emu.cpu.regs.VF).toBe(0xaa);
  });

  it('CXNN masks the random byte', () => {
    const emu = Emulator.fromRom(romOf([0xc30f, 0xc4ff]), { random: () => 0.999 });
    emu.stepInstruction();
    emu.stepInstruction();
    // floor(0.999 * 256) = 255
    expect(emu.cpu.regs.V[3]).toBe(0x0f);
    expect(emu.cpu.regs.V[4]).toBe(0xff);
  });

  it('CXNN with a zero mask is always zero', () => {
    const emu = Emulator.fromRom(romOf([0xc500]), { random: () => 0.5 });
    emu.stepInstruction();
    expect(emu.cpu.regs.V[5]).toBe(0);
  });
});
