import { describe, it, expect } from 'vitest';
import { disassemble, formatListing, formatOpcode } from '../../src/tools/disassembler';

describe('formatOpcode', () => {
  it('uses conventional mnemonics', () => {
    expect(formatOpcode(0x00e0)).toBe('CLS');
    expect(formatOpcode(0x00ee)).toBe('RET');
    expect(formatOpcode(0x1234)).toBe('JP 0x234');
    expect(formatOpcode(0x2abc)).toBe('CALL 0xABC');
    expect(formatOpcode(0x6aff)).toBe('LD VA, 0xFF');
    expect(formatOpcode(0x8ab6)).toBe('SHR VA, VB');
    expect(formatOpcode(0xb300)).toBe('JP V0, 0x300');
    expect(formatOpcode(0xd125)).toBe('DRW V1, V2, 5');
    expect(formatOpcode(0xe59e)).toBe('SKP V5');
    expect(formatOpcode(0xf20a)).toBe('LD V2, K');
    expect(formatOpcode(0xf333)).toBe('LD B, V3');
    expect(formatOpcode(0xf455)).toBe('LD [I], V4');
    expect(formatOpcode(0xf465)).toBe('LD V4, [I]');
  });

  it('emits unknown words as data', () => {
    expect(formatOpcode(0xffff)).toBe('DW 0xFFFF');
    expect(formatOpcode(0x5121)).toBe('DW 0x5121');
    expect(formatOpcode(0x800f)).toBe('DW 0x800F');
  });
});

describe('disassemble', () => {
  it('sweeps two bytes at a time from 0x200', () => {
    const lines = disassemble(new Uint8Array([0x00, 0xe0, 0x12, 0x00]));
    expect(lines).toEqual([
      { addr: 0x200, opcode: 0x00e0, text: 'CLS' },
      { addr: 0x202, opcode: 0x1200, text: 'JP 0x200' },
    ]);
  });

  it('emits a trailing odd byte as DB', () => {
    const lines = disassemble(new Uint8Array([0x60, 0x01, 0x12]), 0x300);
    expect(lines[1]).toEqual({ addr: 0x302, opcode: 0x12, text: 'DB 0x12' });
  });

  it('formats a listing', () => {
    const text = formatListing(disassemble(new Uint8Array([0x00, 0xe0, 0x12])));
    expect(text).toBe('200  00E0  CLS\n202  12    DB 0x12');
  });
});
