import type { Nibble } from '../emulator/types';

// Decoded instruction variants. Field names follow the usual CHIP-8 table:
// nnn = 12-bit address, nn = 8-bit immediate, n = 4-bit immediate, x/y = register indices.
export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'SYS'; nnn: number }
  | { op: 'JP'; nnn: number }
  | { op: 'CALL'; nnn: number }
  | { op: 'SE_IMM'; x: Nibble; nn: number }
  | { op: 'SNE_IMM'; x: Nibble; nn: number }
  | { op: 'SE_REG'; x: Nibble; y: Nibble }
  | { op: 'LD_IMM'; x: Nibble; nn: number }
  | { op: 'ADD_IMM'; x: Nibble; nn: number }
  | { op: 'LD_REG'; x: Nibble; y: Nibble }
  | { op: 'OR'; x: Nibble; y: Nibble }
  | { op: 'AND'; x: Nibble; y: Nibble }
  | { op: 'XOR'; x: Nibble; y: Nibble }
  | { op: 'ADD_REG'; x: Nibble; y: Nibble }
  | { op: 'SUB'; x: Nibble; y: Nibble }
  | { op: 'SHR'; x: Nibble; y: Nibble }
  | { op: 'SUBN'; x: Nibble; y: Nibble }
  | { op: 'SHL'; x: Nibble; y: Nibble }
  | { op: 'SNE_REG'; x: Nibble; y: Nibble }
  | { op: 'LD_I'; nnn: number }
  | { op: 'JP_V0'; nnn: number }
  | { op: 'RND'; x: Nibble; nn: number }
  | { op: 'DRW'; x: Nibble; y: Nibble; n: Nibble }
  | { op: 'SKP'; x: Nibble }
  | { op: 'SKNP'; x: Nibble }
  | { op: 'LD_VX_DT'; x: Nibble }
  | { op: 'LD_VX_K'; x: Nibble }
  | { op: 'LD_DT_VX'; x: Nibble }
  | { op: 'LD_ST_VX'; x: Nibble }
  | { op: 'ADD_I'; x: Nibble }
  | { op: 'LD_F'; x: Nibble }
  | { op: 'BCD'; x: Nibble }
  | { op: 'STORE'; x: Nibble }
  | { op: 'LOAD'; x: Nibble };

export type Mnemonic = Instruction['op'];

// Pure decode of a 16-bit instruction word. Returns null for unmapped patterns.
export function decode(opcode: number): Instruction | null {
  const word = opcode & 0xffff;
  const family = word >>> 12;
  const x = (word >>> 8) & 0xf;
  const y = (word >>> 4) & 0xf;
  const n = word & 0xf;
  const nn = word & 0xff;
  const nnn = word & 0xfff;

  switch (family) {
    case 0x0:
      if (word === 0x00e0) return { op: 'CLS' };
      if (word === 0x00ee) return { op: 'RET' };
      return { op: 'SYS', nnn };
    case 0x1: return { op: 'JP', nnn };
    case 0x2: return { op: 'CALL', nnn };
    case 0x3: return { op: 'SE_IMM', x, nn };
    case 0x4: return { op: 'SNE_IMM', x, nn };
    case 0x5: return n === 0 ? { op: 'SE_REG', x, y } : null;
    case 0x6: return { op: 'LD_IMM', x, nn };
    case 0x7: return { op: 'ADD_IMM', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_REG', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_REG', x, y };
        case 0x5: return { op: 'SUB', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xe: return { op: 'SHL', x, y };
        default: return null;
      }
    case 0x9: return n === 0 ? { op: 'SNE_REG', x, y } : null;
    case 0xa: return { op: 'LD_I', nnn };
    case 0xb: return { op: 'JP_V0', nnn };
    case 0xc: return { op: 'RND', x, nn };
    case 0xd: return { op: 'DRW', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { op: 'SKP', x };
      if (nn === 0xa1) return { op: 'SKNP', x };
      return null;
    case 0xf:
      switch (nn) {
        case 0x07: return { op: 'LD_VX_DT', x };
        case 0x0a: return { op: 'LD_VX_K', x };
        case 0x15: return { op: 'LD_DT_VX', x };
        case 0x18: return { op: 'LD_ST_VX', x };
        case 0x1e: return { op: 'ADD_I', x };
        case 0x29: return { op: 'LD_F', x };
        case 0x33: return { op: 'BCD', x };
        case 0x55: return { op: 'STORE', x };
        case 0x65: return { op: 'LOAD', x };
        default: return null;
      }
    default:
      return null;
  }
}
