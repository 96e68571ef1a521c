import { decode, Instruction } from '../cpu/opcodes';
import { PROGRAM_START } from '../bus/memory';
import { hex } from '../utils/hex';

const v = (r: number) => `V${hex(r, 1)}`;
const addr = (a: number) => `0x${hex(a, 3)}`;
const imm = (b: number) => `0x${hex(b, 2)}`;

// Conventional Cowgod-style mnemonics.
export function formatInstruction(instr: Instruction): string {
  switch (instr.op) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'SYS': return `SYS ${addr(instr.nnn)}`;
    case 'JP': return `JP ${addr(instr.nnn)}`;
    case 'CALL': return `CALL ${addr(instr.nnn)}`;
    case 'SE_IMM': return `SE ${v(instr.x)}, ${imm(instr.nn)}`;
    case 'SNE_IMM': return `SNE ${v(instr.x)}, ${imm(instr.nn)}`;
    case 'SE_REG': return `SE ${v(instr.x)}, ${v(instr.y)}`;
    case 'SNE_REG': return `SNE ${v(instr.x)}, ${v(instr.y)}`;
    case 'LD_IMM': return `LD ${v(instr.x)}, ${imm(instr.nn)}`;
    case 'ADD_IMM': return `ADD ${v(instr.x)}, ${imm(instr.nn)}`;
    case 'LD_REG': return `LD ${v(instr.x)}, ${v(instr.y)}`;
    case 'OR': return `OR ${v(instr.x)}, ${v(instr.y)}`;
    case 'AND': return `AND ${v(instr.x)}, ${v(instr.y)}`;
    case 'XOR': return `XOR ${v(instr.x)}, ${v(instr.y)}`;
    case 'ADD_REG': return `ADD ${v(instr.x)}, ${v(instr.y)}`;
    case 'SUB': return `SUB ${v(instr.x)}, ${v(instr.y)}`;
    case 'SHR': return `SHR ${v(instr.x)}, ${v(instr.y)}`;
    case 'SUBN': return `SUBN ${v(instr.x)}, ${v(instr.y)}`;
    case 'SHL': return `SHL ${v(instr.x)}, ${v(instr.y)}`;
    case 'LD_I': return `LD I, ${addr(instr.nnn)}`;
    case 'JP_V0': return `JP V0, ${addr(instr.nnn)}`;
    case 'RND': return `RND ${v(instr.x)}, ${imm(instr.nn)}`;
    case 'DRW': return `DRW ${v(instr.x)}, ${v(instr.y)}, ${instr.n}`;
    case 'SKP': return `SKP ${v(instr.x)}`;
    case 'SKNP': return `SKNP ${v(instr.x)}`;
    case 'LD_VX_DT': return `LD ${v(instr.x)}, DT`;
    case 'LD_VX_K': return `LD ${v(instr.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${v(instr.x)}`;
    case 'LD_ST_VX': return `LD ST, ${v(instr.x)}`;
    case 'ADD_I': return `ADD I, ${v(instr.x)}`;
    case 'LD_F': return `LD F, ${v(instr.x)}`;
    case 'BCD': return `LD B, ${v(instr.x)}`;
    case 'STORE': return `LD [I], ${v(instr.x)}`;
    case 'LOAD': return `LD ${v(instr.x)}, [I]`;
  }
}

export function formatOpcode(opcode: number): string {
  const instr = decode(opcode);
  return instr === null ? `DW 0x${hex(opcode, 4)}` : formatInstruction(instr);
}

export interface DisasmLine {
  addr: number;
  opcode: number;
  text: string;
}

// Linear sweep, two bytes at a time. A trailing odd byte is emitted as a data byte.
export function disassemble(rom: Uint8Array, origin = PROGRAM_START): DisasmLine[] {
  const out: DisasmLine[] = [];
  for (let off = 0; off < rom.length; off += 2) {
    if (off + 1 >= rom.length) {
      out.push({ addr: origin + off, opcode: rom[off], text: `DB 0x${hex(rom[off], 2)}` });
      break;
    }
    const opcode = (rom[off] << 8) | rom[off + 1];
    out.push({ addr: origin + off, opcode, text: formatOpcode(opcode) });
  }
  return out;
}

export function formatListing(lines: DisasmLine[]): string {
  return lines
    .map((l) => `${hex(l.addr, 3)}  ${hex(l.opcode, l.text.startsWith('DB') ? 2 : 4).padEnd(4, ' ')}  ${l.text}`)
    .join('\n');
}
