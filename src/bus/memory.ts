import { IMemoryBus, Byte, Word } from '../emulator/types';
import { MemoryAccessError, MemoryWriteProtectedError } from '../emulator/errors';
import { FONT_BASE, FONT_GLYPHS } from './font';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START; // 3584

// Flat 4 KiB address space. Everything below PROGRAM_START belongs to the
// interpreter (font glyphs) and is read-only once the machine is built.
export class Memory implements IMemoryBus {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.mem.fill(0);
    FONT_GLYPHS.forEach((glyph, digit) => {
      this.mem.set(glyph, FONT_BASE + digit * glyph.length);
    });
  }

  read8(addr: number): Byte {
    this.checkBounds(addr, 'read');
    return this.mem[addr];
  }

  read16(addr: number): Word {
    const hi = this.read8(addr);
    const lo = this.read8(addr + 1);
    return (hi << 8) | lo;
  }

  write8(addr: number, value: Byte): void {
    this.checkBounds(addr, 'write');
    if (addr < PROGRAM_START) throw new MemoryWriteProtectedError(addr);
    this.mem[addr] = value & 0xff;
  }

  // Validates a whole range before a multi-byte access so a fault leaves nothing half-written.
  checkRange(addr: number, length: number, access: 'read' | 'write'): void {
    if (length <= 0) return;
    this.checkBounds(addr, access);
    this.checkBounds(addr + length - 1, access);
    if (access === 'write' && addr < PROGRAM_START) throw new MemoryWriteProtectedError(addr);
  }

  // Copies a program image to PROGRAM_START; the rest of program space is cleared.
  // Size validation happens in the cart loader before this is reached.
  loadProgram(bytes: Uint8Array): void {
    if (bytes.length > MAX_PROGRAM_SIZE) throw new MemoryAccessError(PROGRAM_START + bytes.length - 1, 'write');
    this.mem.fill(0, PROGRAM_START);
    this.mem.set(bytes, PROGRAM_START);
  }

  // Copy of a range for debuggers/disassembly; clipped to the address space.
  dump(start: number, length: number): Uint8Array {
    const from = Math.max(0, Math.min(MEMORY_SIZE, start));
    const to = Math.max(from, Math.min(MEMORY_SIZE, start + length));
    return this.mem.slice(from, to);
  }

  private checkBounds(addr: number, access: 'read' | 'write'): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) {
      throw new MemoryAccessError(addr, access);
    }
  }
}
