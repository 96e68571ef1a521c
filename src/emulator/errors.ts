import { hex, hex16 } from '../utils/hex';

export type Chip8ErrorKind =
  | 'rom-too-large'
  | 'rom-empty'
  | 'invalid-opcode'
  | 'unsupported-instruction'
  | 'stack-overflow'
  | 'stack-underflow'
  | 'memory-out-of-bounds'
  | 'memory-write-protected'
  | 'invalid-key'
  | 'cpu-halted';

export class Chip8Error extends Error {
  readonly kind: Chip8ErrorKind;

  constructor(kind: Chip8ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Chip8Error';
    this.kind = kind;
  }

  // Load errors leave the machine untouched; everything else stops the run.
  get fatal(): boolean {
    return this.kind !== 'rom-too-large' && this.kind !== 'rom-empty';
  }
}

export class RomLoadError extends Chip8Error {
  constructor(kind: 'rom-too-large' | 'rom-empty', readonly size: number, readonly limit: number) {
    super(kind, kind === 'rom-empty'
      ? 'ROM image is empty'
      : `ROM image is ${size} bytes, limit is ${limit}`);
    this.name = 'RomLoadError';
  }
}

export class InvalidOpcodeError extends Chip8Error {
  constructor(readonly opcode: number, readonly pc: number) {
    super('invalid-opcode', `Unknown opcode ${hex(opcode, 4)} at ${hex16(pc)}`);
    this.name = 'InvalidOpcodeError';
  }
}

// 0NNN calls a machine-code routine on the host CPU, which an interpreter cannot run.
export class UnsupportedInstructionError extends Chip8Error {
  constructor(readonly opcode: number, readonly pc: number) {
    super('unsupported-instruction', `Machine-code call ${hex(opcode, 4)} at ${hex16(pc)} is not supported`);
    this.name = 'UnsupportedInstructionError';
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(readonly depth: number) {
    super('stack-overflow', `Call stack overflow (depth ${depth})`);
    this.name = 'StackOverflowError';
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor() {
    super('stack-underflow', 'Return with empty call stack');
    this.name = 'StackUnderflowError';
  }
}

export class MemoryAccessError extends Chip8Error {
  constructor(readonly addr: number, readonly access: 'read' | 'write') {
    super('memory-out-of-bounds', `Memory ${access} out of bounds at ${hex16(addr)}`);
    this.name = 'MemoryAccessError';
  }
}

export class MemoryWriteProtectedError extends Chip8Error {
  constructor(readonly addr: number) {
    super('memory-write-protected', `Write to reserved interpreter area at ${hex16(addr)}`);
    this.name = 'MemoryWriteProtectedError';
  }
}

export class InvalidKeyError extends Chip8Error {
  constructor(readonly key: number) {
    super('invalid-key', `Key index ${key} outside 0x0-0xF`);
    this.name = 'InvalidKeyError';
  }
}

export class CpuHaltedError extends Chip8Error {
  constructor(readonly fault: Chip8Error) {
    super('cpu-halted', `CPU halted: ${fault.message}`, { cause: fault });
    this.name = 'CpuHaltedError';
  }
}

// Single-line description for tool output.
export function describeError(error: unknown): string {
  if (error instanceof Chip8Error) return `${error.name} [${error.kind}]: ${error.message}`;
  if (error instanceof Error) return error.message.length > 0 ? error.message : error.name;
  return String(error);
}
