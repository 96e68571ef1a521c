export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Nibble = number; // 0..15

export interface IMemoryBus {
  read8(addr: number): Byte;
  read16(addr: number): Word; // big-endian
  write8(addr: number, value: Byte): void;
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // step one CPU instruction (or poll the pending key wait)
}

// Read-only view of the display handed to render adapters once per frame.
export interface DisplaySnapshot {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array; // row-major, 1 = lit
}

export interface FrameResult {
  frame: number;
  executed: number; // instructions completed this frame
  display: DisplaySnapshot;
  displayChanged: boolean;
  soundActive: boolean;
  awaitingKey: boolean;
  fault?: Error;
}

export interface RenderAdapter {
  present(frame: FrameResult): void;
}

export interface AudioAdapter {
  setTone(active: boolean): void;
}
