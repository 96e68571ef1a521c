import type { DisplaySnapshot } from '../emulator/types';

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

// 64x32 monochrome frame buffer. Sprites are XOR-blitted with wraparound on both axes.
export class DisplayBuffer {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private readonly pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  private dirty = false;

  clear(): void {
    this.pixels.fill(0);
    this.dirty = true;
  }

  // Each sprite byte is one row of 8 pixels, MSB leftmost.
  // Returns true iff any lit pixel was turned off.
  draw(x: number, y: number, sprite: ArrayLike<number>): boolean {
    let collided = false;
    for (let row = 0; row < sprite.length; row++) {
      const bits = sprite[row] & 0xff;
      const py = (y + row) % DISPLAY_HEIGHT;
      for (let bit = 0; bit < 8; bit++) {
        if ((bits & (0x80 >> bit)) === 0) continue;
        const px = (x + bit) % DISPLAY_WIDTH;
        const idx = py * DISPLAY_WIDTH + px;
        if (this.pixels[idx] === 1) collided = true;
        this.pixels[idx] ^= 1;
        this.dirty = true;
      }
    }
    return collided;
  }

  isSet(x: number, y: number): boolean {
    const px = ((x % DISPLAY_WIDTH) + DISPLAY_WIDTH) % DISPLAY_WIDTH;
    const py = ((y % DISPLAY_HEIGHT) + DISPLAY_HEIGHT) % DISPLAY_HEIGHT;
    return this.pixels[py * DISPLAY_WIDTH + px] === 1;
  }

  litCount(): number {
    let c = 0;
    for (let i = 0; i < this.pixels.length; i++) c += this.pixels[i];
    return c;
  }

  snapshot(): DisplaySnapshot {
    return { width: DISPLAY_WIDTH, height: DISPLAY_HEIGHT, pixels: this.pixels.slice() };
  }

  toRows(): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < DISPLAY_HEIGHT; y++) {
      const row: boolean[] = new Array(DISPLAY_WIDTH);
      for (let x = 0; x < DISPLAY_WIDTH; x++) row[x] = this.pixels[y * DISPLAY_WIDTH + x] === 1;
      rows.push(row);
    }
    return rows;
  }

  // Returns whether anything was drawn/cleared since the previous call.
  consumeDirty(): boolean {
    const was = this.dirty;
    this.dirty = false;
    return was;
  }
}
