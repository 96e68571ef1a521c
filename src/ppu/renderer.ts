import type { DisplaySnapshot } from '../emulator/types';

export interface Palette {
  on: readonly [number, number, number];
  off: readonly [number, number, number];
}

export const DEFAULT_PALETTE: Palette = {
  on: [0xff, 0xff, 0xff],
  off: [0x00, 0x00, 0x00],
};

// Expand the 1-bit frame into RGBA8888 with integer nearest-neighbour scaling.
export function renderRGBA(snap: DisplaySnapshot, scale = 1, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, Math.trunc(scale));
  const outW = snap.width * s;
  const outH = snap.height * s;
  const out = new Uint8Array(outW * outH * 4);
  for (let oy = 0; oy < outH; oy++) {
    const sy = Math.floor(oy / s);
    for (let ox = 0; ox < outW; ox++) {
      const lit = snap.pixels[sy * snap.width + Math.floor(ox / s)] === 1;
      const [r, g, b] = lit ? palette.on : palette.off;
      const o = (oy * outW + ox) * 4;
      out[o] = r;
      out[o + 1] = g;
      out[o + 2] = b;
      out[o + 3] = 0xff;
    }
  }
  return out;
}

// One string per row, '#' for lit pixels.
export function renderAscii(snap: DisplaySnapshot, on = '#', off = '.'): string[] {
  const rows: string[] = [];
  for (let y = 0; y < snap.height; y++) {
    let line = '';
    for (let x = 0; x < snap.width; x++) line += snap.pixels[y * snap.width + x] === 1 ? on : off;
    rows.push(line);
  }
  return rows;
}

// Two display rows per terminal line using half-block glyphs.
export function renderHalfBlocks(snap: DisplaySnapshot): string[] {
  const rows: string[] = [];
  for (let y = 0; y < snap.height; y += 2) {
    let line = '';
    for (let x = 0; x < snap.width; x++) {
      const top = snap.pixels[y * snap.width + x] === 1;
      const bottom = y + 1 < snap.height && snap.pixels[(y + 1) * snap.width + x] === 1;
      line += top ? (bottom ? '█' : '▀') : (bottom ? '▄' : ' ');
    }
    rows.push(line);
  }
  return rows;
}
