import type { DisplaySnapshot } from '../emulator/types';

// FNV-1a, 32 bit. Used for ROM checksums and for comparing display frames.
export function fnv1a32(bytes: ArrayLike<number>, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function fnv1aHex(bytes: ArrayLike<number>): string {
  return fnv1a32(bytes).toString(16).padStart(8, '0');
}

// Hash of the lit pixels plus the dimensions, so two equal-looking frames of different size differ.
export function frameHash(snap: DisplaySnapshot): string {
  const dims = fnv1a32([snap.width & 0xff, snap.height & 0xff]);
  return fnv1a32(snap.pixels, dims).toString(16).padStart(8, '0');
}
