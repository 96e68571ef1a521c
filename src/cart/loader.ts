import { MAX_PROGRAM_SIZE } from '../bus/memory';
import { RomLoadError } from '../emulator/errors';

// CHIP-8 images are raw big-endian code with no header; the only checks are size ones.
export function normaliseRom(raw: Uint8Array): { rom: Uint8Array } {
  if (raw.length === 0) throw new RomLoadError('rom-empty', 0, MAX_PROGRAM_SIZE);
  if (raw.length > MAX_PROGRAM_SIZE) throw new RomLoadError('rom-too-large', raw.length, MAX_PROGRAM_SIZE);
  // Copy so later mutation of the caller's buffer cannot reach the machine
  return { rom: raw.slice() };
}
