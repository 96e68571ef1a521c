import fs from 'fs';
import path from 'path';
import { Cartridge } from '../src/cart/cartridge';

export function loadCartridgeFile(romPath: string): Cartridge {
  const abs = path.resolve(romPath);
  const raw = fs.readFileSync(abs);
  return new Cartridge({ rom: new Uint8Array(raw), name: path.basename(abs) });
}

export const debugEnabled = (process.env.CHIP8_DEBUG ?? '0') !== '0';
