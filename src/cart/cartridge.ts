import { fnv1aHex } from '../utils/hash';
import { normaliseRom } from './loader';

export class Cartridge {
  readonly rom: Uint8Array;
  readonly name: string;
  readonly checksum: string; // FNV-1a of the image, handy for logs

  constructor(params: { rom: Uint8Array; name?: string }) {
    this.rom = normaliseRom(params.rom).rom;
    this.name = params.name ?? 'untitled';
    this.checksum = fnv1aHex(this.rom);
  }
}
