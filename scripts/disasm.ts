#!/usr/bin/env tsx
import { disassemble, formatListing } from '../src/tools/disassembler';
import { describeError } from '../src/emulator/errors';
import { parseArgs } from '../src/tools/args';
import { loadCartridgeFile } from './rom_file';

function main() {
  const { flags, positional } = parseArgs(process.argv);
  const romPath = flags.rom ?? positional[0];
  if (!romPath) { console.error('Usage: npm run disasm -- path/to/game.ch8'); process.exit(2); }
  const cart = loadCartridgeFile(romPath);
  console.log(`; ${cart.name}  ${cart.rom.length} bytes  fnv=${cart.checksum}`);
  console.log(formatListing(disassemble(cart.rom)));
}

try {
  main();
} catch (e) {
  console.error('[disasm]', describeError(e));
  process.exit(1);
}
