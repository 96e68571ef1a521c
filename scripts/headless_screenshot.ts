#!/usr/bin/env tsx
import fs from 'fs';
import { PNG } from 'pngjs';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { applyArgs, loadConfig } from '../src/emulator/config';
import { describeError } from '../src/emulator/errors';
import { renderRGBA } from '../src/ppu/renderer';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '../src/ppu/display';
import { frameHash } from '../src/utils/hash';
import { numberArg, parseArgs } from '../src/tools/args';
import { debugEnabled, loadCartridgeFile } from './rom_file';

async function main() {
  const { flags, positional } = parseArgs(process.argv);
  const romPath = flags.rom ?? positional[0];
  const outPath = flags.out || 'screenshot.png';
  const frames = Math.trunc(numberArg(flags.frames, 120, 1));
  const scale = Math.trunc(numberArg(flags.scale, 8, 1, 32));
  const holdKey = flags.holdKey !== undefined ? parseInt(flags.holdKey, 16) : -1;

  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 --out=./out.png [--frames=120] [--scale=8] [--ipf=10] [--holdKey=5] [--onCpuError=record|throw]');
    process.exit(1);
  }

  const config = applyArgs(loadConfig(), flags);
  const cart = loadCartridgeFile(romPath);
  console.log(`[screenshot] ROM: ${cart.name} (${cart.rom.length} bytes, fnv=${cart.checksum})  out: ${outPath}  frames: ${frames}  ipf: ${config.instructionsPerFrame}  scale: ${scale}`);

  const emu = Emulator.fromCartridge(cart, { quirks: config.quirks });
  const sched = new Scheduler(emu, {
    instructionsPerFrame: config.instructionsPerFrame,
    onCpuError: config.onCpuError,
    traceEveryInstr: config.traceEveryInstr,
    trace: (line) => console.log(line),
  });
  if (holdKey >= 0 && holdKey <= 0xf) emu.setKey(holdKey, true);

  let last = sched.runFrames(frames);
  if (last?.fault) console.error(`[screenshot] stopped at frame ${last.frame}: ${describeError(last.fault)}`);
  if (!last) last = sched.stepFrame();

  const width = DISPLAY_WIDTH * scale;
  const height = DISPLAY_HEIGHT * scale;
  const rgba = renderRGBA(last.display, scale);
  const png = new PNG({ width, height });
  // pngjs expects a Buffer; ensure we pass a Node Buffer view
  const buf = Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength);
  buf.copy(png.data);

  await new Promise<void>((resolve, reject) => {
    const s = fs.createWriteStream(outPath);
    png.pack().pipe(s);
    s.on('finish', () => resolve());
    s.on('error', (e) => reject(e));
  });

  if (debugEnabled) {
    console.log(`[screenshot][debug] lit=${emu.display.litCount()} frameHash=${frameHash(last.display)} cycles=${emu.cpu.cycles} state=${emu.cpu.state.kind}`);
  }
  console.log(`Wrote ${outPath} (${width}x${height}) after ${last.frame} frames at ${config.instructionsPerFrame} ipf`);
}

main().catch((e) => {
  console.error('[screenshot] Unhandled error:', describeError(e));
  process.exit(1);
});
