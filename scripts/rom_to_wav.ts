#!/usr/bin/env tsx
import fs from 'fs';
import path from 'path';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { applyArgs, loadConfig } from '../src/emulator/config';
import { describeError } from '../src/emulator/errors';
import { SquareWave } from '../src/apu/beeper';
import { encodeBuzzerWav, wavDurationSeconds } from '../src/apu/wav';
import { numberArg, parseArgs } from '../src/tools/args';
import { debugEnabled, loadCartridgeFile } from './rom_file';

function main() {
  const { flags, positional } = parseArgs(process.argv);
  const romPath = flags.rom ?? positional[0];
  if (!romPath) {
    console.error('Usage: npm run wav -- --rom=path/to/game.ch8 [--out=out.wav] [--seconds=5] [--rate=44100] [--freq=440] [--gain=0.25]');
    process.exit(2);
  }
  const outPath = flags.out || 'out.wav';
  const seconds = numberArg(flags.seconds, 5, 0.1, 600);
  const rate = Math.trunc(numberArg(flags.rate, 44100, 8000, 192000));
  const beeper = new SquareWave({ sampleRate: rate, frequency: numberArg(flags.freq, 440, 20, 20000), volume: numberArg(flags.gain, 0.25, 0, 1) });

  const config = applyArgs(loadConfig(), flags);
  const cart = loadCartridgeFile(romPath);
  const emu = Emulator.fromCartridge(cart, { quirks: config.quirks });
  const sched = new Scheduler(emu, { instructionsPerFrame: config.instructionsPerFrame, onCpuError: config.onCpuError });

  const frames = Math.ceil(seconds * 60);
  const perFrame = beeper.samplesPerFrame();
  const mix = new Float32Array(frames * perFrame);
  let activeFrames = 0;
  for (let f = 0; f < frames; f++) {
    const frame = sched.stepFrame();
    if (frame.soundActive) activeFrames++;
    mix.set(beeper.render(perFrame, frame.soundActive), f * perFrame);
    if (frame.fault) {
      console.error(`[wav] stopped at frame ${frame.frame}: ${describeError(frame.fault)}`);
      break;
    }
  }
  if (debugEnabled) console.log(`[wav][debug] tone active in ${activeFrames}/${frames} frames`);

  const wav = encodeBuzzerWav(mix, rate);
  const outAbs = path.resolve(outPath);
  fs.writeFileSync(outAbs, wav);
  console.log(`Wrote ${wavDurationSeconds(wav).toFixed(2)}s WAV to ${outAbs} at ${rate} Hz (1 ch).`);
}

try {
  main();
} catch (e) {
  console.error('[wav] Unhandled error:', describeError(e));
  process.exit(1);
}
