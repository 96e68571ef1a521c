#!/usr/bin/env tsx
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { FrameLoop } from '../src/emulator/frameLoop';
import { applyArgs, loadConfig } from '../src/emulator/config';
import { describeError } from '../src/emulator/errors';
import { renderHalfBlocks } from '../src/ppu/renderer';
import { keyForInput } from '../src/input/keymap';
import { numberArg, parseArgs } from '../src/tools/args';
import type { AudioAdapter, FrameResult, RenderAdapter } from '../src/emulator/types';
import { debugEnabled, loadCartridgeFile } from './rom_file';

// Terminals only report key presses, so a key counts as held for a short window after its last repeat.
const KEY_HOLD_MS = 150;

class TerminalRenderer implements RenderAdapter {
  private first = true;
  constructor(private readonly title: string) {}

  present(frame: FrameResult): void {
    if (!frame.displayChanged && !this.first) return;
    this.first = false;
    const lines = renderHalfBlocks(frame.display);
    const status = `${this.title}  frame ${frame.frame}${frame.awaitingKey ? '  [waiting for key]' : ''}`;
    process.stdout.write(`\x1b[H${lines.join('\n')}\n${status}\x1b[K\n`);
  }
}

class BellAudio implements AudioAdapter {
  setTone(active: boolean): void {
    if (active) process.stdout.write('\x07');
  }
}

function main() {
  const { flags, positional } = parseArgs(process.argv);
  const romPath = flags.rom ?? positional[0];
  if (!romPath) {
    console.error('Usage: npm run play -- path/to/game.ch8 [--ipf=10] [--shiftVy=1] [--loadStoreInc=1] [--logicVf=1]');
    process.exit(2);
  }
  const config = applyArgs(loadConfig(), flags);
  const cart = loadCartridgeFile(romPath);
  const emu = Emulator.fromCartridge(cart, { quirks: config.quirks });
  const sched = new Scheduler(emu, {
    instructionsPerFrame: config.instructionsPerFrame,
    onCpuError: config.onCpuError,
    traceEveryInstr: debugEnabled ? config.traceEveryInstr : 0,
    trace: (line) => process.stderr.write(`${line}\n`),
  });

  const releaseTimers = new Map<number, ReturnType<typeof setTimeout>>();
  const holdMs = numberArg(flags.holdMs, KEY_HOLD_MS, 16, 2000);

  const shutdown = (code: number) => {
    loop.stop();
    for (const t of releaseTimers.values()) clearTimeout(t);
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    process.stdout.write('\x1b[?25h');
    process.exit(code);
  };

  const loop = new FrameLoop(sched, {
    render: new TerminalRenderer(`${cart.name} (fnv=${cart.checksum})`),
    audio: new BellAudio(),
    onFault: (error, frame) => {
      process.stdout.write('\n');
      console.error(`[run] halted${frame ? ` at frame ${frame.frame}` : ''}: ${describeError(error)}`);
      shutdown(1);
    },
  });

  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.setEncoding('utf8');
  process.stdin.on('data', (chunk: string) => {
    for (const ch of chunk) {
      if (ch === '\u0003' || ch === '\u001b') { shutdown(0); return; }
      const key = keyForInput(ch);
      if (key === null) continue;
      emu.setKey(key, true);
      const prev = releaseTimers.get(key);
      if (prev) clearTimeout(prev);
      releaseTimers.set(key, setTimeout(() => {
        releaseTimers.delete(key);
        emu.setKey(key, false);
      }, holdMs));
    }
  });

  process.stdout.write('\x1b[2J\x1b[?25l');
  console.log(`[run] ${cart.name} ${cart.rom.length} bytes at ${config.instructionsPerFrame} ipf`);
  loop.start();
}

try {
  main();
} catch (e) {
  console.error('[run] Unhandled error:', describeError(e));
  process.exit(1);
}
