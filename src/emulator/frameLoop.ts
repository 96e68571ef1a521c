import { Scheduler } from './scheduler';
import type { AudioAdapter, FrameResult, RenderAdapter } from './types';

export const FRAME_MS = 1000 / 60;

export interface FrameLoopOptions {
  render?: RenderAdapter;
  audio?: AudioAdapter;
  // Called once, after the loop has stopped.
  onFault: (error: Error, frame: FrameResult | undefined) => void;
  frameMs?: number;
  maxCatchUpFrames?: number; // frames run back to back after a stall before the backlog is dropped
  now?: () => number;
}

// Real-time driver: runs Scheduler.stepFrame() at 60 Hz on the event loop and
// hands each frame to the render/audio adapters. Never blocks; a pending key
// wait just produces frames with awaitingKey set.
export class FrameLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private nextAt = 0;
  private toneOn = false;
  private lastFrame: FrameResult | undefined;
  private lastFault: Error | undefined;
  private readonly frameMs: number;
  private readonly maxCatchUp: number;
  private readonly now: () => number;

  constructor(private readonly sched: Scheduler, private readonly opts: FrameLoopOptions) {
    this.frameMs = opts.frameMs ?? FRAME_MS;
    this.maxCatchUp = Math.max(1, opts.maxCatchUpFrames ?? 4);
    this.now = opts.now ?? (() => Date.now());
  }

  isRunning(): boolean { return this.running; }
  get latestFrame(): FrameResult | undefined { return this.lastFrame; }
  get fault(): Error | undefined { return this.lastFault; }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastFault = undefined;
    this.nextAt = this.now();
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.setTone(false);
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(this.onTimer, Math.max(0, delay));
  }

  private readonly onTimer = (): void => {
    this.timer = null;
    if (!this.running) return;
    const now = this.now();
    let ran = 0;
    while (this.nextAt <= now && ran < this.maxCatchUp) {
      if (!this.runFrame()) return;
      this.nextAt += this.frameMs;
      ran++;
    }
    // Too far behind (suspended tab, debugger pause): resync instead of fast-forwarding
    if (this.nextAt <= now) this.nextAt = now + this.frameMs;
    this.schedule(this.nextAt - now);
  };

  // Returns false once the loop has been stopped.
  private runFrame(): boolean {
    let frame: FrameResult | undefined;
    try {
      frame = this.sched.stepFrame();
      this.lastFrame = frame;
      this.opts.render?.present(frame);
      this.setTone(frame.soundActive);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      return this.fail(error, frame);
    }
    if (frame.fault) return this.fail(frame.fault, frame);
    return this.running;
  }

  private fail(error: Error, frame: FrameResult | undefined): boolean {
    this.stop();
    this.lastFault = error;
    this.opts.onFault(error, frame);
    return false;
  }

  private setTone(active: boolean): void {
    if (active === this.toneOn) return;
    this.toneOn = active;
    this.opts.audio?.setTone(active);
  }
}
