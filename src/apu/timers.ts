// Delay and sound timers. Both count down at 60 Hz via tick(), independent of
// how many instructions run per frame; the sound timer drives the buzzer while non-zero.

function clampByte(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.max(0, Math.min(0xff, Math.trunc(v)));
}

export class Timers {
  private delay = 0;
  private sound = 0;

  reset(): void {
    this.delay = 0;
    this.sound = 0;
  }

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  getDelay(): number { return this.delay; }
  setDelay(v: number): void { this.delay = clampByte(v); }

  getSound(): number { return this.sound; }
  setSound(v: number): void { this.sound = clampByte(v); }

  isSoundActive(): boolean { return this.sound > 0; }
}
