// Square-wave buzzer driven by the sound timer. Phase is carried across calls
// so consecutive frames join without clicks.
export interface SquareWaveOptions {
  sampleRate?: number;
  frequency?: number;
  volume?: number; // peak amplitude, 0..1
}

export class SquareWave {
  readonly sampleRate: number;
  readonly frequency: number;
  readonly volume: number;
  private phase = 0; // 0..1
  private readonly phaseInc: number;

  constructor(opts: SquareWaveOptions = {}) {
    this.sampleRate = opts.sampleRate ?? 44100;
    this.frequency = opts.frequency ?? 440;
    this.volume = Math.max(0, Math.min(1, opts.volume ?? 0.25));
    this.phaseInc = this.frequency / this.sampleRate;
  }

  // Samples for one emulated frame at 60 Hz (rounded down).
  samplesPerFrame(fps = 60): number {
    return Math.floor(this.sampleRate / fps);
  }

  render(count: number, active: boolean): Float32Array {
    const out = new Float32Array(Math.max(0, count | 0));
    if (!active) return out;
    for (let i = 0; i < out.length; i++) {
      out[i] = this.phase < 0.5 ? this.volume : -this.volume;
      this.phase = (this.phase + this.phaseInc) % 1;
    }
    return out;
  }

  reset(): void {
    this.phase = 0;
  }
}

export function toPCM16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    out[i] = Math.round(s * 32767);
  }
  return out;
}
