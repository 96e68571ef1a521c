import { toPCM16 } from './beeper';

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

// Mono 16-bit PCM WAV of a buzzer mix. Samples are floats in [-1, 1] as SquareWave.render() produces.
export function encodeBuzzerWav(mix: Float32Array, sampleRate: number): Buffer {
  const pcm = toPCM16(mix);
  const dataBytes = pcm.length * BYTES_PER_SAMPLE;
  const out = Buffer.alloc(HEADER_BYTES + dataBytes);

  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(HEADER_BYTES - 8 + dataBytes, 4);
  out.write('WAVE', 8, 'ascii');

  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(1, 20); // integer PCM
  out.writeUInt16LE(1, 22); // mono
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28);
  out.writeUInt16LE(BYTES_PER_SAMPLE, 32);
  out.writeUInt16LE(16, 34);

  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataBytes, 40);
  pcm.forEach((s, i) => out.writeInt16LE(s, HEADER_BYTES + i * BYTES_PER_SAMPLE));
  return out;
}

// Duration in seconds of an encoded buzzer WAV, read back from its header.
export function wavDurationSeconds(wav: Buffer): number {
  if (wav.length < HEADER_BYTES || wav.toString('ascii', 0, 4) !== 'RIFF') return 0;
  const byteRate = wav.readUInt32LE(28);
  return byteRate === 0 ? 0 : wav.readUInt32LE(40) / byteRate;
}
