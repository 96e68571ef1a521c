import { InvalidKeyError } from '../emulator/errors';

export const KEY_COUNT = 16;

function checkKey(k: number): void {
  if (!Number.isInteger(k) || k < 0 || k >= KEY_COUNT) throw new InvalidKeyError(k);
}

// 16-key hex keypad: 1 2 3 C / 4 5 6 D / 7 8 9 E / A 0 B F.
// Besides the held state, a rising-edge latch remembers keys that went down since
// the last clearLatch(), so a tap between two CPU steps still satisfies a key wait.
export class Keypad {
  private held = 0;    // bit k = key k is down
  private latched = 0; // bit k = key k pressed since clearLatch()

  setKey(k: number, pressed: boolean): void {
    checkKey(k);
    const bit = 1 << k;
    if (pressed) {
      if ((this.held & bit) === 0) this.latched |= bit;
      this.held |= bit;
    } else {
      this.held &= ~bit;
    }
  }

  isPressed(k: number): boolean {
    checkKey(k);
    return (this.held & (1 << k)) !== 0;
  }

  pressedKeys(): number[] {
    const out: number[] = [];
    for (let k = 0; k < KEY_COUNT; k++) if (this.held & (1 << k)) out.push(k);
    return out;
  }

  clearLatch(): void {
    this.latched = 0;
  }

  // Lowest key pressed since clearLatch(), or null. Clears the latch when a key is returned.
  takeLatchedKey(): number | null {
    if (this.latched === 0) return null;
    for (let k = 0; k < KEY_COUNT; k++) {
      if (this.latched & (1 << k)) {
        this.latched = 0;
        return k;
      }
    }
    return null;
  }

  releaseAll(): void {
    this.held = 0;
    this.latched = 0;
  }
}
