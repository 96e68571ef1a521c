// Conventional QWERTY layout for the hex keypad:
//   1 2 3 4      1 2 3 C
//   Q W E R  ->  4 5 6 D
//   A S D F      7 8 9 E
//   Z X C V      A 0 B F
// Keys are KeyboardEvent.code names; keyForInput() also takes plain characters.
export const KEYBOARD_LAYOUT: Readonly<Record<string, number>> = Object.freeze({
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xc,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xd,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xe,
  KeyZ: 0xa, KeyX: 0x0, KeyC: 0xb, KeyV: 0xf,
});

function codeForChar(ch: string): string | null {
  if (/^[0-9]$/.test(ch)) return `Digit${ch}`;
  if (/^[a-z]$/i.test(ch)) return `Key${ch.toUpperCase()}`;
  return null;
}

export function keyForInput(input: string): number | null {
  const code = input.length === 1 ? codeForChar(input) : input;
  if (code === null) return null;
  const key = KEYBOARD_LAYOUT[code];
  return key === undefined ? null : key;
}
