// Upper-case hex without prefix, zero-padded to width.
export function hex(n: number, w: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(w, '0');
}

export function hex16(n: number): string {
  return `0x${hex(n & 0xffff, 4)}`;
}
