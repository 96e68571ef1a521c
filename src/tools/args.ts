export interface ParsedArgs {
  flags: Record<string, string>;
  positional: string[];
}

// --key=value flags; a bare --key means "1". Anything else is positional.
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) { flags[m[1]] = m[2]; continue; }
    const bare = a.match(/^--([^=]+)$/);
    if (bare) { flags[bare[1]] = '1'; continue; }
    positional.push(a);
  }
  return { flags, positional };
}

export function numberArg(raw: string | undefined, fallback: number, min = -Infinity, max = Infinity): number {
  const v = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(v)) return fallback;
  return Math.max(min, Math.min(max, v));
}
