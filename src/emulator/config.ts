export type CpuErrorMode = 'throw' | 'record';

// Interpreter behaviors that differ between historical CHIP-8 implementations.
// Defaults follow Cowgod's technical reference.
export interface Quirks {
  loadStoreIncrementsI: boolean; // FX55/FX65 leave I at I + x + 1
  shiftUsesVy: boolean;          // 8XY6/8XYE shift Vy into Vx
  logicResetsVf: boolean;        // 8XY1/8XY2/8XY3 clear VF
}

export interface EmulatorConfig {
  instructionsPerFrame: number;
  quirks: Quirks;
  onCpuError: CpuErrorMode;
  traceEveryInstr: number; // 0 disables tracing
}

export const DEFAULT_QUIRKS: Quirks = Object.freeze({
  loadStoreIncrementsI: false,
  shiftUsesVy: false,
  logicResetsVf: false,
});

export const DEFAULT_IPF = 10; // ~600 instructions per second at 60 fps
export const MIN_IPF = 1;
export const MAX_IPF = 1000;

export const DEFAULT_CONFIG: EmulatorConfig = {
  instructionsPerFrame: DEFAULT_IPF,
  quirks: DEFAULT_QUIRKS,
  onCpuError: 'record',
  traceEveryInstr: 0,
};

type Env = Record<string, string | undefined>;

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const v = raw.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'off') return false;
  return fallback;
}

function int(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw);
  return Number.isFinite(v) ? Math.trunc(v) : fallback;
}

export function clampIpf(v: number): number {
  return Math.max(MIN_IPF, Math.min(MAX_IPF, Math.trunc(v)));
}

// Build a config from CHIP8_* variables; unknown or malformed values fall back to defaults.
export function loadConfig(env: Env = (typeof process !== 'undefined' && process?.env ? process.env : {})): EmulatorConfig {
  const mode = (env.CHIP8_ON_CPU_ERROR ?? '').trim().toLowerCase();
  return {
    instructionsPerFrame: clampIpf(int(env.CHIP8_IPF, DEFAULT_IPF)),
    quirks: {
      loadStoreIncrementsI: flag(env.CHIP8_QUIRK_LOAD_STORE_INC, DEFAULT_QUIRKS.loadStoreIncrementsI),
      shiftUsesVy: flag(env.CHIP8_QUIRK_SHIFT_VY, DEFAULT_QUIRKS.shiftUsesVy),
      logicResetsVf: flag(env.CHIP8_QUIRK_LOGIC_VF, DEFAULT_QUIRKS.logicResetsVf),
    },
    onCpuError: mode === 'throw' ? 'throw' : mode === 'record' ? 'record' : DEFAULT_CONFIG.onCpuError,
    traceEveryInstr: Math.max(0, int(env.CHIP8_TRACE, 0)),
  };
}

// Overlay --key=value flags (see tools/args) on top of a base config.
export function applyArgs(base: EmulatorConfig, args: Record<string, string>): EmulatorConfig {
  const mode = args.onCpuError;
  return {
    instructionsPerFrame: args.ipf !== undefined ? clampIpf(int(args.ipf, base.instructionsPerFrame)) : base.instructionsPerFrame,
    quirks: {
      loadStoreIncrementsI: flag(args.loadStoreInc, base.quirks.loadStoreIncrementsI),
      shiftUsesVy: flag(args.shiftVy, base.quirks.shiftUsesVy),
      logicResetsVf: flag(args.logicVf, base.quirks.logicResetsVf),
    },
    onCpuError: mode === 'throw' || mode === 'record' ? mode : base.onCpuError,
    traceEveryInstr: args.trace !== undefined ? Math.max(0, int(args.trace, base.traceEveryInstr)) : base.traceEveryInstr,
  };
}
