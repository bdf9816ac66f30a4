import { isLogLevel, type LogLevel } from '../telemetry/logger';

export type LoadThresholds = {
  dailyMinutes: number;
  weeklyMinutes: number;
};

export type PulseConfig = {
  dataDir: string;
  codeLength: number;
  shareCodeLength: number;
  maxCodeAttempts: number;
  logLevel: LogLevel;
  palette: readonly string[];
  defaultFamilyName: string;
  loadThresholds: LoadThresholds;
};

export type EnvLike = Record<string, string | undefined>;

export const ATHLETE_PALETTE: readonly string[] = [
  '#2E8B57',
  '#1E90FF',
  '#FF6347',
  '#FFD700',
  '#8A2BE2',
  '#00CED1',
  '#FF69B4',
  '#A0522D',
  '#2F4F4F',
  '#7FFF00',
];

export const DEFAULT_CONFIG: PulseConfig = {
  dataDir: 'data',
  codeLength: 6,
  shareCodeLength: 8,
  maxCodeAttempts: 5000,
  logLevel: 'info',
  palette: ATHLETE_PALETTE,
  defaultFamilyName: 'Family',
  loadThresholds: {
    dailyMinutes: 120,
    weeklyMinutes: 300,
  },
};

const ENV_DATA_DIR_KEYS = ['PULSE_DATA_DIR', 'DATA_DIR'];
const ENV_CODE_LENGTH_KEYS = ['PULSE_CODE_LENGTH'];
const ENV_SHARE_CODE_LENGTH_KEYS = ['PULSE_SHARE_CODE_LENGTH'];
const ENV_MAX_ATTEMPTS_KEYS = ['PULSE_MAX_CODE_ATTEMPTS'];
const ENV_LOG_LEVEL_KEYS = ['PULSE_LOG_LEVEL', 'LOG_LEVEL'];

function readEnv(env: EnvLike, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

function positiveInt(value: unknown, fallback: number): number {
  const numeric = typeof value === 'string' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isInteger(numeric) || numeric <= 0) {
    return fallback;
  }
  return numeric;
}

function normalizePalette(palette: readonly string[] | undefined): readonly string[] {
  if (!palette) {
    return DEFAULT_CONFIG.palette;
  }
  const cleaned = palette.filter((color) => typeof color === 'string' && color.trim().length > 0);
  return cleaned.length > 0 ? cleaned : DEFAULT_CONFIG.palette;
}

export function normalizeConfig(overrides?: Partial<PulseConfig>): PulseConfig {
  const cfg = overrides ?? {};
  const thresholds = cfg.loadThresholds;
  return {
    dataDir: cfg.dataDir && cfg.dataDir.trim() ? cfg.dataDir.trim() : DEFAULT_CONFIG.dataDir,
    codeLength: positiveInt(cfg.codeLength, DEFAULT_CONFIG.codeLength),
    shareCodeLength: positiveInt(cfg.shareCodeLength, DEFAULT_CONFIG.shareCodeLength),
    maxCodeAttempts: positiveInt(cfg.maxCodeAttempts, DEFAULT_CONFIG.maxCodeAttempts),
    logLevel: isLogLevel(cfg.logLevel) ? cfg.logLevel : DEFAULT_CONFIG.logLevel,
    palette: normalizePalette(cfg.palette),
    defaultFamilyName:
      cfg.defaultFamilyName && cfg.defaultFamilyName.trim()
        ? cfg.defaultFamilyName.trim()
        : DEFAULT_CONFIG.defaultFamilyName,
    loadThresholds: {
      dailyMinutes: positiveInt(thresholds?.dailyMinutes, DEFAULT_CONFIG.loadThresholds.dailyMinutes),
      weeklyMinutes: positiveInt(thresholds?.weeklyMinutes, DEFAULT_CONFIG.loadThresholds.weeklyMinutes),
    },
  };
}

/**
 * Builds the runtime config from environment variables. Explicit overrides win
 * over the environment; anything invalid falls back to the defaults.
 */
export function loadConfig(env: EnvLike = process.env, overrides: Partial<PulseConfig> = {}): PulseConfig {
  const logLevel = readEnv(env, ENV_LOG_LEVEL_KEYS)?.toLowerCase();
  const fromEnv: Partial<PulseConfig> = {
    dataDir: readEnv(env, ENV_DATA_DIR_KEYS),
    codeLength: positiveInt(readEnv(env, ENV_CODE_LENGTH_KEYS), DEFAULT_CONFIG.codeLength),
    shareCodeLength: positiveInt(readEnv(env, ENV_SHARE_CODE_LENGTH_KEYS), DEFAULT_CONFIG.shareCodeLength),
    maxCodeAttempts: positiveInt(readEnv(env, ENV_MAX_ATTEMPTS_KEYS), DEFAULT_CONFIG.maxCodeAttempts),
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
  };
  return normalizeConfig({ ...fromEnv, ...stripUndefined(overrides) });
}

function stripUndefined(overrides: Partial<PulseConfig>): Partial<PulseConfig> {
  const result: Partial<PulseConfig> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
