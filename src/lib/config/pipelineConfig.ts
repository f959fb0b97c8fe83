/**
 * Pipeline Configuration
 *
 * Every threshold the detector and fusion stages use. Sample-count limits
 * default to fixed durations at the configured sample rate:
 * - maxAllowedGap: 0.2 s
 * - tooFast: 0.1 s
 * - tooSlow: 3 s
 *
 * @module lib/config/pipelineConfig
 */

export interface PipelineConfig {
  /** Camera frame rate (Hz) */
  sampleRateHz: number;
  /** Butterworth order for both low-pass filters */
  filterOrder: number;
  /** Low-pass cutoff for wrist distance traces (Hz) */
  cutoffHz: number;
  /** Low-pass cutoff for the shoulder-width threshold trace (Hz) */
  thresholdCutoffHz: number;
  /** Fraction of shoulder width a reversal must swing to count, in (0, 1] */
  shoulderRatio: number;
  /** Consecutive missing samples that invalidate a movement */
  maxAllowedGap: number;
  /** Movements this many samples or shorter are rejected */
  tooFast: number;
  /** Movements this many samples or longer are rejected */
  tooSlow: number;
}

const DEFAULT_SAMPLE_RATE_HZ = 30;
const MAX_GAP_SECONDS = 0.2;
const TOO_FAST_SECONDS = 0.1;
const TOO_SLOW_SECONDS = 3;

function samplesFor(seconds: number, sampleRateHz: number): number {
  return Math.round(seconds * sampleRateHz);
}

export function defaultPipelineConfig(
  sampleRateHz: number = DEFAULT_SAMPLE_RATE_HZ,
): PipelineConfig {
  return {
    sampleRateHz,
    filterOrder: 2,
    cutoffHz: 5,
    thresholdCutoffHz: 0.05,
    shoulderRatio: 0.2,
    maxAllowedGap: samplesFor(MAX_GAP_SECONDS, sampleRateHz),
    tooFast: samplesFor(TOO_FAST_SECONDS, sampleRateHz),
    tooSlow: samplesFor(TOO_SLOW_SECONDS, sampleRateHz),
  };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = defaultPipelineConfig();

/**
 * Throws an Error naming the first invalid field.
 */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
  const nyquist = config.sampleRateHz / 2;

  if (!(config.sampleRateHz > 0)) {
    throw new Error(`Invalid sampleRateHz: ${config.sampleRateHz}`);
  }
  if (!Number.isInteger(config.filterOrder) || config.filterOrder < 1) {
    throw new Error(`Invalid filterOrder: ${config.filterOrder}`);
  }
  if (!(config.cutoffHz > 0 && config.cutoffHz < nyquist)) {
    throw new Error(`Invalid cutoffHz: ${config.cutoffHz} (Nyquist ${nyquist} Hz)`);
  }
  if (!(config.thresholdCutoffHz > 0 && config.thresholdCutoffHz < nyquist)) {
    throw new Error(
      `Invalid thresholdCutoffHz: ${config.thresholdCutoffHz} (Nyquist ${nyquist} Hz)`,
    );
  }
  if (!(config.shoulderRatio > 0 && config.shoulderRatio <= 1)) {
    throw new Error(`Invalid shoulderRatio: ${config.shoulderRatio} (expected (0, 1])`);
  }
  if (!Number.isInteger(config.maxAllowedGap) || config.maxAllowedGap < 1) {
    throw new Error(`Invalid maxAllowedGap: ${config.maxAllowedGap}`);
  }
  if (!Number.isInteger(config.tooFast) || config.tooFast < 0) {
    throw new Error(`Invalid tooFast: ${config.tooFast}`);
  }
  if (!Number.isInteger(config.tooSlow) || config.tooSlow <= config.tooFast) {
    throw new Error(`Invalid tooSlow: ${config.tooSlow} (must exceed tooFast ${config.tooFast})`);
  }
  return config;
}

/**
 * Merge overrides onto the defaults for the (possibly overridden) sample rate.
 */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const base =
    overrides.sampleRateHz === undefined
      ? DEFAULT_PIPELINE_CONFIG
      : defaultPipelineConfig(overrides.sampleRateHz);
  return validatePipelineConfig({ ...base, ...overrides });
}

// ============================================================================
// Environment
// ============================================================================

type Env = Record<string, string | undefined>;

const ENV_KEYS: ReadonlyArray<[keyof PipelineConfig, string]> = [
  ["sampleRateHz", "LIMB_USE_SAMPLE_RATE_HZ"],
  ["filterOrder", "LIMB_USE_FILTER_ORDER"],
  ["cutoffHz", "LIMB_USE_CUTOFF_HZ"],
  ["thresholdCutoffHz", "LIMB_USE_THRESHOLD_CUTOFF_HZ"],
  ["shoulderRatio", "LIMB_USE_SHOULDER_RATIO"],
  ["maxAllowedGap", "LIMB_USE_MAX_ALLOWED_GAP"],
  ["tooFast", "LIMB_USE_TOO_FAST"],
  ["tooSlow", "LIMB_USE_TOO_SLOW"],
];

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read LIMB_USE_* overrides from an environment (process.env by default).
 */
export function loadPipelineConfigFromEnv(env: Env = process.env): PipelineConfig {
  const overrides: Partial<PipelineConfig> = {};
  for (const [field, key] of ENV_KEYS) {
    const value = readNumber(env, key);
    if (value !== undefined) overrides[field] = value;
  }
  return createPipelineConfig(overrides);
}

// ============================================================================
// Batch selection
// ============================================================================

export interface BatchOptions {
  rootDir: string;
  patients: string[];
  /** Session folder prefixes */
  sessions: string[];
  /** Empty = every segment folder in the session */
  segments: string[];
  saveCsv: boolean;
  showReports: boolean;
}

function readList(env: Env, key: string): string[] {
  return (env[key] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`${key} must be a boolean, got "${env[key]}"`);
}

export function loadBatchOptionsFromEnv(env: Env = process.env): BatchOptions {
  const rootDir = env.LIMB_USE_ROOT_DIR?.trim();
  if (!rootDir) {
    throw new Error("LIMB_USE_ROOT_DIR is required");
  }
  return {
    rootDir,
    patients: readList(env, "LIMB_USE_PATIENTS"),
    sessions: readList(env, "LIMB_USE_SESSIONS"),
    segments: readList(env, "LIMB_USE_SEGMENTS"),
    saveCsv: readFlag(env, "LIMB_USE_SAVE_CSV", false),
    showReports: readFlag(env, "LIMB_USE_SHOW_REPORTS", true),
  };
}
