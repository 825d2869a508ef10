/**
 * Run configuration: defaults, environment overrides and validation.
 *
 * Precedence is explicit options (CLI flags) > environment > defaults.
 */

import { ConfigError } from "./errors.js";
import type { DuplicatePolicy, ExistingAmountPolicy } from "./types.js";

export const DEFAULT_API_URL = "https://api-cloud.ru/api/fssp.php";

export interface RunConfig {
  workerCount: number;
  timeoutMs: number;
  maxAttempts: number;
  // Snapshot every N completions
  checkpointInterval: number;
  // ...or when this much time has passed since the last snapshot
  checkpointIntervalMs: number;
  requestsPerSecond: number;
  burst: number;
  maxInFlight: number;
  baseDelayMs: number;
  maxDelayMs: number;
  graceMs: number;
  duplicates: DuplicatePolicy;
  existingAmounts: ExistingAmountPolicy;
}

export const defaultRunConfig: RunConfig = {
  workerCount: 20,
  timeoutMs: 60_000,
  maxAttempts: 3,
  checkpointInterval: 10,
  checkpointIntervalMs: 30_000,
  requestsPerSecond: 2,
  burst: 2,
  maxInFlight: 20,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  graceMs: 30_000,
  duplicates: "process",
  existingAmounts: "skip"
};

export const configCaps = {
  workerCount: { min: 1, max: 200 },
  timeoutMs: { min: 100, max: 600_000 },
  maxAttempts: { min: 1, max: 20 },
  checkpointInterval: { min: 1, max: 1_000_000 },
  checkpointIntervalMs: { min: 0, max: 86_400_000 },
  requestsPerSecond: { min: 1, max: 1000 },
  burst: { min: 1, max: 1000 },
  maxInFlight: { min: 1, max: 200 },
  baseDelayMs: { min: 0, max: 60_000 },
  maxDelayMs: { min: 0, max: 600_000 },
  graceMs: { min: 0, max: 3_600_000 }
} as const;

type NumericKey = keyof typeof configCaps;

const NUMERIC_KEYS: NumericKey[] = [
  "workerCount",
  "timeoutMs",
  "maxAttempts",
  "checkpointInterval",
  "checkpointIntervalMs",
  "requestsPerSecond",
  "burst",
  "maxInFlight",
  "baseDelayMs",
  "maxDelayMs",
  "graceMs"
];

const ENV_KEYS: Array<[NumericKey, string]> = [
  ["workerCount", "CHECK_WORKERS"],
  ["timeoutMs", "CHECK_TIMEOUT_MS"],
  ["maxAttempts", "CHECK_MAX_ATTEMPTS"],
  ["requestsPerSecond", "CHECK_RPS"],
  ["checkpointInterval", "CHECK_CHECKPOINT_INTERVAL"]
];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export type RunConfigInput = Partial<RunConfig>;

/**
 * Check ranges and option combinations
 */
export function validateRunConfig(config: RunConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const key of NUMERIC_KEYS) {
    const value = config[key];
    const { min, max } = configCaps[key];
    if (!Number.isInteger(value) || value < min || value > max) {
      errors.push(`${key}=${String(value)} is out of allowed range [${min}..${max}]`);
    }
  }

  if (config.duplicates !== "process" && config.duplicates !== "once") {
    errors.push(`duplicates must be "process" or "once" (got "${String(config.duplicates)}")`);
  }
  if (config.existingAmounts !== "skip" && config.existingAmounts !== "reverify") {
    errors.push(`existingAmounts must be "skip" or "reverify" (got "${String(config.existingAmounts)}")`);
  }

  if (config.maxDelayMs < config.baseDelayMs) {
    errors.push(`maxDelayMs (${config.maxDelayMs}) must be >= baseDelayMs (${config.baseDelayMs})`);
  }

  if (config.maxInFlight > config.workerCount) {
    warnings.push(
      `maxInFlight (${config.maxInFlight}) exceeds workerCount (${config.workerCount}); at most ${config.workerCount} requests can be in flight`
    );
  }
  if (config.burst > config.requestsPerSecond * 10) {
    warnings.push(`burst (${config.burst}) is much larger than requestsPerSecond (${config.requestsPerSecond})`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Read numeric overrides from the environment. Blank values are ignored;
 * anything else must be an integer.
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunConfigInput {
  const input: RunConfigInput = {};
  const errors: string[] = [];

  for (const [key, name] of ENV_KEYS) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") continue;
    const value = Number(raw.trim());
    if (!Number.isInteger(value)) {
      errors.push(`${name}=${raw} must be an integer`);
      continue;
    }
    input[key] = value;
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return input;
}

function withoutUndefined(input: RunConfigInput): RunConfigInput {
  const out: RunConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}

/**
 * Merge defaults, environment and explicit options, then validate.
 * When only workerCount is given, maxInFlight follows it.
 */
export function resolveRunConfig(
  options: RunConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): { config: RunConfig; warnings: string[] } {
  const merged: RunConfig = {
    ...defaultRunConfig,
    ...withoutUndefined(readConfigFromEnv(env)),
    ...withoutUndefined(options)
  };
  if (options.maxInFlight === undefined) {
    merged.maxInFlight = Math.min(merged.workerCount, configCaps.maxInFlight.max);
  }
  if (options.burst === undefined) {
    merged.burst = Math.max(1, Math.min(merged.requestsPerSecond, configCaps.burst.max));
  }

  const result = validateRunConfig(merged);
  if (!result.valid) {
    throw new ConfigError(result.errors);
  }
  return { config: merged, warnings: result.warnings };
}

export interface ApiSettings {
  token: string;
  baseUrl: string;
}

/**
 * Credential and endpoint. A missing token fails here, before any request.
 */
export function loadApiSettings(env: NodeJS.ProcessEnv = process.env): ApiSettings {
  const token = env.API_TOKEN?.trim() ?? "";
  if (token === "") {
    throw new ConfigError(["API_TOKEN environment variable is required."]);
  }

  const baseUrl = env.DEBT_API_URL?.trim() || DEFAULT_API_URL;
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigError([`DEBT_API_URL must be a valid absolute http/https URL. Received: ${baseUrl}`]);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError([`DEBT_API_URL must use http or https scheme. Received: ${baseUrl}`]);
  }

  return { token, baseUrl };
}
