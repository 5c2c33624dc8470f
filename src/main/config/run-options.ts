import { ConfigError } from '../errors.js';

export interface RunOptions {
  outDir: string;
  logFile: string;
  latitude?: number;
  longitude?: number;
  metadataEnabled: boolean;
  retryFailedOnly: boolean;
  skipConfirmation: boolean;
  workers: number;
  maxTries: number;
  httpRetries: number;
  requestTimeoutMs: number;
  /** Referer sent with URLs replayed from the log, which carry no session headers. */
  replayReferer?: string;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  outDir: 'gallery',
  logFile: 'download_log.csv',
  metadataEnabled: true,
  retryFailedOnly: false,
  skipConfirmation: false,
  workers: 8,
  maxTries: 5,
  httpRetries: 5,
  requestTimeoutMs: 30_000
};

type Env = Record<string, string | undefined>;

const toInt = (value: string | undefined, name: string): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
};

const toFloat = (value: string | undefined, name: string): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

const toBool = (value: string | undefined): boolean | undefined => {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return undefined;
};

export const readEnvOverrides = (env: Env): Partial<RunOptions> => {
  const skipMetadata = toBool(env.FETCH_SKIP_METADATA);
  return {
    outDir: env.FETCH_OUT_DIR || undefined,
    logFile: env.FETCH_LOG_FILE || undefined,
    workers: toInt(env.FETCH_WORKERS, 'FETCH_WORKERS'),
    maxTries: toInt(env.FETCH_MAX_TRIES, 'FETCH_MAX_TRIES'),
    latitude: toFloat(env.FETCH_LAT, 'FETCH_LAT'),
    longitude: toFloat(env.FETCH_LON, 'FETCH_LON'),
    metadataEnabled: skipMetadata === undefined ? undefined : !skipMetadata
  };
};

const merge = (base: RunOptions, overrides: Partial<RunOptions>): RunOptions => ({
  outDir: overrides.outDir ?? base.outDir,
  logFile: overrides.logFile ?? base.logFile,
  latitude: overrides.latitude ?? base.latitude,
  longitude: overrides.longitude ?? base.longitude,
  metadataEnabled: overrides.metadataEnabled ?? base.metadataEnabled,
  retryFailedOnly: overrides.retryFailedOnly ?? base.retryFailedOnly,
  skipConfirmation: overrides.skipConfirmation ?? base.skipConfirmation,
  workers: overrides.workers ?? base.workers,
  maxTries: overrides.maxTries ?? base.maxTries,
  httpRetries: overrides.httpRetries ?? base.httpRetries,
  requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
  replayReferer: overrides.replayReferer ?? base.replayReferer
});

const validate = (options: RunOptions): RunOptions => {
  if (!Number.isInteger(options.workers)) {
    throw new ConfigError(`workers must be an integer, got ${options.workers}`);
  }
  if (!Number.isInteger(options.maxTries) || options.maxTries < 1) {
    throw new ConfigError(`maxTries must be a positive integer, got ${options.maxTries}`);
  }
  if (!Number.isInteger(options.httpRetries) || options.httpRetries < 0) {
    throw new ConfigError(`httpRetries must be a non-negative integer, got ${options.httpRetries}`);
  }
  if (!(options.requestTimeoutMs > 0)) {
    throw new ConfigError(`requestTimeoutMs must be positive, got ${options.requestTimeoutMs}`);
  }
  if (options.latitude !== undefined && !(Math.abs(options.latitude) <= 90)) {
    throw new ConfigError(`latitude must lie within [-90, 90], got ${options.latitude}`);
  }
  if (options.longitude !== undefined && !(Math.abs(options.longitude) <= 180)) {
    throw new ConfigError(`longitude must lie within [-180, 180], got ${options.longitude}`);
  }
  return { ...options, workers: Math.max(1, options.workers) };
};

/**
 * Defaults, then `FETCH_*` environment variables, then explicit overrides.
 */
export const resolveRunOptions = (overrides: Partial<RunOptions> = {}, env: Env = process.env): RunOptions =>
  validate(merge(merge(DEFAULT_RUN_OPTIONS, readEnvOverrides(env)), overrides));
