/**
 * Environment Variable Validation
 *
 * Centralized validation of the ingestion service's environment variables.
 * All problems are collected and reported together so a misconfigured
 * deployment fails at startup with the full list, never mid-run.
 *
 * `.env` is loaded by the process root before any module reads the
 * environment (the logger reads NODE_ENV and LOG_LEVEL at import).
 */

import { ConfigurationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Lowest accepted sync interval. Faster configuration is clamped to this.
 */
export const MIN_SYNC_INTERVAL_SECONDS = 60;

export type ArchiveMode = 'move' | 'delete';

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: string;
  LOG_PRETTY?: string;

  // Deployment stage stamped on every ingested record
  APP_ENV: string;

  // Database Configuration
  MONGODB_URI: string;
  DB_NAME: string;
  DB_MAX_POOL_SIZE: number;
  DB_CONNECT_TIMEOUT_MS: number;
  DB_SERVER_SELECTION_TIMEOUT_MS: number;
  DB_MAX_RETRIES: number;
  DB_INITIAL_RETRY_DELAY: number;

  // Object storage
  AWS_S3_BUCKET: string;
  AWS_REGION: string;
  AWS_S3_ENDPOINT?: string;
  AWS_S3_FORCE_PATH_STYLE: boolean;
  AWS_S3_MAX_ATTEMPTS: number;

  // Ingestion
  INGEST_SOURCE_PREFIX: string;
  INGEST_SUCCESS_PREFIX: string;
  INGEST_ERROR_PREFIX: string;
  INGEST_KEY_SUFFIX: string;
  INGEST_SYNC_INTERVAL_SECONDS: number;
  INGEST_CONCURRENCY: number;
  INGEST_ARCHIVE_MODE: ArchiveMode;
  INGEST_ENABLED: boolean;
  COLL_DECLARE_PT: string;
  COLL_CONSUMIR_VASOT: string;

  SHUTDOWN_TIMEOUT_MS: number;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Parse an integer, recording a problem when the value is present but not numeric
 */
function parseNumericEnv(
  source: EnvSource,
  name: string,
  defaultValue: number,
  errors: string[],
  range: { min?: number; max?: number } = {}
): number {
  const raw = source[name]?.trim();
  if (!raw) return defaultValue;
  if (!/^-?\d+$/.test(raw)) {
    errors.push(`${name}: Invalid value "${raw}". Must be an integer.`);
    return defaultValue;
  }
  const num = parseInt(raw, 10);
  if ((range.min !== undefined && num < range.min) || (range.max !== undefined && num > range.max)) {
    errors.push(`${name}: Invalid value "${raw}". Must be between ${range.min ?? '-∞'} and ${range.max ?? '∞'}.`);
    return defaultValue;
  }
  return num;
}

function parseBooleanEnv(source: EnvSource, name: string, defaultValue: boolean, errors: string[]): boolean {
  const raw = source[name]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  errors.push(`${name}: Invalid value "${source[name]}". Must be true or false.`);
  return defaultValue;
}

function requireEnv(source: EnvSource, name: string, errors: string[]): string {
  const value = source[name]?.trim();
  if (!value) {
    errors.push(`${name}: Environment variable is required.`);
    return '';
  }
  return value;
}

/**
 * Ensure a non-empty prefix ends with a single '/'
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+/, '');
  if (!trimmed) return '';
  return `${trimmed.replace(/\/+$/, '')}/`;
}

/**
 * Clamp a sync interval to the floor, warning when the configured value was lower
 */
export function enforceIntervalFloor(seconds: number): number {
  if (seconds < MIN_SYNC_INTERVAL_SECONDS) {
    logger.warn(
      { configured: seconds, applied: MIN_SYNC_INTERVAL_SECONDS },
      'Sync interval below the minimum; clamping'
    );
    return MIN_SYNC_INTERVAL_SECONDS;
  }
  return seconds;
}

/**
 * Validate an environment source and build the configuration
 * @throws {ConfigurationError} listing every invalid or missing variable
 */
export function parseEnv(source: EnvSource): Env {
  const errors: string[] = [];

  const nodeEnv = source.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const archiveMode = source.INGEST_ARCHIVE_MODE?.trim().toLowerCase() || 'move';
  if (archiveMode !== 'move' && archiveMode !== 'delete') {
    errors.push(`INGEST_ARCHIVE_MODE: Invalid value "${archiveMode}". Must be move or delete.`);
  }

  const sourcePrefix = normalizePrefix(requireEnv(source, 'INGEST_SOURCE_PREFIX', errors));
  const successPrefix = source.INGEST_SUCCESS_PREFIX?.trim()
    ? normalizePrefix(source.INGEST_SUCCESS_PREFIX)
    : `${sourcePrefix}PROCESSED/`;
  const errorPrefix = source.INGEST_ERROR_PREFIX?.trim()
    ? normalizePrefix(source.INGEST_ERROR_PREFIX)
    : `${sourcePrefix}PROCESSED/ERRORS/`;

  // Keys under an archive prefix are never pending, so the source must not sit inside one
  if (sourcePrefix && sourcePrefix.startsWith(successPrefix)) {
    errors.push('INGEST_SUCCESS_PREFIX: Must not equal or contain INGEST_SOURCE_PREFIX.');
  }
  if (sourcePrefix && sourcePrefix.startsWith(errorPrefix)) {
    errors.push('INGEST_ERROR_PREFIX: Must not equal or contain INGEST_SOURCE_PREFIX.');
  }

  const collDeclarePt = source.COLL_DECLARE_PT?.trim() || 'declare_pt_events';
  const collConsumirVasot = source.COLL_CONSUMIR_VASOT?.trim() || 'consume_vasot_events';
  if (collDeclarePt === collConsumirVasot) {
    errors.push('COLL_CONSUMIR_VASOT: Must differ from COLL_DECLARE_PT.');
  }

  const env: Env = {
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    LOG_LEVEL: source.LOG_LEVEL,
    LOG_PRETTY: source.LOG_PRETTY,

    APP_ENV: requireEnv(source, 'APP_ENV', errors),

    MONGODB_URI: requireEnv(source, 'MONGODB_URI', errors),
    DB_NAME: requireEnv(source, 'DB_NAME', errors),
    DB_MAX_POOL_SIZE: parseNumericEnv(source, 'DB_MAX_POOL_SIZE', 10, errors, { min: 1 }),
    DB_CONNECT_TIMEOUT_MS: parseNumericEnv(source, 'DB_CONNECT_TIMEOUT_MS', 10000, errors, { min: 0 }),
    DB_SERVER_SELECTION_TIMEOUT_MS: parseNumericEnv(source, 'DB_SERVER_SELECTION_TIMEOUT_MS', 10000, errors, { min: 0 }),
    DB_MAX_RETRIES: parseNumericEnv(source, 'DB_MAX_RETRIES', 3, errors, { min: 1 }),
    DB_INITIAL_RETRY_DELAY: parseNumericEnv(source, 'DB_INITIAL_RETRY_DELAY', 1000, errors, { min: 0 }),

    AWS_S3_BUCKET: requireEnv(source, 'AWS_S3_BUCKET', errors),
    AWS_REGION: source.AWS_REGION?.trim() || 'us-east-1',
    AWS_S3_ENDPOINT: source.AWS_S3_ENDPOINT?.trim() || undefined,
    AWS_S3_FORCE_PATH_STYLE: parseBooleanEnv(source, 'AWS_S3_FORCE_PATH_STYLE', false, errors),
    AWS_S3_MAX_ATTEMPTS: parseNumericEnv(source, 'AWS_S3_MAX_ATTEMPTS', 5, errors, { min: 1 }),

    INGEST_SOURCE_PREFIX: sourcePrefix,
    INGEST_SUCCESS_PREFIX: successPrefix,
    INGEST_ERROR_PREFIX: errorPrefix,
    INGEST_KEY_SUFFIX: source.INGEST_KEY_SUFFIX?.trim() || '.json',
    INGEST_SYNC_INTERVAL_SECONDS: enforceIntervalFloor(
      parseNumericEnv(source, 'INGEST_SYNC_INTERVAL_SECONDS', 300, errors, { min: 1 })
    ),
    INGEST_CONCURRENCY: parseNumericEnv(source, 'INGEST_CONCURRENCY', 4, errors, { min: 1, max: 32 }),
    INGEST_ARCHIVE_MODE: archiveMode === 'delete' ? 'delete' : 'move',
    INGEST_ENABLED: parseBooleanEnv(source, 'INGEST_ENABLED', true, errors),
    COLL_DECLARE_PT: collDeclarePt,
    COLL_CONSUMIR_VASOT: collConsumirVasot,

    SHUTDOWN_TIMEOUT_MS: parseNumericEnv(source, 'SHUTDOWN_TIMEOUT_MS', 30000, errors, { min: 1000 }),
  };

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return env;
}

let validatedEnv: Env | null = null;

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
