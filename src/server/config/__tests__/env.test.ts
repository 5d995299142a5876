import { describe, expect, it } from 'vitest';
import { normalizePrefix, parseEnv } from '../env.js';
import { ConfigurationError } from '../../types/errors.js';

const baseSource = {
  APP_ENV: 'qa',
  MONGODB_URI: 'mongodb://localhost:27017',
  DB_NAME: 'events',
  AWS_S3_BUCKET: 'test-bucket',
  INGEST_SOURCE_PREFIX: 'declare_pt',
};

function problemsOf(source: Record<string, string | undefined>): string[] {
  try {
    parseEnv(source);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('parseEnv', () => {
  it('applies defaults around the required variables', () => {
    const env = parseEnv(baseSource);

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      APP_ENV: 'qa',
      DB_MAX_POOL_SIZE: 10,
      DB_MAX_RETRIES: 3,
      AWS_REGION: 'us-east-1',
      AWS_S3_FORCE_PATH_STYLE: false,
      AWS_S3_MAX_ATTEMPTS: 5,
      INGEST_SOURCE_PREFIX: 'declare_pt/',
      INGEST_SUCCESS_PREFIX: 'declare_pt/PROCESSED/',
      INGEST_ERROR_PREFIX: 'declare_pt/PROCESSED/ERRORS/',
      INGEST_KEY_SUFFIX: '.json',
      INGEST_SYNC_INTERVAL_SECONDS: 300,
      INGEST_CONCURRENCY: 4,
      INGEST_ARCHIVE_MODE: 'move',
      INGEST_ENABLED: true,
      COLL_DECLARE_PT: 'declare_pt_events',
      COLL_CONSUMIR_VASOT: 'consume_vasot_events',
      SHUTDOWN_TIMEOUT_MS: 30000,
    });
    expect(env.AWS_S3_ENDPOINT).toBeUndefined();
  });

  it('lists every missing required variable at once', () => {
    expect(problemsOf({})).toEqual([
      'INGEST_SOURCE_PREFIX: Environment variable is required.',
      'APP_ENV: Environment variable is required.',
      'MONGODB_URI: Environment variable is required.',
      'DB_NAME: Environment variable is required.',
      'AWS_S3_BUCKET: Environment variable is required.',
    ]);
    expect(() => parseEnv({})).toThrow(ConfigurationError);
  });

  it('clamps a sync interval below 60 seconds', () => {
    expect(parseEnv({ ...baseSource, INGEST_SYNC_INTERVAL_SECONDS: '15' }).INGEST_SYNC_INTERVAL_SECONDS).toBe(60);
    expect(parseEnv({ ...baseSource, INGEST_SYNC_INTERVAL_SECONDS: '90' }).INGEST_SYNC_INTERVAL_SECONDS).toBe(90);
  });

  it('reports malformed and out-of-range values', () => {
    expect(
      problemsOf({
        ...baseSource,
        INGEST_CONCURRENCY: '64',
        DB_MAX_POOL_SIZE: 'ten',
        INGEST_ENABLED: 'maybe',
        INGEST_ARCHIVE_MODE: 'copy',
      })
    ).toEqual([
      'INGEST_ARCHIVE_MODE: Invalid value "copy". Must be move or delete.',
      'DB_MAX_POOL_SIZE: Invalid value "ten". Must be an integer.',
      'INGEST_CONCURRENCY: Invalid value "64". Must be between 1 and 32.',
      'INGEST_ENABLED: Invalid value "maybe". Must be true or false.',
    ]);
  });

  it('rejects archive prefixes equal to the source prefix', () => {
    expect(problemsOf({ ...baseSource, INGEST_SUCCESS_PREFIX: 'declare_pt/' })).toEqual([
      'INGEST_SUCCESS_PREFIX: Must not equal or contain INGEST_SOURCE_PREFIX.',
    ]);
  });

  it('rejects archive prefixes that contain the source prefix', () => {
    expect(
      problemsOf({
        ...baseSource,
        INGEST_SOURCE_PREFIX: 'plat/in/',
        INGEST_SUCCESS_PREFIX: 'plat/',
        INGEST_ERROR_PREFIX: 'plat/in',
      })
    ).toEqual([
      'INGEST_SUCCESS_PREFIX: Must not equal or contain INGEST_SOURCE_PREFIX.',
      'INGEST_ERROR_PREFIX: Must not equal or contain INGEST_SOURCE_PREFIX.',
    ]);
  });

  it('accepts archive prefixes nested under the source prefix or beside it', () => {
    const env = parseEnv({
      ...baseSource,
      INGEST_SOURCE_PREFIX: 'plat/in/',
      INGEST_SUCCESS_PREFIX: 'plat/done/',
      INGEST_ERROR_PREFIX: 'plat/in/failed/',
    });

    expect(env.INGEST_SUCCESS_PREFIX).toBe('plat/done/');
    expect(env.INGEST_ERROR_PREFIX).toBe('plat/in/failed/');
  });

  it('rejects identical collection names', () => {
    expect(problemsOf({ ...baseSource, COLL_DECLARE_PT: 'events', COLL_CONSUMIR_VASOT: 'events' })).toEqual([
      'COLL_CONSUMIR_VASOT: Must differ from COLL_DECLARE_PT.',
    ]);
  });

  it('reads explicit prefixes, archive mode and S3 endpoint settings', () => {
    const env = parseEnv({
      ...baseSource,
      INGEST_SUCCESS_PREFIX: 'archive/ok',
      INGEST_ERROR_PREFIX: '/archive/failed/',
      INGEST_ARCHIVE_MODE: 'DELETE',
      AWS_S3_ENDPOINT: 'http://localhost:9000',
      AWS_S3_FORCE_PATH_STYLE: '1',
      INGEST_ENABLED: 'false',
    });

    expect(env.INGEST_SUCCESS_PREFIX).toBe('archive/ok/');
    expect(env.INGEST_ERROR_PREFIX).toBe('archive/failed/');
    expect(env.INGEST_ARCHIVE_MODE).toBe('delete');
    expect(env.AWS_S3_ENDPOINT).toBe('http://localhost:9000');
    expect(env.AWS_S3_FORCE_PATH_STYLE).toBe(true);
    expect(env.INGEST_ENABLED).toBe(false);
  });
});

describe('normalizePrefix', () => {
  it.each([
    ['declare_pt', 'declare_pt/'],
    ['declare_pt///', 'declare_pt/'],
    ['/declare_pt/2024', 'declare_pt/2024/'],
    ['  ', ''],
  ])('normalizes %j to %j', (input, expected) => {
    expect(normalizePrefix(input)).toBe(expected);
  });
});
