import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

function resolveLevel(nodeEnv: string, configured: string | undefined): LevelWithSilent {
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const pretty = nodeEnv === 'development' && process.env.LOG_PRETTY !== 'false';

  return pino({
    level: resolveLevel(nodeEnv, process.env.LOG_LEVEL),
    base: {
      env: nodeEnv,
      service: 'platform-event-ingestion',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

