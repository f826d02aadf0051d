import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

export interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable transport settings so callers can toggle console/file outputs at runtime
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

function isTestEnvironment(): boolean {
  // Check both the validated env and process.env (in case vitest sets it after module load)
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const transportTargets: TransportTarget[] = [];
  const isTestEnv = isTestEnvironment();

  if (transportMode.console && !isTestEnv) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 1, // stdout file descriptor
        },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file && !isTestEnv) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    redact: {
      censor: '***',
      paths: ['apiKey', 'secret', 'headers.Key', 'headers.Sign', '*.apiKey', '*.secret'],
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // In test mode, use a noop stream to completely suppress all output
  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  // Nothing enabled: keep the logger but write nowhere
  if (transportTargets.length === 0) {
    return pino.pino({ ...pinoConfig, enabled: false });
  }

  return pino.pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

/**
 * Internal: get or create the underlying pino logger for a category.
 */
function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * We return a Proxy that looks up the latest underlying pino logger on every
 * property access, so loggers captured at module top-level pick up
 * `setLoggerTransports(...)` changes.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime.
 * Resets cached loggers so new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): TransportMode {
  return { ...transportMode };
}
