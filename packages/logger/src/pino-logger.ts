import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

const STDERR_FD = 2;

export type Logger = pino.Logger;

const env: LoggerEnvConfig = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

// Set by tests to capture output
let destinationOverride: pino.DestinationStream | undefined;

function isTestEnv(): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates the root logger. Everything goes to stderr: stdout carries the
 * indexer's JSON output and must stay clean.
 */
function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destinationOverride) {
    return pino.pino(pinoConfig, destinationOverride);
  }

  if (isTestEnv() || !env.LOGGER_CONSOLE_ENABLED) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const pretty = env.LOGGER_PRETTY ?? env.NODE_ENV === 'development';
  if (pretty) {
    pinoConfig.transport = {
      options: {
        destination: STDERR_FD,
        ignore: 'pid,hostname,category,categoryLabel,service',
        messageFormat: '{categoryLabel} | {msg}',
      },
      target: 'pino-pretty',
    };
    return pino.pino(pinoConfig);
  }

  // Plain JSON for log processors
  return pino.pino(pinoConfig, pino.destination({ dest: STDERR_FD, sync: false }));
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that follows destination changes.
 *
 * Modules create loggers at top level, before tests or the CLI get a chance
 * to reconfigure output, so every property access resolves the current
 * underlying pino logger.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy(getOrCreateCategoryLogger(category), {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Redirects all loggers to the given stream, or back to the default output.
 */
export function setLoggerDestination(destination: pino.DestinationStream | undefined): void {
  destinationOverride = destination;
  rootLogger = undefined;
  loggerCache.clear();
}
