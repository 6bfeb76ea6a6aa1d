/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with secret redaction and an operation timer.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export const REDACTED_PATHS = [
  'password',
  'token',
  'privateKey',
  'authconfig',
  'secrets',
  '*.password',
  '*.token',
  '*.privateKey',
  '*.authconfig',
];

/**
 * Create a Pino logger with dockship defaults
 */
export function createLogger(
  options: pino.LoggerOptions = {},
  destination?: pino.DestinationStream,
): pino.Logger {
  const settings: pino.LoggerOptions = {
    name: 'dockship',
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    ...options,
  };

  return destination ? pino(settings, destination) : pino(settings);
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
  checkpoint: (label: string, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation.
 * `end` and `error` return the elapsed milliseconds.
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
  now: () => number = Date.now,
): Timer {
  const startTime = now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = now() - startTime;

      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },

    checkpoint(label: string, additionalContext: Record<string, unknown> = {}): number {
      const elapsed = now() - startTime;

      logger.debug(
        { operation, checkpoint: label, elapsed_ms: elapsed, ...context, ...additionalContext },
        `${operation} checkpoint: ${label} at ${elapsed}ms`,
      );
      return elapsed;
    },
  };
}
