/**
 * HTTP health probe for the deployed application
 */

import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../../domain/types';
import { ErrorCodes, errorMessage } from '../../lib/errors';
import { pollUntil, type Sleep } from '../../shared/async';
import type { HttpFetch } from './fetch';

export interface HealthCheckOptions {
  attempts: number;
  intervalMs: number;
  requestTimeoutMs: number;
  sleep?: Sleep;
}

/**
 * Probe each path until it answers 2xx; every path gets its own attempt budget.
 * Returns the URLs that passed.
 */
export async function checkEndpoints(
  baseUrl: string,
  paths: string[],
  options: HealthCheckOptions,
  fetchImpl: HttpFetch,
  logger: Logger,
): Promise<Result<string[]>> {
  const passed: string[] = [];

  for (const path of paths) {
    const url = new URL(path, baseUrl).toString();

    const outcome = await pollUntil<number>(
      async () => {
        try {
          const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.requestTimeoutMs) });
          if (response.ok) return { done: true, value: response.status };
          return { done: false, reason: `HTTP ${response.status}` };
        } catch (error) {
          return { done: false, reason: errorMessage(error) };
        }
      },
      {
        intervalMs: options.intervalMs,
        maxAttempts: options.attempts,
        ...(options.sleep ? { sleep: options.sleep } : {}),
      },
    );

    if (!outcome.ok) {
      logger.warn({ url, attempts: outcome.attempts, reason: outcome.reason }, 'Health check failed');
      return Failure(
        `Health check failed for ${url} after ${outcome.attempts} attempts: ${outcome.reason}`,
        ErrorCodes.HEALTH_CHECK_FAILED,
      );
    }

    logger.info({ url, status: outcome.value }, 'Health check passed');
    passed.push(url);
  }

  return Success(passed);
}
