/**
 * Configuration schema and types
 */

import { z } from 'zod';
import {
  DEFAULT_BUILD,
  DEFAULT_DEPLOY,
  DEFAULT_HEALTH_CHECK,
  DEFAULT_IMAGE,
  DEFAULT_REGISTRY,
  DEFAULT_REMOTE,
  DEFAULT_TIMEOUTS,
  DEFAULT_TRIGGER,
  LOG_LEVELS,
} from './defaults';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const readinessStrategySchema = z.enum(['registry', 'delay', 'none']);
export const logLevelSchema = z.enum(LOG_LEVELS);

export const readinessSchema = z
  .object({
    strategy: readinessStrategySchema.default(DEFAULT_DEPLOY.readinessStrategy),
    delayMs: nonNegativeInt.default(DEFAULT_TIMEOUTS.fixedDelay),
    pollIntervalMs: positiveInt.default(DEFAULT_TIMEOUTS.registryPoll),
    timeoutMs: positiveInt.default(DEFAULT_TIMEOUTS.registryWait),
  })
  .strict();

export const healthCheckSchema = z
  .object({
    enabled: z.boolean().default(DEFAULT_HEALTH_CHECK.enabled),
    paths: z.array(z.string().startsWith('/')).min(1).default([...DEFAULT_HEALTH_CHECK.paths]),
    port: positiveInt.max(65535).optional(),
    scheme: z.enum(['http', 'https']).default(DEFAULT_HEALTH_CHECK.scheme),
    attempts: positiveInt.default(DEFAULT_HEALTH_CHECK.attempts),
    intervalMs: positiveInt.default(DEFAULT_TIMEOUTS.healthInterval),
    requestTimeoutMs: positiveInt.default(DEFAULT_TIMEOUTS.healthRequest),
  })
  .strict();

export const configSchema = z
  .object({
    image: z
      .object({
        repository: z.string().min(1),
        tag: z.string().min(1).default(DEFAULT_IMAGE.tag),
        additionalTags: z.array(z.string().min(1)).default([]),
      })
      .strict(),
    build: z
      .object({
        context: z.string().min(1).default(DEFAULT_BUILD.context),
        dockerfile: z.string().min(1).default(DEFAULT_BUILD.dockerfile),
        buildArgs: z.record(z.string()).default({}),
        platform: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    registry: z
      .object({
        address: z.string().min(1).default(DEFAULT_REGISTRY.address),
      })
      .strict()
      .default({}),
    docker: z
      .object({
        socketPath: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    remote: z
      .object({
        port: positiveInt.max(65535).default(DEFAULT_REMOTE.port),
        directory: z.string().min(1).default(DEFAULT_REMOTE.directory),
        readyTimeoutMs: positiveInt.default(DEFAULT_REMOTE.readyTimeoutMs),
      })
      .strict()
      .default({}),
    deploy: z
      .object({
        composeFile: z.string().min(1).default(DEFAULT_DEPLOY.composeFile),
        service: z.string().min(1).optional(),
        removeImages: z.boolean().default(DEFAULT_DEPLOY.removeImages),
        registryLogin: z.boolean().default(DEFAULT_DEPLOY.registryLogin),
        readiness: readinessSchema.default({}),
        healthCheck: healthCheckSchema.default({}),
      })
      .strict()
      .default({}),
    trigger: z
      .object({
        events: z.array(z.enum(['push', 'pull_request', 'workflow_dispatch'])).default([...DEFAULT_TRIGGER.events]),
        branches: z.array(z.string().min(1)).default([...DEFAULT_TRIGGER.branches]),
        paths: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        /** Unset leaves the choice to `createLogger` */
        level: logLevelSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

/** Configuration as written in dockship.yml */
export type DockshipConfigInput = z.input<typeof configSchema>;

/** Configuration with every default applied */
export type DockshipConfig = z.output<typeof configSchema>;

export type ReadinessStrategy = z.infer<typeof readinessStrategySchema>;
export type ReadinessConfig = z.output<typeof readinessSchema>;
export type HealthCheckConfig = z.output<typeof healthCheckSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
