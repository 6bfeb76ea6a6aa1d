/**
 * Configuration loading: YAML file, then environment overrides, then schema defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { DEFAULT_CONFIG_FILE } from './defaults';
import { configSchema, type DockshipConfig } from './types';

type Environment = Record<string, string | undefined>;
type Section = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  file?: string;
  workspace?: string;
  env?: Environment;
}

export interface LoadedConfig {
  config: DockshipConfig;
  /** Config file that was read, if any */
  source?: string;
  warnings: string[];
}

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string): Section {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

/**
 * Parse integer with fallback, recording a warning for unparseable values
 */
function parseIntWithFallback(
  value: string | undefined,
  varName: string,
  warnings: string[],
): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    warnings.push(`Invalid ${varName}: ${value}. Using configured value`);
    return undefined;
  }
  return parsed;
}

function readConfigFile(path: string): Section {
  let document: unknown;
  try {
    document = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(error)}`, { path });
  }
  if (document === undefined || document === null) return {};
  if (!isRecord(document)) {
    throw new ConfigurationError(`Config file ${path} must contain a mapping`, { path });
  }
  return document;
}

/**
 * Apply environment variable overrides to the raw (pre-default) configuration
 */
export function applyEnvironmentOverrides(raw: Section, env: Environment, warnings: string[]): Section {
  const image = section(raw, 'image');
  const docker = section(raw, 'docker');
  const remote = section(raw, 'remote');
  const deploy = section(raw, 'deploy');
  const readiness = section(deploy, 'readiness');
  const logging = section(raw, 'logging');

  const delayMs = parseIntWithFallback(env.DOCKSHIP_DELAY_MS, 'DOCKSHIP_DELAY_MS', warnings);

  return {
    ...raw,
    image: {
      ...image,
      ...(env.DOCKSHIP_IMAGE ? { repository: env.DOCKSHIP_IMAGE } : {}),
      ...(env.DOCKSHIP_TAG ? { tag: env.DOCKSHIP_TAG } : {}),
    },
    docker: {
      ...docker,
      ...(env.DOCKER_SOCKET ? { socketPath: env.DOCKER_SOCKET } : {}),
    },
    remote: {
      ...remote,
      ...(env.DOCKSHIP_REMOTE_DIR ? { directory: env.DOCKSHIP_REMOTE_DIR } : {}),
    },
    deploy: {
      ...deploy,
      readiness: {
        ...readiness,
        ...(env.DOCKSHIP_READINESS ? { strategy: env.DOCKSHIP_READINESS } : {}),
        ...(delayMs !== undefined ? { delayMs } : {}),
      },
    },
    logging: {
      ...logging,
      ...(env.LOG_LEVEL ? { level: env.LOG_LEVEL } : {}),
    },
  };
}

/**
 * Validate a raw configuration object and fill in defaults
 */
export function parseConfig(raw: unknown, source = 'configuration'): DockshipConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Load configuration from `dockship.yml` (or an explicit file) with environment overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const workspace = resolve(options.workspace ?? process.cwd());
  const env = options.env ?? process.env;
  const warnings: string[] = [];

  let source: string | undefined;
  if (options.file) {
    source = isAbsolute(options.file) ? options.file : join(workspace, options.file);
    if (!existsSync(source)) {
      throw new ConfigurationError(`Config file not found: ${source}`, { path: source });
    }
  } else {
    const candidate = join(workspace, DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) source = candidate;
  }

  const raw = source ? readConfigFile(source) : {};
  const config = parseConfig(applyEnvironmentOverrides(raw, env, warnings), source ?? 'configuration');

  return source ? { config, source, warnings } : { config, warnings };
}

/**
 * Get configuration summary with key values
 */
export function getConfigurationSummary(config: DockshipConfig): Record<string, unknown> {
  return {
    image: `${config.image.repository}:${config.image.tag}`,
    registry: config.registry.address,
    composeFile: config.deploy.composeFile,
    remoteDirectory: config.remote.directory,
    readiness: config.deploy.readiness.strategy,
    healthCheck: config.deploy.healthCheck.enabled,
  };
}
