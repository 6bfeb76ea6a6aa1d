/**
 * Default tool context wiring the real Docker, registry, SSH and HTTP clients
 */

import { resolve } from 'node:path';
import type { DockshipConfig } from '../config/types';
import { createDockerClient } from '../infrastructure/docker/client';
import { createDockerRegistryClient } from '../infrastructure/docker/registry';
import { defaultFetch } from '../infrastructure/http/fetch';
import { connectSsh } from '../infrastructure/ssh/client';
import type { Logger } from '../lib/logger';
import { sleep } from '../shared/async';
import type { ToolContext } from './types';

export function createToolContext(
  logger: Logger,
  config: DockshipConfig,
  workspace: string,
  overrides: Partial<Omit<ToolContext, 'logger' | 'workspace'>> = {},
): ToolContext {
  const fetchImpl = overrides.fetch ?? defaultFetch;
  return {
    logger,
    workspace: resolve(workspace),
    docker:
      overrides.docker ??
      createDockerClient(logger, config.docker.socketPath ? { socketPath: config.docker.socketPath } : {}),
    registry: overrides.registry ?? createDockerRegistryClient(logger, fetchImpl),
    connect: overrides.connect ?? connectSsh,
    fetch: fetchImpl,
    sleep: overrides.sleep ?? sleep,
    now: overrides.now ?? Date.now,
  };
}
