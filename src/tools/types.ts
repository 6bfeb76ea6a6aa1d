/**
 * Shared context handed to every tool
 */

import type { Logger } from 'pino';
import type { DockerClient } from '../infrastructure/docker/client';
import type { RegistryClient } from '../infrastructure/docker/registry';
import type { HttpFetch } from '../infrastructure/http/fetch';
import type { RemoteShellFactory } from '../infrastructure/ssh/client';
import type { Sleep } from '../shared/async';

export interface ToolContext {
  logger: Logger;
  /** Directory relative paths are resolved against */
  workspace: string;
  docker: DockerClient;
  registry: RegistryClient;
  connect: RemoteShellFactory;
  fetch: HttpFetch;
  sleep: Sleep;
  now: () => number;
}
