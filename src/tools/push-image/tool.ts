/**
 * Push Image Tool
 *
 * Authenticates to the registry and pushes the primary tag, then any additional tags.
 * Any failure aborts the push; nothing is retried.
 */

import { Failure, Success, type Result } from '../../domain/types';
import type { RegistryAuth } from '../../infrastructure/docker/client';
import { ErrorCodes } from '../../lib/errors';
import { formatImageReference, isDockerHub, parseImageReference, repositoryName } from '../../lib/image-reference';
import { createTimer } from '../../lib/logger';
import type { ToolContext } from '../types';
import { pushImageSchema, type PushImageParams } from './schema';

export interface PushImageResult {
  registry: string;
  digest?: string;
  pushedTags: string[];
}

const DOCKER_HUB_AUTH_SERVER = 'https://index.docker.io/v1/';

/**
 * Server address the daemon expects for a registry login
 */
export function authServerAddress(registry: string): string {
  const ref = parseImageReference(`${registry}/probe`);
  return !ref.ok || isDockerHub(ref.value) ? DOCKER_HUB_AUTH_SERVER : registry;
}

export async function pushImage(
  params: PushImageParams,
  context: Pick<ToolContext, 'logger' | 'docker'>,
): Promise<Result<PushImageResult>> {
  const { logger, docker } = context;

  const validated = pushImageSchema.safeParse(params);
  if (!validated.success) {
    return Failure(`Invalid push parameters: ${validated.error.message}`, ErrorCodes.CONFIG_INVALID);
  }
  const { image, additionalTags, registry, credentials } = validated.data;

  const ref = parseImageReference(image);
  if (!ref.ok) return ref;

  const timer = createTimer(logger, 'push-image', { image, registry });
  const auth: RegistryAuth = {
    username: credentials.username,
    password: credentials.password,
    serveraddress: authServerAddress(registry),
  };

  const login = await docker.checkAuth(auth);
  if (!login.ok) {
    timer.error(login.error);
    return login;
  }

  const repository = repositoryName(ref.value);
  const pushedTags: string[] = [];
  let digest: string | undefined;

  for (const tag of [ref.value.tag, ...additionalTags]) {
    const pushed = await docker.pushImage(repository, tag, auth);
    if (!pushed.ok) {
      timer.error(pushed.error, { tag, pushedTags });
      return pushed;
    }
    if (tag === ref.value.tag) digest = pushed.value.digest;
    pushedTags.push(formatImageReference({ ...ref.value, tag }));
  }

  timer.end({ digest, pushedTags });
  const result: PushImageResult = { registry, pushedTags };
  if (digest) result.digest = digest;
  return Success(result);
}
