/**
 * Docker Registry Client
 *
 * Resolves the manifest digest a registry serves for a tag (Distribution API v2),
 * following bearer-token challenges, and waits for a freshly pushed image to appear.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type ImageReference, type RegistryCredentials, type Result } from '../../domain/types';
import { ErrorCodes, errorMessage } from '../../lib/errors';
import { formatImageReference, isDockerHub } from '../../lib/image-reference';
import { pollUntil, type Sleep } from '../../shared/async';
import type { HttpFetch, HttpResponse } from '../http/fetch';

const DOCKER_HUB_REGISTRY = 'https://registry-1.docker.io';

const MANIFEST_ACCEPT = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
].join(', ');

const tokenResponseSchema = z
  .object({ token: z.string().optional(), access_token: z.string().optional() })
  .refine((body) => body.token !== undefined || body.access_token !== undefined, 'No token in response');

export interface RegistryClient {
  /** Digest served for the reference's tag, or null when the tag does not exist yet */
  getManifestDigest: (ref: ImageReference, auth?: RegistryCredentials) => Promise<Result<string | null>>;
}

export interface AuthChallenge {
  scheme: string;
  params: Record<string, string>;
}

/**
 * Parse a `WWW-Authenticate` header such as `Bearer realm="...",service="...",scope="..."`
 */
export function parseAuthChallenge(header: string | null): AuthChallenge | undefined {
  if (!header) return undefined;
  const match = /^(\w+)\s*(.*)$/.exec(header.trim());
  if (!match) return undefined;
  const [, scheme = '', rest = ''] = match;
  const params: Record<string, string> = {};
  for (const param of rest.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = param;
    if (key !== undefined && value !== undefined) params[key] = value;
  }
  return { scheme: scheme.toLowerCase(), params };
}

export function registryBaseUrl(ref: ImageReference): string {
  if (isDockerHub(ref)) return DOCKER_HUB_REGISTRY;
  const host = ref.registry ?? '';
  const insecure = host.startsWith('localhost') || host.startsWith('127.0.0.1');
  return `${insecure ? 'http' : 'https'}://${host}`;
}

export function registryRepositoryPath(ref: ImageReference): string {
  return isDockerHub(ref) && !ref.repository.includes('/') ? `library/${ref.repository}` : ref.repository;
}

function basicAuth(auth: RegistryCredentials): string {
  return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
}

/**
 * Create a registry client over the given fetch implementation
 */
export const createDockerRegistryClient = (logger: Logger, fetchImpl: HttpFetch): RegistryClient => {
  async function fetchBearerToken(challenge: AuthChallenge, auth?: RegistryCredentials): Promise<string> {
    const realm = challenge.params.realm;
    if (!realm) throw new Error('Bearer challenge without realm');

    const url = new URL(realm);
    if (challenge.params.service) url.searchParams.set('service', challenge.params.service);
    if (challenge.params.scope) url.searchParams.set('scope', challenge.params.scope);

    const response = await fetchImpl(url.toString(), auth ? { headers: { Authorization: basicAuth(auth) } } : {});
    if (!response.ok) throw new Error(`Token endpoint returned ${response.status}`);

    const body = tokenResponseSchema.parse(await response.json());
    return body.token ?? body.access_token ?? '';
  }

  return {
    async getManifestDigest(ref: ImageReference, auth?: RegistryCredentials): Promise<Result<string | null>> {
      const url = `${registryBaseUrl(ref)}/v2/${registryRepositoryPath(ref)}/manifests/${ref.tag}`;
      const headers: Record<string, string> = { Accept: MANIFEST_ACCEPT };

      try {
        let response: HttpResponse = await fetchImpl(url, { method: 'HEAD', headers });

        if (response.status === 401) {
          const challenge = parseAuthChallenge(response.headers.get('www-authenticate'));
          if (challenge?.scheme === 'bearer') {
            const token = await fetchBearerToken(challenge, auth);
            response = await fetchImpl(url, { method: 'HEAD', headers: { ...headers, Authorization: `Bearer ${token}` } });
          } else if (challenge?.scheme === 'basic' && auth) {
            response = await fetchImpl(url, { method: 'HEAD', headers: { ...headers, Authorization: basicAuth(auth) } });
          }
        }

        if (response.status === 404) {
          return Success(null);
        }
        if (!response.ok) {
          return Failure(`Registry returned HTTP ${response.status} for ${formatImageReference(ref)}`);
        }

        return Success(response.headers.get('docker-content-digest') ?? '');
      } catch (error) {
        logger.debug({ error: errorMessage(error), url }, 'Registry request failed');
        return Failure(`Registry request failed: ${errorMessage(error)}`);
      }
    },
  };
};

export interface WaitForImageOptions {
  /** When known, wait until the registry serves exactly this digest */
  expectedDigest?: string;
  pollIntervalMs: number;
  timeoutMs: number;
  auth?: RegistryCredentials;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Poll the registry until it serves the pushed image.
 * Transient registry errors count as "not yet" until the timeout.
 */
export async function waitForImage(
  client: RegistryClient,
  ref: ImageReference,
  options: WaitForImageOptions,
  logger: Logger,
): Promise<Result<{ digest: string; attempts: number }>> {
  const image = formatImageReference(ref);

  const outcome = await pollUntil<string>(
    async (attempt) => {
      const served = await client.getManifestDigest(ref, options.auth);
      if (!served.ok) {
        logger.debug({ image, attempt, error: served.error }, 'Registry not ready');
        return { done: false, reason: served.error };
      }
      if (served.value === null) {
        return { done: false, reason: `${image} not found in registry` };
      }
      if (options.expectedDigest && served.value && served.value !== options.expectedDigest) {
        return { done: false, reason: `${image} still serves ${served.value}` };
      }
      return { done: true, value: served.value };
    },
    {
      intervalMs: options.pollIntervalMs,
      timeoutMs: options.timeoutMs,
      ...(options.sleep ? { sleep: options.sleep } : {}),
      ...(options.now ? { now: options.now } : {}),
    },
  );

  if (!outcome.ok) {
    return Failure(
      `Timed out after ${options.timeoutMs}ms waiting for ${image}: ${outcome.reason}`,
      ErrorCodes.READINESS_TIMEOUT,
    );
  }

  logger.info({ image, digest: outcome.value, attempts: outcome.attempts }, 'Image available in registry');
  return Success({ digest: outcome.value, attempts: outcome.attempts });
}
