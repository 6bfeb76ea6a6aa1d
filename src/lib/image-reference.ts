/**
 * Image reference parsing and comparison
 */

import { DEFAULT_TAG, Failure, Success, type ImageReference, type Result } from '../domain/types';
import { ErrorCodes } from './errors';

const DOCKER_HUB_ALIASES = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const REPOSITORY_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*(?:\/[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*)*$/;

function looksLikeRegistry(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/**
 * Parse `[registry/]repository[:tag]`. Digest references are not accepted.
 */
export function parseImageReference(text: string): Result<ImageReference> {
  const input = text.trim();
  if (!input) {
    return Failure('Image reference is empty', ErrorCodes.CONFIG_INVALID);
  }
  if (input.includes('@')) {
    return Failure(`Digest references are not supported: ${input}`, ErrorCodes.CONFIG_INVALID);
  }

  const segments = input.split('/');
  let registry: string | undefined;
  const first = segments[0];
  if (segments.length > 1 && first !== undefined && looksLikeRegistry(first)) {
    registry = first;
    segments.shift();
  }

  let path = segments.join('/');
  let tag = DEFAULT_TAG;
  const lastSegment = segments[segments.length - 1] ?? '';
  const colon = lastSegment.lastIndexOf(':');
  if (colon !== -1) {
    tag = lastSegment.slice(colon + 1);
    path = path.slice(0, path.length - (lastSegment.length - colon));
  }

  if (!path) {
    return Failure(`Image reference has no repository: ${input}`, ErrorCodes.CONFIG_INVALID);
  }
  if (!REPOSITORY_PATTERN.test(path)) {
    return Failure(`Invalid repository name: ${path}`, ErrorCodes.CONFIG_INVALID);
  }
  if (!TAG_PATTERN.test(tag)) {
    return Failure(`Invalid tag: ${tag}`, ErrorCodes.CONFIG_INVALID);
  }

  return Success(registry ? { registry, repository: path, tag } : { repository: path, tag });
}

export function formatImageReference(ref: ImageReference): string {
  return ref.registry ? `${ref.registry}/${ref.repository}:${ref.tag}` : `${ref.repository}:${ref.tag}`;
}

/**
 * Repository name without the tag, including the registry when one is set
 */
export function repositoryName(ref: ImageReference): string {
  return ref.registry ? `${ref.registry}/${ref.repository}` : ref.repository;
}

export function isDockerHub(ref: ImageReference): boolean {
  return ref.registry === undefined || DOCKER_HUB_ALIASES.has(ref.registry);
}

function canonicalRepository(ref: ImageReference): string {
  if (isDockerHub(ref)) {
    const path = ref.repository.includes('/') ? ref.repository : `library/${ref.repository}`;
    return `docker.io/${path}`;
  }
  return `${ref.registry}/${ref.repository}`;
}

/**
 * True when both references name the same repository, ignoring tags
 */
export function sameRepository(a: ImageReference, b: ImageReference): boolean {
  return canonicalRepository(a) === canonicalRepository(b);
}

/**
 * True when both references name the same repository and tag
 */
export function sameImage(a: ImageReference, b: ImageReference): boolean {
  return sameRepository(a, b) && a.tag === b.tag;
}

/**
 * Build a reference from the configured repository, tag and registry address.
 * Docker Hub addresses are left implicit.
 */
export function resolveImageReference(
  repository: string,
  tag: string,
  registryAddress: string,
): Result<ImageReference> {
  const parsed = parseImageReference(`${repository}:${tag}`);
  if (!parsed.ok) return parsed;
  if (parsed.value.registry || DOCKER_HUB_ALIASES.has(registryAddress)) return parsed;
  return Success({ ...parsed.value, registry: registryAddress });
}
