/**
 * Secret loading from the environment.
 * Values are passed along by reference and never logged.
 */

import {
  Failure,
  SECRET_NAMES,
  Success,
  type RegistryCredentials,
  type Result,
  type SecretName,
  type SecretSet,
  type SshCredentials,
} from '../domain/types';
import { ErrorCodes } from './errors';

export type Environment = Record<string, string | undefined>;

/**
 * Names among `names` that are unset or blank
 */
export function findMissingSecrets(
  env: Environment,
  names: readonly SecretName[] = Object.values(SECRET_NAMES),
): SecretName[] {
  return names.filter((name) => !env[name]?.trim());
}

function requireSecrets(env: Environment, names: readonly SecretName[]): Result<void> {
  const missing = findMissingSecrets(env, names);
  if (missing.length > 0) {
    return Failure(`Missing required secrets: ${missing.join(', ')}`, ErrorCodes.SECRET_MISSING);
  }
  return Success(undefined);
}

function read(env: Environment, name: SecretName): string {
  return (env[name] ?? '').trim();
}

/**
 * Keys pasted into single-line secret stores often carry literal `\n`
 */
export function normalizePrivateKey(key: string): string {
  const trimmed = key.trim();
  return (trimmed.includes('\\n') ? trimmed.replace(/\\n/g, '\n') : trimmed) + '\n';
}

/**
 * Split `host[:port]`. Bracketed IPv6 literals keep their brackets off.
 */
export function parseHostAddress(address: string): { host: string; port?: number } {
  const value = address.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(value);
  if (bracketed) {
    const [, host = '', port] = bracketed;
    return port ? { host, port: Number(port) } : { host };
  }
  const parts = value.split(':');
  if (parts.length === 2 && /^\d+$/.test(parts[1] ?? '')) {
    return { host: parts[0] ?? '', port: Number(parts[1]) };
  }
  return { host: value };
}

export function loadRegistryCredentials(env: Environment = process.env): Result<RegistryCredentials> {
  const required = requireSecrets(env, [SECRET_NAMES.registryUsername, SECRET_NAMES.registryToken]);
  if (!required.ok) return required;
  return Success({
    username: read(env, SECRET_NAMES.registryUsername),
    password: read(env, SECRET_NAMES.registryToken),
  });
}

export function loadSshCredentials(env: Environment = process.env): Result<SshCredentials> {
  const required = requireSecrets(env, [
    SECRET_NAMES.sshPrivateKey,
    SECRET_NAMES.remoteHost,
    SECRET_NAMES.remoteUsername,
  ]);
  if (!required.ok) return required;

  const { host, port } = parseHostAddress(read(env, SECRET_NAMES.remoteHost));
  const credentials: SshCredentials = {
    host,
    username: read(env, SECRET_NAMES.remoteUsername),
    privateKey: normalizePrivateKey(read(env, SECRET_NAMES.sshPrivateKey)),
  };
  if (port !== undefined) credentials.port = port;
  return Success(credentials);
}

/**
 * Load all five secrets, reporting every missing one at once
 */
export function loadSecrets(env: Environment = process.env): Result<SecretSet> {
  const required = requireSecrets(env, Object.values(SECRET_NAMES));
  if (!required.ok) return required;

  const registry = loadRegistryCredentials(env);
  if (!registry.ok) return registry;
  const ssh = loadSshCredentials(env);
  if (!ssh.ok) return ssh;

  return Success({ registry: registry.value, ssh: ssh.value });
}
