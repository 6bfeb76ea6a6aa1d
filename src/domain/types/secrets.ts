/**
 * Named secrets consumed by reference from the environment
 */

export const SECRET_NAMES = {
  registryUsername: 'DOCKERHUB_USERNAME',
  registryToken: 'DOCKERHUB_TOKEN',
  sshPrivateKey: 'EC2_SSH_KEY',
  remoteHost: 'EC2_HOST',
  remoteUsername: 'EC2_USERNAME',
} as const;

type SecretKey = keyof typeof SECRET_NAMES;
export type SecretName = (typeof SECRET_NAMES)[SecretKey];

export interface RegistryCredentials {
  username: string;
  password: string;
}

export interface SshCredentials {
  host: string;
  /** Port parsed from `host:port`, overrides the configured SSH port */
  port?: number;
  username: string;
  privateKey: string;
}

export interface SecretSet {
  registry: RegistryCredentials;
  ssh: SshCredentials;
}
