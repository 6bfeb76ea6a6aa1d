/**
 * Compose-style service descriptor types
 */

export type RestartPolicy = 'no' | 'always' | 'unless-stopped' | 'on-failure' | `on-failure:${number}`;

export interface PortMapping {
  /** Published port on the host, absent when only the container port is given */
  host?: number;
  container: number;
  protocol: 'tcp' | 'udp';
}

export interface ServiceDefinition {
  image?: string;
  ports: PortMapping[];
  restart?: RestartPolicy;
}

export interface ServiceDescriptor {
  services: Record<string, ServiceDefinition>;
}

/**
 * A descriptor loaded from disk. The raw text is what gets uploaded.
 */
export interface LoadedServiceDescriptor {
  path: string;
  raw: string;
  descriptor: ServiceDescriptor;
}

export interface ImageMismatch {
  service: string;
  expected: string;
  actual: string | undefined;
}
