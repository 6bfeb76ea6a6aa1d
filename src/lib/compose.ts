/**
 * Service descriptor (compose file) parsing and image consistency checks
 *
 * The descriptor is uploaded verbatim; parsing only serves validation and lookups.
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
  Failure,
  Success,
  type ImageMismatch,
  type ImageReference,
  type LoadedServiceDescriptor,
  type PortMapping,
  type Result,
  type ServiceDefinition,
  type ServiceDescriptor,
} from '../domain/types';
import { ErrorCodes, errorMessage } from './errors';
import { formatImageReference, parseImageReference, sameImage, sameRepository } from './image-reference';

const PORT_PATTERN = /^(?:(?:\d{1,3}(?:\.\d{1,3}){3}|\[[0-9a-fA-F:]+\]):)?(?:(\d+):)?(\d+)(?:\/(tcp|udp))?$/;

const restartSchema = z.union([
  z.enum(['no', 'always', 'unless-stopped', 'on-failure']),
  z
    .string()
    .regex(/^on-failure:\d+$/)
    .transform((value): `on-failure:${number}` => `on-failure:${Number(value.slice('on-failure:'.length))}`),
]);

const portSchema = z.union([z.string(), z.number().int()]);

const serviceSchema = z
  .object({
    image: z.string().min(1).optional(),
    ports: z.array(portSchema).default([]),
    restart: restartSchema.optional(),
  })
  .passthrough();

const descriptorSchema = z
  .object({
    services: z
      .record(serviceSchema)
      .refine((services) => Object.keys(services).length > 0, 'Descriptor must define at least one service'),
  })
  .passthrough();

/**
 * Parse a compose port entry: `"5000"`, `"8080:5000"`, `"127.0.0.1:8080:5000/udp"` or a number
 */
export function parsePortMapping(entry: string | number): Result<PortMapping> {
  if (typeof entry === 'number') {
    return Success({ container: entry, protocol: 'tcp' });
  }
  const match = PORT_PATTERN.exec(entry.trim());
  if (!match) {
    return Failure(`Invalid port mapping: ${entry}`, ErrorCodes.DESCRIPTOR_INVALID);
  }
  const [, hostPort, containerPort, protocol] = match;
  const mapping: PortMapping = {
    container: Number(containerPort),
    protocol: protocol === 'udp' ? 'udp' : 'tcp',
  };
  if (hostPort !== undefined) {
    mapping.host = Number(hostPort);
  }
  return Success(mapping);
}

/**
 * Parse and validate compose YAML text
 */
export function parseServiceDescriptor(text: string): Result<ServiceDescriptor> {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    return Failure(`Descriptor is not valid YAML: ${errorMessage(error)}`, ErrorCodes.DESCRIPTOR_INVALID);
  }

  const parsed = descriptorSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    return Failure(`Invalid descriptor: ${issues.join('; ')}`, ErrorCodes.DESCRIPTOR_INVALID);
  }

  const services: ServiceDescriptor['services'] = {};
  for (const [name, service] of Object.entries(parsed.data.services)) {
    const ports: PortMapping[] = [];
    for (const entry of service.ports) {
      const port = parsePortMapping(entry);
      if (!port.ok) {
        return Failure(`Service ${name}: ${port.error}`, ErrorCodes.DESCRIPTOR_INVALID);
      }
      ports.push(port.value);
    }
    const definition: ServiceDefinition = { ports };
    if (service.image !== undefined) definition.image = service.image;
    if (service.restart !== undefined) definition.restart = service.restart;
    services[name] = definition;
  }

  return Success({ services });
}

/**
 * Read a descriptor file, keeping its raw text for upload
 */
export async function loadServiceDescriptor(path: string): Promise<Result<LoadedServiceDescriptor>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    return Failure(`Cannot read descriptor ${path}: ${errorMessage(error)}`, ErrorCodes.DESCRIPTOR_INVALID);
  }

  const parsed = parseServiceDescriptor(raw);
  if (!parsed.ok) return Failure(`${path}: ${parsed.error}`, parsed.code);

  return Success({ path, raw, descriptor: parsed.value });
}

/**
 * List services that do not reference the pushed image.
 *
 * With `serviceName`, that service must exist and reference exactly `pushed`.
 * Otherwise every service using the pushed repository must use its tag, and at least one must.
 */
export function findImageMismatches(
  descriptor: ServiceDescriptor,
  pushed: ImageReference,
  serviceName?: string,
): ImageMismatch[] {
  const expected = formatImageReference(pushed);

  if (serviceName !== undefined) {
    const service = descriptor.services[serviceName];
    const actual = service?.image;
    const ref = actual !== undefined ? parseImageReference(actual) : undefined;
    return ref?.ok && sameImage(ref.value, pushed) ? [] : [{ service: serviceName, expected, actual }];
  }

  const mismatches: ImageMismatch[] = [];
  let referenced = false;
  for (const [name, service] of Object.entries(descriptor.services)) {
    if (service.image === undefined) continue;
    const ref = parseImageReference(service.image);
    if (!ref.ok || !sameRepository(ref.value, pushed)) continue;
    referenced = true;
    if (ref.value.tag !== pushed.tag) {
      mismatches.push({ service: name, expected, actual: service.image });
    }
  }

  if (!referenced) {
    mismatches.push({ service: '*', expected, actual: undefined });
  }
  return mismatches;
}

export function checkDescriptorMatchesImage(
  descriptor: ServiceDescriptor,
  pushed: ImageReference,
  serviceName?: string,
): Result<void> {
  const mismatches = findImageMismatches(descriptor, pushed, serviceName);
  if (mismatches.length === 0) return Success(undefined);

  const details = mismatches.map((m) =>
    m.service === '*'
      ? `no service references ${m.expected}`
      : `service ${m.service} uses ${m.actual ?? 'no image'}, expected ${m.expected}`,
  );
  return Failure(`Descriptor does not match pushed image: ${details.join('; ')}`, ErrorCodes.DESCRIPTOR_MISMATCH);
}

/**
 * First published host port of a service, used as the health check default
 */
export function publishedPort(descriptor: ServiceDescriptor, serviceName: string): number | undefined {
  return descriptor.services[serviceName]?.ports.find((port) => port.host !== undefined)?.host;
}

/**
 * Name of the service that runs the pushed image, if any
 */
export function serviceForImage(descriptor: ServiceDescriptor, pushed: ImageReference): string | undefined {
  return Object.entries(descriptor.services).find(([, service]) => {
    if (service.image === undefined) return false;
    const ref = parseImageReference(service.image);
    return ref.ok && sameImage(ref.value, pushed);
  })?.[0];
}
