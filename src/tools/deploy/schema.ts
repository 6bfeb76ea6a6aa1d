/**
 * Deploy tool parameter validation schemas.
 */

import { z } from 'zod';
import { healthCheckSchema, readinessSchema } from '../../config/types';

export const deployImageSchema = z.object({
  image: z.string().min(1).describe('Image reference the descriptor must run'),
  digest: z.string().optional().describe('Digest reported by the push, when known'),
  registry: z.string().min(1).default('docker.io').describe('Registry address'),
  composeFile: z.string().min(1).describe('Local service descriptor to upload'),
  service: z.string().min(1).optional().describe('Service expected to run the image'),
  remoteDirectory: z.string().min(1).default('.').describe('Remote directory for the descriptor'),
  removeImages: z.boolean().default(true),
  registryLogin: z.boolean().default(false).describe('Log the remote daemon in to the registry first'),
  readiness: readinessSchema.default({}),
  healthCheck: healthCheckSchema.default({}),
  ssh: z.object({
    host: z.string().min(1),
    port: z.number().int().positive().max(65535).default(22),
    username: z.string().min(1),
    privateKey: z.string().min(1),
    readyTimeoutMs: z.number().int().positive().default(20000),
  }),
  registryCredentials: z
    .object({
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .optional(),
});

export type DeployImageParams = z.input<typeof deployImageSchema>;
