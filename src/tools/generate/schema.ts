/**
 * Schema definition for the generate tool
 */

import { z } from 'zod';
import { DEFAULT_APP } from '../../config/defaults';

export const appOptionsSchema = z.object({
  baseImage: z.string().min(1).default(DEFAULT_APP.baseImage).describe('Base runtime image'),
  workdir: z.string().startsWith('/').default(DEFAULT_APP.workdir),
  requirementsFile: z.string().min(1).default(DEFAULT_APP.requirementsFile),
  port: z.number().int().positive().max(65535).default(DEFAULT_APP.port),
  command: z.array(z.string().min(1)).min(1).default([...DEFAULT_APP.command]).describe('Process launch command'),
  serviceName: z.string().min(1).default(DEFAULT_APP.serviceName),
  restart: z.enum(['no', 'always', 'unless-stopped', 'on-failure']).default(DEFAULT_APP.restart),
});

export const generateFilesSchema = z.object({
  dockerfile: z.boolean().default(false),
  compose: z.boolean().default(false),
  workflow: z.boolean().default(false),
  force: z.boolean().default(false).describe('Overwrite existing files'),
  workflowPath: z.string().min(1).default('.github/workflows/deploy.yml'),
  /** npm package spec CI jobs install dockship from; required for the workflow */
  cliPackage: z.string().min(1).optional(),
  nodeVersion: z.string().min(1).default('20'),
  app: appOptionsSchema.default({}),
});

export type AppOptions = z.output<typeof appOptionsSchema>;
export type GenerateFilesParams = z.input<typeof generateFilesSchema>;
