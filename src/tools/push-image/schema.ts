/**
 * Push image tool parameter validation schemas.
 */

import { z } from 'zod';

export const pushImageSchema = z.object({
  image: z.string().min(1).describe('Primary image reference to push'),
  additionalTags: z.array(z.string().min(1)).default([]).describe('Extra tags pushed after the primary one'),
  registry: z.string().min(1).default('docker.io').describe('Target registry address'),
  credentials: z
    .object({
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .describe('Registry credentials'),
});

export type PushImageParams = z.input<typeof pushImageSchema>;
