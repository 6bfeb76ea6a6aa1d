/**
 * Schema definition for build-image tool
 */

import { z } from 'zod';

export const buildImageSchema = z.object({
  context: z.string().min(1).describe('Build context path'),
  dockerfile: z.string().min(1).describe('Dockerfile path relative to the context'),
  image: z.string().min(1).describe('Reference to tag the built image with'),
  additionalTags: z.array(z.string().min(1)).default([]).describe('Extra tags for the same image'),
  buildArgs: z.record(z.string()).default({}).describe('Build arguments'),
  platform: z.string().optional().describe('Target platform (e.g., linux/amd64)'),
});

export type BuildImageParams = z.input<typeof buildImageSchema>;
