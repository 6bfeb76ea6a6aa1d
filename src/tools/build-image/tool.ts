/**
 * Build Image Tool
 *
 * Builds the application image from the build context and applies the configured tags.
 */

import { resolve } from 'node:path';
import { Failure, Success, type Result } from '../../domain/types';
import { ErrorCodes } from '../../lib/errors';
import { formatImageReference, parseImageReference, repositoryName } from '../../lib/image-reference';
import { createTimer } from '../../lib/logger';
import type { ToolContext } from '../types';
import { buildImageSchema, type BuildImageParams } from './schema';

export interface BuildImageResult {
  imageId: string;
  image: string;
  tags: string[];
  logs: string[];
}

export async function buildImage(
  params: BuildImageParams,
  context: Pick<ToolContext, 'logger' | 'docker' | 'workspace'>,
): Promise<Result<BuildImageResult>> {
  const { logger, docker } = context;

  const validated = buildImageSchema.safeParse(params);
  if (!validated.success) {
    return Failure(`Invalid build parameters: ${validated.error.message}`, ErrorCodes.CONFIG_INVALID);
  }
  const { image, additionalTags, buildArgs, platform } = validated.data;

  const ref = parseImageReference(image);
  if (!ref.ok) return ref;

  const buildContext = resolve(context.workspace, validated.data.context);
  const primary = formatImageReference(ref.value);
  const timer = createTimer(logger, 'build-image', { image: primary, context: buildContext });

  const built = await docker.buildImage({
    context: buildContext,
    dockerfile: validated.data.dockerfile,
    tag: primary,
    buildargs: buildArgs,
    ...(platform ? { platform } : {}),
  });
  if (!built.ok) {
    timer.error(built.error);
    return built;
  }

  const tags = [primary];
  for (const tag of additionalTags) {
    const tagged = await docker.tagImage(built.value.imageId, repositoryName(ref.value), tag);
    if (!tagged.ok) {
      timer.error(tagged.error, { tag });
      return tagged;
    }
    tags.push(formatImageReference({ ...ref.value, tag }));
  }

  timer.end({ imageId: built.value.imageId, tags });
  return Success({ imageId: built.value.imageId, image: primary, tags, logs: built.value.logs });
}
