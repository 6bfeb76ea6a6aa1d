/**
 * Generate Tool
 *
 * Writes the Dockerfile, service descriptor and CI workflow for the configured image.
 */

import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, relative, resolve } from 'node:path';
import type { DockshipConfig } from '../../config/types';
import { Failure, Success, type Result } from '../../domain/types';
import { ErrorCodes, errorMessage } from '../../lib/errors';
import { formatImageReference, resolveImageReference } from '../../lib/image-reference';
import type { ToolContext } from '../types';
import { generateFilesSchema, type GenerateFilesParams } from './schema';
import { generateComposeDescriptor, generateDockerfile, generateWorkflow } from './templates';

export interface GeneratedFile {
  path: string;
  content: string;
}

export interface GenerateFilesResult {
  written: string[];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write files, refusing to overwrite any existing one unless forced.
 * Existence is checked for all files before anything is written.
 */
export async function writeGeneratedFiles(
  files: GeneratedFile[],
  force: boolean,
): Promise<Result<string[]>> {
  if (!force) {
    for (const file of files) {
      if (await exists(file.path)) {
        return Failure(`${file.path} already exists; use --force to overwrite`, ErrorCodes.FILE_EXISTS);
      }
    }
  }

  const written: string[] = [];
  try {
    for (const file of files) {
      await mkdir(dirname(file.path), { recursive: true });
      await writeFile(file.path, file.content, 'utf-8');
      written.push(file.path);
    }
  } catch (error) {
    return Failure(`Failed to write ${files[written.length]?.path ?? 'file'}: ${errorMessage(error)}`);
  }
  return Success(written);
}

export async function generateFiles(
  params: GenerateFilesParams,
  config: DockshipConfig,
  context: Pick<ToolContext, 'logger' | 'workspace'>,
): Promise<Result<GenerateFilesResult>> {
  const validated = generateFilesSchema.safeParse(params);
  if (!validated.success) {
    return Failure(`Invalid generate parameters: ${validated.error.message}`, ErrorCodes.CONFIG_INVALID);
  }
  const options = validated.data;
  const all = !options.dockerfile && !options.compose && !options.workflow;

  const ref = resolveImageReference(config.image.repository, config.image.tag, config.registry.address);
  if (!ref.ok) return ref;

  const files: GeneratedFile[] = [];
  if (all || options.dockerfile) {
    const contextDir = resolve(context.workspace, config.build.context);
    files.push({ path: join(contextDir, config.build.dockerfile), content: generateDockerfile(options.app) });
  }
  if (all || options.compose) {
    files.push({
      path: resolve(context.workspace, config.deploy.composeFile),
      content: generateComposeDescriptor(formatImageReference(ref.value), options.app),
    });
  }
  if (all || options.workflow) {
    if (!options.cliPackage) {
      return Failure(
        'The CI workflow installs dockship from a package; pass --cli-package <spec>',
        ErrorCodes.CONFIG_INVALID,
      );
    }
    files.push({
      path: resolve(context.workspace, options.workflowPath),
      content: generateWorkflow(config, { cliPackage: options.cliPackage, nodeVersion: options.nodeVersion }),
    });
  }

  const written = await writeGeneratedFiles(files, options.force);
  if (!written.ok) return written;

  context.logger.info(
    { files: written.value.map((path) => relative(context.workspace, path)) },
    'Generated files',
  );
  return Success({ written: written.value });
}
