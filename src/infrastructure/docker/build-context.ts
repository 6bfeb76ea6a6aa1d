/**
 * Build context packing with `.dockerignore` support
 */

import { readFile } from 'node:fs/promises';
import { join, normalize, relative, sep } from 'node:path';
import { PassThrough } from 'node:stream';
import dockerignore from '@balena/dockerignore';
import tar from 'tar-fs';

const DOCKERIGNORE = '.dockerignore';

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Matcher over absolute paths inside `context`. The Dockerfile and `.dockerignore`
 * are always sent, as the daemon needs them whatever the ignore file says.
 */
export async function loadDockerIgnore(context: string, dockerfile: string): Promise<(path: string) => boolean> {
  let content: string;
  try {
    content = await readFile(join(context, DOCKERIGNORE), 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return () => false;
    throw error;
  }

  const patterns = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
  const matcher = dockerignore({ ignorecase: false }).add(patterns);
  const kept = new Set([DOCKERIGNORE, toPosix(normalize(dockerfile))]);

  return (path: string): boolean => {
    const name = toPosix(relative(context, path));
    if (name === '' || kept.has(name)) return false;
    return matcher.ignores(name);
  };
}

/**
 * Tar the context directory as the stream the Engine API build endpoint takes
 */
export async function packBuildContext(context: string, dockerfile: string): Promise<NodeJS.ReadableStream> {
  const ignore = await loadDockerIgnore(context, dockerfile);
  const packed = tar.pack(context, { ignore });
  const output = new PassThrough();

  packed.on('data', (chunk) => {
    output.write(chunk);
  });
  packed.on('end', () => {
    output.end();
  });
  packed.on('error', (error) => {
    output.destroy(error instanceof Error ? error : new Error(String(error)));
  });

  return output;
}
