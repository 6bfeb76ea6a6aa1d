/**
 * Remote command plan for recreating the service from the uploaded descriptor
 */

import { posix } from 'node:path';
import { joinCommand, quoteRemotePath } from '../../lib/shell';
import { isDockerHub, parseImageReference } from '../../lib/image-reference';

export interface RemoteCommandPlan {
  /** Remote directory; `.` and `~` mean the login home */
  directory: string;
  /** Descriptor file name on the remote host */
  composeFile: string;
  /** Pass `--rmi all` to `down`, discarding local images so `up` pulls fresh */
  removeImages: boolean;
}

function isHome(directory: string): boolean {
  return directory === '.' || directory === '~' || directory === '~/';
}

/**
 * Path for the SFTP upload. SFTP resolves relative paths against the login home
 * and does not expand `~`.
 */
export function remoteUploadPath(directory: string, fileName: string): string {
  if (isHome(directory)) return fileName;
  if (directory.startsWith('~/')) return posix.join(directory.slice(2), fileName);
  return posix.join(directory, fileName);
}

export function mkdirCommand(directory: string): string | undefined {
  return isHome(directory) ? undefined : `mkdir -p ${quoteRemotePath(directory)}`;
}

/**
 * Tear down then recreate, in that order
 */
export function buildComposeCommands(plan: RemoteCommandPlan): string[] {
  const prefix = isHome(plan.directory) ? '' : `cd ${quoteRemotePath(plan.directory)} && `;
  const compose = ['docker', 'compose', '-f', plan.composeFile];

  const down = joinCommand([...compose, 'down', ...(plan.removeImages ? ['--rmi', 'all'] : [])]);
  const up = joinCommand([...compose, 'up', '-d']);

  return [`${prefix}${down}`, `${prefix}${up}`];
}

/**
 * `docker login` reading the password from stdin; Docker Hub needs no server argument
 */
export function loginCommand(registry: string, username: string): string {
  const ref = parseImageReference(`${registry}/probe`);
  const server = ref.ok && isDockerHub(ref.value) ? [] : [registry];
  return joinCommand(['docker', 'login', ...server, '--username', username, '--password-stdin']);
}
