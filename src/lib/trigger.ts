/**
 * CI trigger filtering by event, branch and changed path prefix
 */

import type { Environment } from './secrets';

export type TriggerEventName = 'push' | 'pull_request' | 'workflow_dispatch';

export interface TriggerEvent {
  name: TriggerEventName;
  branch: string;
  /** Unknown when the caller cannot list changed files */
  changedFiles?: string[];
}

export interface TriggerFilter {
  events: TriggerEventName[];
  branches: string[];
  paths: string[];
}

function matchesBranch(branch: string, pattern: string): boolean {
  return pattern.endsWith('*') ? branch.startsWith(pattern.slice(0, -1)) : branch === pattern;
}

function normalizePath(path: string): string {
  return path.replace(/^\.\//, '').replace(/\\/g, '/');
}

export function shouldTrigger(event: TriggerEvent, filter: TriggerFilter): boolean {
  if (!filter.events.includes(event.name)) return false;
  if (!filter.branches.some((pattern) => matchesBranch(event.branch, pattern))) return false;
  if (filter.paths.length === 0 || event.changedFiles === undefined) return true;

  const prefixes = filter.paths.map(normalizePath);
  return event.changedFiles.some((file) => {
    const path = normalizePath(file);
    return prefixes.some((prefix) => path.startsWith(prefix));
  });
}

export function isEventName(value: string): value is TriggerEventName {
  return value === 'push' || value === 'pull_request' || value === 'workflow_dispatch';
}

/**
 * Describe the current CI run from GitHub Actions variables.
 * Pull requests are filtered by their target branch.
 */
export function eventFromEnvironment(env: Environment = process.env): TriggerEvent | undefined {
  const name = env.GITHUB_EVENT_NAME;
  if (!name || !isEventName(name)) return undefined;

  const branch = name === 'pull_request' ? env.GITHUB_BASE_REF : env.GITHUB_REF_NAME;
  if (!branch) return undefined;

  return { name, branch };
}
