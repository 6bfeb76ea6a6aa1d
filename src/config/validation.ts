/**
 * Configuration validation beyond the schema: image names and risky settings
 */

import { parseImageReference, resolveImageReference } from '../lib/image-reference';
import type { DockshipConfig } from './types';

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export function validateConfig(config: DockshipConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const image = resolveImageReference(config.image.repository, config.image.tag, config.registry.address);
  if (!image.ok) {
    errors.push({ path: 'image', message: image.error });
  }

  for (const [index, tag] of config.image.additionalTags.entries()) {
    const parsed = parseImageReference(`${config.image.repository}:${tag}`);
    if (!parsed.ok) {
      errors.push({ path: `image.additionalTags.${index}`, message: parsed.error });
    } else if (tag === config.image.tag) {
      warnings.push({ path: `image.additionalTags.${index}`, message: `Duplicates the primary tag ${tag}` });
    }
  }

  const { readiness, healthCheck } = config.deploy;
  if (readiness.strategy === 'delay') {
    warnings.push({
      path: 'deploy.readiness.strategy',
      message: 'A fixed delay can recreate the service before the registry serves the new image; prefer "registry"',
    });
  }
  if (readiness.strategy === 'registry' && readiness.timeoutMs < readiness.pollIntervalMs) {
    warnings.push({
      path: 'deploy.readiness.timeoutMs',
      message: 'Timeout is shorter than the poll interval; the registry is checked only once',
    });
  }

  if (healthCheck.enabled && healthCheck.port === undefined) {
    warnings.push({
      path: 'deploy.healthCheck.port',
      message: 'No port set; the first published port of the deployed service is used',
    });
  }

  if (config.trigger.events.length === 0 || config.trigger.branches.length === 0) {
    warnings.push({ path: 'trigger', message: 'Trigger filter matches no event; "run" will always skip' });
  }

  return { isValid: errors.length === 0, errors, warnings };
}
