/**
 * Pipeline stage outcomes
 */

import type { ErrorCode } from '../../lib/errors';

export type StageOutcome<T> =
  | { status: 'succeeded'; durationMs: number; value: T }
  | { status: 'failed'; durationMs: number; error: string; code?: ErrorCode }
  | { status: 'skipped'; reason: string };

export interface PublishedImage {
  /** Fully formatted primary reference, e.g. `acme/app:latest` */
  image: string;
  imageId: string;
  /** Manifest digest, when the daemon reported one */
  digest?: string;
  pushedTags: string[];
}

export interface DeploymentSummary {
  host: string;
  remotePath: string;
  commands: string[];
  healthChecked: string[];
}

export interface PipelineReport {
  status: 'succeeded' | 'failed';
  stages: {
    build: StageOutcome<PublishedImage>;
    deploy: StageOutcome<DeploymentSummary>;
  };
}
