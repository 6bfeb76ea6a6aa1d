/**
 * Domain Types - Unified exports
 */

export { Success, Failure, type Result } from './result';
export { DEFAULT_TAG, type ImageReference } from './image';
export type {
  RestartPolicy,
  PortMapping,
  ServiceDefinition,
  ServiceDescriptor,
  LoadedServiceDescriptor,
  ImageMismatch,
} from './descriptor';
export {
  SECRET_NAMES,
  type SecretName,
  type RegistryCredentials,
  type SshCredentials,
  type SecretSet,
} from './secrets';
export type {
  StageOutcome,
  PublishedImage,
  DeploymentSummary,
  PipelineReport,
} from './pipeline';
