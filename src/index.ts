/**
 * Main export file for library consumption
 */

export * from './domain/types';
export * from './config';
export { ErrorCodes, DockshipError, ConfigurationError, SecretError, isDockshipError, errorMessage, type ErrorCode } from './lib/errors';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
export {
  parseImageReference,
  formatImageReference,
  resolveImageReference,
  sameImage,
  sameRepository,
} from './lib/image-reference';
export {
  parseServiceDescriptor,
  loadServiceDescriptor,
  findImageMismatches,
  checkDescriptorMatchesImage,
} from './lib/compose';
export { loadRegistryCredentials, loadSshCredentials, loadSecrets, findMissingSecrets } from './lib/secrets';
export { shouldTrigger, eventFromEnvironment, type TriggerEvent, type TriggerFilter } from './lib/trigger';
export * from './infrastructure/docker';
export * from './infrastructure/ssh';
export { checkEndpoints } from './infrastructure/http/health';
export { createToolContext } from './tools/context';
export type { ToolContext } from './tools/types';
export { buildImage } from './tools/build-image';
export { pushImage } from './tools/push-image';
export { deployImage } from './tools/deploy';
export { generateFiles, generateDockerfile, generateComposeDescriptor, generateWorkflow } from './tools/generate';
export { runBuildStage, runDeployStage, runPipeline } from './workflows/pipeline';
export { runCli } from './cli/program';
