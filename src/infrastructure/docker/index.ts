/**
 * Docker infrastructure - Engine and registry clients
 */

export {
  type DockerClient,
  createDockerClient,
  type DockerBuildOptions,
  type DockerBuildResult,
  type DockerPushResult,
  type DockerClientOptions,
  type RegistryAuth,
} from './client';
export { packBuildContext, loadDockerIgnore } from './build-context';
export {
  createDockerRegistryClient,
  waitForImage,
  parseAuthChallenge,
  type RegistryClient,
  type WaitForImageOptions,
} from './registry';
