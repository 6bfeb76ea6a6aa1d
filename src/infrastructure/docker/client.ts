/**
 * Docker client for image build, tag, registry login and push
 */

import Docker from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { ErrorCodes, errorMessage } from '../../lib/errors';
import { packBuildContext } from './build-context';

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  /** Path to Dockerfile relative to context */
  dockerfile: string;
  /** Full reference to tag the built image with, e.g. `acme/app:latest` */
  tag: string;
  /** Build-time variables (Docker ARG values) */
  buildargs?: Record<string, string>;
  /** Target platform, e.g. 'linux/amd64' */
  platform?: string;
}

/**
 * Result of a Docker image build operation.
 */
export interface DockerBuildResult {
  imageId: string;
  /** Build output lines */
  logs: string[];
}

/**
 * Result of pushing a Docker image to a registry.
 */
export interface DockerPushResult {
  /** Manifest digest reported by the daemon, when it reported one */
  digest?: string;
  size?: number;
}

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

/**
 * Docker client interface for the publish stage.
 */
export interface DockerClient {
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult>>;
  tagImage: (imageId: string, repository: string, tag: string) => Promise<Result<void>>;
  /** Verify registry credentials with the daemon */
  checkAuth: (auth: RegistryAuth) => Promise<Result<void>>;
  pushImage: (repository: string, tag: string, auth?: RegistryAuth) => Promise<Result<DockerPushResult>>;
}

export interface DockerClientOptions {
  socketPath?: string;
}

interface DockerProgressEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { ID?: string; Digest?: string; Size?: number };
}

function followProgress(
  docker: Docker,
  stream: NodeJS.ReadableStream,
  onEvent: (event: DockerProgressEvent) => void,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    docker.modem.followProgress(
      stream,
      (err: Error | null) => (err ? reject(err) : resolve()),
      onEvent,
    );
  });
}

/**
 * Create a Docker client backed by the Engine API
 */
export const createDockerClient = (logger: Logger, options: DockerClientOptions = {}): DockerClient => {
  const docker = options.socketPath ? new Docker({ socketPath: options.socketPath }) : new Docker();

  return {
    async buildImage(build: DockerBuildOptions): Promise<Result<DockerBuildResult>> {
      try {
        logger.debug({ context: build.context, dockerfile: build.dockerfile, tag: build.tag }, 'Starting Docker build');

        const contextStream = await packBuildContext(build.context, build.dockerfile);
        const stream = await docker.buildImage(contextStream, {
          t: build.tag,
          dockerfile: build.dockerfile,
          ...(build.buildargs ? { buildargs: build.buildargs } : {}),
          ...(build.platform ? { platform: build.platform } : {}),
        });

        const logs: string[] = [];
        let imageId = '';
        let buildError: string | undefined;

        await followProgress(docker, stream, (event) => {
          if (event.stream) {
            const line = event.stream.trimEnd();
            if (line) logs.push(line);
          }
          if (event.aux?.ID) imageId = event.aux.ID;
          if (event.error) buildError = event.errorDetail?.message ?? event.error;
          logger.debug(event, 'Docker build progress');
        });

        if (buildError) {
          logger.error({ error: buildError, tag: build.tag }, 'Docker build failed');
          return Failure(`Build failed: ${buildError}`, ErrorCodes.DOCKER_BUILD_FAILED);
        }

        if (!imageId) {
          const inspect = await docker.getImage(build.tag).inspect();
          imageId = inspect.Id;
        }

        logger.debug({ imageId, tag: build.tag }, 'Docker build completed successfully');
        return Success({ imageId, logs });
      } catch (error) {
        const message = `Build failed: ${errorMessage(error)}`;
        logger.error({ error: message, tag: build.tag }, 'Docker build failed');
        return Failure(message, ErrorCodes.DOCKER_BUILD_FAILED);
      }
    },

    async tagImage(imageId: string, repository: string, tag: string): Promise<Result<void>> {
      try {
        await docker.getImage(imageId).tag({ repo: repository, tag });

        logger.info({ imageId, repository, tag }, 'Image tagged successfully');
        return Success(undefined);
      } catch (error) {
        return Failure(`Failed to tag image: ${errorMessage(error)}`, ErrorCodes.DOCKER_TAG_FAILED);
      }
    },

    async checkAuth(auth: RegistryAuth): Promise<Result<void>> {
      try {
        await docker.checkAuth(auth);
        logger.info({ registry: auth.serveraddress, username: auth.username }, 'Registry login succeeded');
        return Success(undefined);
      } catch (error) {
        return Failure(`Registry login failed: ${errorMessage(error)}`, ErrorCodes.REGISTRY_AUTH_FAILED);
      }
    },

    async pushImage(repository: string, tag: string, auth?: RegistryAuth): Promise<Result<DockerPushResult>> {
      try {
        const image = docker.getImage(`${repository}:${tag}`);
        const stream = await image.push(auth ? { tag, authconfig: auth } : { tag });

        let digest: string | undefined;
        let size: number | undefined;
        let pushError: string | undefined;

        await followProgress(docker, stream, (event) => {
          logger.debug({ status: event.status }, 'Docker push progress');
          if (event.aux?.Digest) digest = event.aux.Digest;
          if (event.aux?.Size) size = event.aux.Size;
          if (event.error) pushError = event.errorDetail?.message ?? event.error;
        });

        if (pushError) {
          return Failure(`Failed to push image: ${pushError}`, ErrorCodes.DOCKER_PUSH_FAILED);
        }

        if (!digest) {
          const inspect = await image.inspect();
          digest = inspect.RepoDigests?.find((d) => d.startsWith(`${repository}@`))?.split('@')[1];
          if (!digest) {
            logger.warn({ repository, tag }, 'Push reported no digest');
          }
        }

        logger.info({ repository, tag, digest }, 'Image pushed successfully');
        const result: DockerPushResult = {};
        if (digest) result.digest = digest;
        if (size !== undefined) result.size = size;
        return Success(result);
      } catch (error) {
        return Failure(`Failed to push image: ${errorMessage(error)}`, ErrorCodes.DOCKER_PUSH_FAILED);
      }
    },
  };
};
