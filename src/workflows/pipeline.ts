/**
 * Two-stage pipeline: build-and-publish, then deploy.
 * The deploy stage runs only after the build stage succeeded.
 */

import type { DockshipConfig } from '../config/types';
import type {
  DeploymentSummary,
  PipelineReport,
  PublishedImage,
  RegistryCredentials,
  Result,
  SecretSet,
  SshCredentials,
  StageOutcome,
} from '../domain/types';
import { Success } from '../domain/types';
import { formatImageReference, resolveImageReference } from '../lib/image-reference';
import { buildImage } from '../tools/build-image';
import { deployImage } from '../tools/deploy';
import { pushImage } from '../tools/push-image';
import type { ToolContext } from '../tools/types';

function toOutcome<T>(result: Result<T>, durationMs: number): StageOutcome<T> {
  if (result.ok) return { status: 'succeeded', durationMs, value: result.value };
  return result.code
    ? { status: 'failed', durationMs, error: result.error, code: result.code }
    : { status: 'failed', durationMs, error: result.error };
}

async function timed<T>(context: ToolContext, run: () => Promise<Result<T>>): Promise<StageOutcome<T>> {
  const started = context.now();
  const result = await run();
  return toOutcome(result, context.now() - started);
}

/**
 * Stage 1: build the image, log in, push every tag
 */
export function runBuildStage(
  config: DockshipConfig,
  credentials: RegistryCredentials,
  context: ToolContext,
): Promise<StageOutcome<PublishedImage>> {
  return timed<PublishedImage>(context, async () => {
    const ref = resolveImageReference(config.image.repository, config.image.tag, config.registry.address);
    if (!ref.ok) return ref;
    const image = formatImageReference(ref.value);

    const built = await buildImage(
      {
        context: config.build.context,
        dockerfile: config.build.dockerfile,
        image,
        additionalTags: config.image.additionalTags,
        buildArgs: config.build.buildArgs,
        ...(config.build.platform ? { platform: config.build.platform } : {}),
      },
      context,
    );
    if (!built.ok) return built;

    const pushed = await pushImage(
      {
        image,
        additionalTags: config.image.additionalTags,
        registry: config.registry.address,
        credentials,
      },
      context,
    );
    if (!pushed.ok) return pushed;

    const published: PublishedImage = {
      image,
      imageId: built.value.imageId,
      pushedTags: pushed.value.pushedTags,
    };
    if (pushed.value.digest) published.digest = pushed.value.digest;
    return Success(published);
  });
}

/**
 * Stage 2: copy the descriptor and recreate the service on the remote host
 */
export function runDeployStage(
  config: DockshipConfig,
  ssh: SshCredentials,
  registryCredentials: RegistryCredentials | undefined,
  published: { image?: string; digest?: string },
  context: ToolContext,
): Promise<StageOutcome<DeploymentSummary>> {
  return timed<DeploymentSummary>(context, async () => {
    let image = published.image;
    if (image === undefined) {
      const ref = resolveImageReference(config.image.repository, config.image.tag, config.registry.address);
      if (!ref.ok) return ref;
      image = formatImageReference(ref.value);
    }

    const { deploy, remote } = config;
    return deployImage(
      {
        image,
        registry: config.registry.address,
        composeFile: deploy.composeFile,
        remoteDirectory: remote.directory,
        removeImages: deploy.removeImages,
        registryLogin: deploy.registryLogin,
        readiness: deploy.readiness,
        healthCheck: deploy.healthCheck,
        ssh: {
          host: ssh.host,
          port: ssh.port ?? remote.port,
          username: ssh.username,
          privateKey: ssh.privateKey,
          readyTimeoutMs: remote.readyTimeoutMs,
        },
        ...(deploy.service ? { service: deploy.service } : {}),
        ...(published.digest ? { digest: published.digest } : {}),
        ...(registryCredentials ? { registryCredentials } : {}),
      },
      context,
    );
  });
}

export async function runPipeline(
  config: DockshipConfig,
  secrets: SecretSet,
  context: ToolContext,
): Promise<PipelineReport> {
  const { logger } = context;

  logger.info({ image: `${config.image.repository}:${config.image.tag}` }, 'Starting build stage');
  const build = await runBuildStage(config, secrets.registry, context);

  if (build.status !== 'succeeded') {
    logger.error({ stage: 'build', outcome: build }, 'Build stage did not succeed; deploy skipped');
    return {
      status: 'failed',
      stages: { build, deploy: { status: 'skipped', reason: 'build stage did not succeed' } },
    };
  }

  logger.info({ image: build.value.image, digest: build.value.digest }, 'Starting deploy stage');
  const deploy = await runDeployStage(config, secrets.ssh, secrets.registry, build.value, context);

  return {
    status: deploy.status === 'succeeded' ? 'succeeded' : 'failed',
    stages: { build, deploy },
  };
}
