/**
 * Deploy Tool
 *
 * Copies the service descriptor to the remote host and recreates the service there:
 * check the descriptor against the pushed image, wait until the registry serves it,
 * upload, `down`, `up -d`, then optionally probe the application over HTTP.
 * There is no rollback: a failure after `down` leaves the service stopped.
 */

import { basename, resolve } from 'node:path';
import type { z } from 'zod';
import { Failure, Success, type DeploymentSummary, type ImageReference, type Result } from '../../domain/types';
import { waitForImage } from '../../infrastructure/docker/registry';
import { checkEndpoints } from '../../infrastructure/http/health';
import type { RemoteShell } from '../../infrastructure/ssh/client';
import {
  checkDescriptorMatchesImage,
  loadServiceDescriptor,
  publishedPort,
  serviceForImage,
} from '../../lib/compose';
import { ErrorCodes } from '../../lib/errors';
import { formatImageReference, parseImageReference } from '../../lib/image-reference';
import { createTimer, type Logger } from '../../lib/logger';
import type { ToolContext } from '../types';
import { buildComposeCommands, loginCommand, mkdirCommand, remoteUploadPath } from './commands';
import { deployImageSchema, type DeployImageParams } from './schema';

type ValidatedParams = z.output<typeof deployImageSchema>;

async function waitForReadiness(
  params: ValidatedParams,
  ref: ImageReference,
  context: ToolContext,
): Promise<Result<void>> {
  const { readiness } = params;
  const { logger } = context;

  switch (readiness.strategy) {
    case 'none':
      return Success(undefined);
    case 'delay':
      logger.info({ delayMs: readiness.delayMs }, 'Waiting fixed delay before recreating the service');
      await context.sleep(readiness.delayMs);
      return Success(undefined);
    case 'registry': {
      const ready = await waitForImage(
        context.registry,
        ref,
        {
          pollIntervalMs: readiness.pollIntervalMs,
          timeoutMs: readiness.timeoutMs,
          sleep: context.sleep,
          now: context.now,
          ...(params.digest ? { expectedDigest: params.digest } : {}),
          ...(params.registryCredentials ? { auth: params.registryCredentials } : {}),
        },
        logger,
      );
      return ready.ok ? Success(undefined) : ready;
    }
  }
}

/**
 * Run the remote sequence on an open session, stopping at the first failure
 */
async function recreateService(
  shell: RemoteShell,
  params: ValidatedParams,
  localDescriptor: string,
  logger: Logger,
): Promise<Result<{ remotePath: string; commands: string[] }>> {
  const fileName = basename(localDescriptor);
  const remotePath = remoteUploadPath(params.remoteDirectory, fileName);

  const mkdir = mkdirCommand(params.remoteDirectory);
  if (mkdir) {
    const made = await shell.exec(mkdir);
    if (!made.ok) return made;
    if (made.value.exitCode !== 0) {
      return Failure(
        `Cannot create remote directory ${params.remoteDirectory}: ${made.value.stderr}`,
        ErrorCodes.UPLOAD_FAILED,
      );
    }
  }

  const uploaded = await shell.upload(localDescriptor, remotePath);
  if (!uploaded.ok) return uploaded;

  if (params.registryLogin) {
    if (!params.registryCredentials) {
      return Failure('Remote registry login requested without registry credentials', ErrorCodes.SECRET_MISSING);
    }
    const login = await shell.exec(loginCommand(params.registry, params.registryCredentials.username), {
      stdin: params.registryCredentials.password,
    });
    if (!login.ok) return login;
    if (login.value.exitCode !== 0) {
      return Failure(`Remote registry login failed: ${login.value.stderr}`, ErrorCodes.REMOTE_COMMAND_FAILED);
    }
  }

  const commands = buildComposeCommands({
    directory: params.remoteDirectory,
    composeFile: fileName,
    removeImages: params.removeImages,
  });

  // `down` stops the containers before anything else it does can fail
  const stopped = '; the service may be left stopped';
  const executed: string[] = [];
  for (const command of commands) {
    const result = await shell.exec(command);
    if (!result.ok) return Failure(`${result.error}${stopped}`, result.code);
    executed.push(command);
    logger.info({ command, exitCode: result.value.exitCode }, 'Remote command completed');

    if (result.value.exitCode !== 0) {
      return Failure(
        `Remote command "${command}" exited with ${result.value.exitCode}: ${result.value.stderr}${stopped}`,
        ErrorCodes.REMOTE_COMMAND_FAILED,
      );
    }
  }

  return Success({ remotePath, commands: executed });
}

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

export async function deployImage(
  params: DeployImageParams,
  context: ToolContext,
): Promise<Result<DeploymentSummary>> {
  const { logger } = context;

  const validated = deployImageSchema.safeParse(params);
  if (!validated.success) {
    return Failure(`Invalid deploy parameters: ${validated.error.message}`, ErrorCodes.CONFIG_INVALID);
  }
  const data = validated.data;

  const ref = parseImageReference(data.image);
  if (!ref.ok) return ref;
  const image = formatImageReference(ref.value);

  const descriptorPath = resolve(context.workspace, data.composeFile);
  const loaded = await loadServiceDescriptor(descriptorPath);
  if (!loaded.ok) return loaded;

  const matches = checkDescriptorMatchesImage(loaded.value.descriptor, ref.value, data.service);
  if (!matches.ok) return matches;

  const timer = createTimer(logger, 'deploy', { image, host: data.ssh.host });

  const ready = await waitForReadiness(data, ref.value, context);
  if (!ready.ok) {
    timer.error(ready.error);
    return ready;
  }

  const session = await context.connect(
    {
      host: data.ssh.host,
      port: data.ssh.port,
      username: data.ssh.username,
      privateKey: data.ssh.privateKey,
      readyTimeoutMs: data.ssh.readyTimeoutMs,
    },
    logger,
  );
  if (!session.ok) {
    timer.error(session.error);
    return session;
  }

  let recreated: Result<{ remotePath: string; commands: string[] }>;
  try {
    recreated = await recreateService(session.value, data, descriptorPath, logger);
  } finally {
    session.value.close();
  }
  if (!recreated.ok) {
    timer.error(recreated.error);
    return recreated;
  }

  let healthChecked: string[] = [];
  if (data.healthCheck.enabled) {
    const service = data.service ?? serviceForImage(loaded.value.descriptor, ref.value);
    const port = data.healthCheck.port ?? (service ? publishedPort(loaded.value.descriptor, service) : undefined);
    if (port === undefined) {
      const message = 'Cannot determine the port to health check; set deploy.healthCheck.port';
      timer.error(message);
      return Failure(message, ErrorCodes.HEALTH_CHECK_FAILED);
    }

    const baseUrl = `${data.healthCheck.scheme}://${formatHost(data.ssh.host)}:${port}`;
    const healthy = await checkEndpoints(
      baseUrl,
      data.healthCheck.paths,
      {
        attempts: data.healthCheck.attempts,
        intervalMs: data.healthCheck.intervalMs,
        requestTimeoutMs: data.healthCheck.requestTimeoutMs,
        sleep: context.sleep,
      },
      context.fetch,
      logger,
    );
    if (!healthy.ok) {
      timer.error(healthy.error);
      return healthy;
    }
    healthChecked = healthy.value;
  }

  timer.end({ remotePath: recreated.value.remotePath });
  return Success({
    host: data.ssh.host,
    remotePath: recreated.value.remotePath,
    commands: recreated.value.commands,
    healthChecked,
  });
}
