import { describe, it, expect } from '@jest/globals';
import { buildImage } from '../../../src/tools/build-image';
import { ErrorCodes } from '../../../src/lib/errors';
import { createFakeDocker, silentLogger } from '../../helpers/fakes';

describe('buildImage', () => {
  it('should build from the resolved context and apply extra tags', async () => {
    const docker = createFakeDocker();

    const result = await buildImage(
      { context: 'app', dockerfile: 'Dockerfile', image: 'acme/web:latest', additionalTags: ['v1'], buildArgs: { A: '1' } },
      { logger: silentLogger, docker, workspace: '/work' },
    );

    expect(result).toEqual({
      ok: true,
      value: {
        imageId: 'sha256:built',
        image: 'acme/web:latest',
        tags: ['acme/web:latest', 'acme/web:v1'],
        logs: ['Successfully built'],
      },
    });
    expect(docker.buildImage).toHaveBeenCalledWith({
      context: '/work/app',
      dockerfile: 'Dockerfile',
      tag: 'acme/web:latest',
      buildargs: { A: '1' },
    });
    expect(docker.tagImage).toHaveBeenCalledWith('sha256:built', 'acme/web', 'v1');
  });

  it('should keep the registry in the repository it tags', async () => {
    const docker = createFakeDocker();

    await buildImage(
      { context: '.', dockerfile: 'Dockerfile', image: 'ghcr.io/acme/web:2', additionalTags: ['latest'], platform: 'linux/amd64' },
      { logger: silentLogger, docker, workspace: '/work' },
    );

    expect(docker.buildImage).toHaveBeenCalledWith(expect.objectContaining({ context: '/work', platform: 'linux/amd64' }));
    expect(docker.tagImage).toHaveBeenCalledWith('sha256:built', 'ghcr.io/acme/web', 'latest');
  });

  it('should stop when the build fails', async () => {
    const docker = createFakeDocker();
    docker.buildImage.mockResolvedValueOnce({ ok: false, error: 'Build failed: pip exited 1', code: ErrorCodes.DOCKER_BUILD_FAILED });

    const result = await buildImage(
      { context: '.', dockerfile: 'Dockerfile', image: 'acme/web:latest', additionalTags: ['v1'] },
      { logger: silentLogger, docker, workspace: '/work' },
    );

    expect(result).toEqual({ ok: false, error: 'Build failed: pip exited 1', code: ErrorCodes.DOCKER_BUILD_FAILED });
    expect(docker.tagImage).not.toHaveBeenCalled();
  });

  it('should reject an invalid image reference before building', async () => {
    const docker = createFakeDocker();

    const result = await buildImage(
      { context: '.', dockerfile: 'Dockerfile', image: 'acme/web@sha256:abc' },
      { logger: silentLogger, docker, workspace: '/work' },
    );

    expect(result.ok).toBe(false);
    expect(docker.buildImage).not.toHaveBeenCalled();
  });
});
