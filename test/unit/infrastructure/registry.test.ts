import { describe, it, expect, jest } from '@jest/globals';
import pino from 'pino';
import {
  createDockerRegistryClient,
  parseAuthChallenge,
  registryBaseUrl,
  registryRepositoryPath,
  waitForImage,
  type RegistryClient,
} from '../../../src/infrastructure/docker/registry';
import type { HttpFetch, HttpRequestInit, HttpResponse } from '../../../src/infrastructure/http/fetch';
import { ErrorCodes } from '../../../src/lib/errors';
import type { Result } from '../../../src/domain/types';

const logger = pino({ level: 'silent' });

function response(status: number, headers: Record<string, string> = {}, body: unknown = {}): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    json: async () => body,
  };
}

describe('registry client', () => {
  describe('helpers', () => {
    it('should parse bearer challenges', () => {
      expect(
        parseAuthChallenge('Bearer realm="https://auth.docker.io/token",service="registry.docker.io",scope="repository:acme/web:pull"'),
      ).toEqual({
        scheme: 'bearer',
        params: { realm: 'https://auth.docker.io/token', service: 'registry.docker.io', scope: 'repository:acme/web:pull' },
      });
      expect(parseAuthChallenge(null)).toBeUndefined();
    });

    it('should map references to registry URLs and paths', () => {
      expect(registryBaseUrl({ repository: 'acme/web', tag: 'latest' })).toBe('https://registry-1.docker.io');
      expect(registryBaseUrl({ registry: 'localhost:5000', repository: 'web', tag: 'latest' })).toBe('http://localhost:5000');
      expect(registryBaseUrl({ registry: 'ghcr.io', repository: 'acme/web', tag: 'latest' })).toBe('https://ghcr.io');
      expect(registryRepositoryPath({ repository: 'nginx', tag: 'latest' })).toBe('library/nginx');
      expect(registryRepositoryPath({ registry: 'ghcr.io', repository: 'web', tag: 'latest' })).toBe('web');
    });
  });

  describe('getManifestDigest', () => {
    it('should follow a bearer challenge and read the digest header', async () => {
      const calls: Array<{ url: string; init: HttpRequestInit | undefined }> = [];
      const fetchImpl: HttpFetch = async (url, init) => {
        calls.push({ url, init });
        if (url.startsWith('https://auth.docker.io')) return response(200, {}, { token: 'test-token' });
        if (init?.headers?.Authorization === 'Bearer test-token') {
          return response(200, { 'docker-content-digest': 'sha256:abc' });
        }
        return response(401, {
          'www-authenticate': 'Bearer realm="https://auth.docker.io/token",service="registry.docker.io",scope="repository:acme/web:pull"',
        });
      };

      const client = createDockerRegistryClient(logger, fetchImpl);
      const result = await client.getManifestDigest(
        { repository: 'acme/web', tag: 'latest' },
        { username: 'test-user', password: 'test-secret' },
      );

      expect(result).toEqual({ ok: true, value: 'sha256:abc' });
      expect(calls.map((call) => call.url)).toEqual([
        'https://registry-1.docker.io/v2/acme/web/manifests/latest',
        'https://auth.docker.io/token?service=registry.docker.io&scope=repository%3Aacme%2Fweb%3Apull',
        'https://registry-1.docker.io/v2/acme/web/manifests/latest',
      ]);
      expect(calls[1]?.init?.headers?.Authorization).toBe(
        `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`,
      );
      expect(calls[0]?.init?.method).toBe('HEAD');
    });

    it('should report a missing tag as null', async () => {
      const client = createDockerRegistryClient(logger, async () => response(404));
      expect(await client.getManifestDigest({ registry: 'ghcr.io', repository: 'acme/web', tag: 'v9' })).toEqual({
        ok: true,
        value: null,
      });
    });

    it('should fail on other HTTP errors and thrown requests', async () => {
      const failing = createDockerRegistryClient(logger, async () => response(500));
      expect(await failing.getManifestDigest({ registry: 'ghcr.io', repository: 'acme/web', tag: 'v1' })).toEqual({
        ok: false,
        error: 'Registry returned HTTP 500 for ghcr.io/acme/web:v1',
      });

      const throwing = createDockerRegistryClient(logger, async () => {
        throw new Error('ECONNREFUSED');
      });
      expect(await throwing.getManifestDigest({ registry: 'ghcr.io', repository: 'acme/web', tag: 'v1' })).toEqual({
        ok: false,
        error: 'Registry request failed: ECONNREFUSED',
      });
    });
  });

  describe('waitForImage', () => {
    const ref = { repository: 'acme/web', tag: 'latest' };

    function sequence(...results: Array<Result<string | null>>): RegistryClient {
      const getManifestDigest = jest.fn<RegistryClient['getManifestDigest']>();
      for (const result of results) getManifestDigest.mockResolvedValueOnce(result);
      return { getManifestDigest };
    }

    it('should wait until the expected digest is served', async () => {
      const client = sequence(
        { ok: true, value: null },
        { ok: true, value: 'sha256:old' },
        { ok: true, value: 'sha256:new' },
      );
      const sleep = jest.fn(async (_ms: number) => undefined);

      const result = await waitForImage(
        client,
        ref,
        { expectedDigest: 'sha256:new', pollIntervalMs: 5000, timeoutMs: 300000, sleep },
        logger,
      );

      expect(result).toEqual({ ok: true, value: { digest: 'sha256:new', attempts: 3 } });
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('should accept any digest when none is expected', async () => {
      const result = await waitForImage(
        sequence({ ok: true, value: 'sha256:any' }),
        ref,
        { pollIntervalMs: 5000, timeoutMs: 300000 },
        logger,
      );
      expect(result).toEqual({ ok: true, value: { digest: 'sha256:any', attempts: 1 } });
    });

    it('should time out with READINESS_TIMEOUT', async () => {
      let time = 0;
      const client: RegistryClient = { getManifestDigest: async () => ({ ok: true, value: null }) };

      const result = await waitForImage(
        client,
        ref,
        {
          pollIntervalMs: 5000,
          timeoutMs: 10000,
          now: () => time,
          sleep: async (ms) => {
            time += ms;
          },
        },
        logger,
      );

      expect(result).toEqual({
        ok: false,
        error: 'Timed out after 10000ms waiting for acme/web:latest: acme/web:latest not found in registry',
        code: ErrorCodes.READINESS_TIMEOUT,
      });
    });
  });
});
