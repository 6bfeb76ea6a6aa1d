import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  applyEnvironmentOverrides,
  getConfigurationSummary,
  loadConfig,
  parseConfig,
} from '../../../src/config';
import { ConfigurationError } from '../../../src/lib/errors';

describe('Configuration Module', () => {
  describe('parseConfig', () => {
    it('should fill in every default', () => {
      const config = parseConfig({ image: { repository: 'acme/web' } });

      expect(config.image).toEqual({ repository: 'acme/web', tag: 'latest', additionalTags: [] });
      expect(config.build).toEqual({ context: '.', dockerfile: 'Dockerfile', buildArgs: {} });
      expect(config.registry.address).toBe('docker.io');
      expect(config.remote).toEqual({ port: 22, directory: '.', readyTimeoutMs: 20000 });
      expect(config.deploy.composeFile).toBe('docker-compose.yml');
      expect(config.deploy.removeImages).toBe(true);
      expect(config.deploy.readiness).toEqual({
        strategy: 'registry',
        delayMs: 60000,
        pollIntervalMs: 5000,
        timeoutMs: 300000,
      });
      expect(config.deploy.healthCheck.enabled).toBe(false);
      expect(config.deploy.healthCheck.paths).toEqual(['/', '/status']);
      expect(config.trigger).toEqual({ events: ['push', 'pull_request'], branches: ['main'], paths: [] });
      expect(config.logging).toEqual({});
    });

    it('should require an image repository', () => {
      expect(() => parseConfig({})).toThrow('Invalid configuration: image: Required');
    });

    it('should reject unknown keys', () => {
      expect(() => parseConfig({ image: { repository: 'acme/web' }, deploy: { rollback: true } })).toThrow(ConfigurationError);
    });
  });

  describe('applyEnvironmentOverrides', () => {
    it('should override image, socket, remote directory, readiness and log level', () => {
      const warnings: string[] = [];
      const raw = applyEnvironmentOverrides(
        { image: { repository: 'acme/web', tag: 'v1' }, deploy: { composeFile: 'compose.yml' } },
        {
          DOCKSHIP_TAG: 'v2',
          DOCKER_SOCKET: '/run/docker.sock',
          DOCKSHIP_REMOTE_DIR: '/srv/web',
          DOCKSHIP_READINESS: 'delay',
          DOCKSHIP_DELAY_MS: '1500',
          LOG_LEVEL: 'debug',
        },
        warnings,
      );
      const config = parseConfig(raw);

      expect(config.image.tag).toBe('v2');
      expect(config.docker.socketPath).toBe('/run/docker.sock');
      expect(config.remote.directory).toBe('/srv/web');
      expect(config.deploy.composeFile).toBe('compose.yml');
      expect(config.deploy.readiness.strategy).toBe('delay');
      expect(config.deploy.readiness.delayMs).toBe(1500);
      expect(config.logging.level).toBe('debug');
      expect(warnings).toEqual([]);
    });

    it('should warn and keep the configured value for unparseable integers', () => {
      const warnings: string[] = [];
      const raw = applyEnvironmentOverrides(
        { image: { repository: 'acme/web' }, deploy: { readiness: { delayMs: 2000 } } },
        { DOCKSHIP_DELAY_MS: 'soon' },
        warnings,
      );

      expect(parseConfig(raw).deploy.readiness.delayMs).toBe(2000);
      expect(warnings).toEqual(['Invalid DOCKSHIP_DELAY_MS: soon. Using configured value']);
    });
  });

  describe('loadConfig', () => {
    let workspace: string;

    beforeEach(async () => {
      workspace = await mkdtemp(join(tmpdir(), 'dockship-config-'));
    });

    afterEach(async () => {
      await rm(workspace, { recursive: true, force: true });
    });

    it('should read dockship.yml from the workspace', async () => {
      await writeFile(join(workspace, 'dockship.yml'), 'image:\n  repository: acme/web\n  tag: "2.0"\nremote:\n  directory: ~/web\n');

      const loaded = loadConfig({ workspace, env: {} });

      expect(loaded.source).toBe(join(workspace, 'dockship.yml'));
      expect(loaded.config.image.tag).toBe('2.0');
      expect(loaded.config.remote.directory).toBe('~/web');
    });

    it('should work from the environment alone', () => {
      const loaded = loadConfig({ workspace, env: { DOCKSHIP_IMAGE: 'acme/api' } });

      expect(loaded.source).toBeUndefined();
      expect(loaded.config.image.repository).toBe('acme/api');
    });

    it('should fail for a missing explicit file', () => {
      expect(() => loadConfig({ workspace, file: 'other.yml', env: {} })).toThrow(
        `Config file not found: ${join(workspace, 'other.yml')}`,
      );
    });

    it('should reject a file that is not a mapping', async () => {
      await writeFile(join(workspace, 'dockship.yml'), '- one\n- two\n');
      expect(() => loadConfig({ workspace, env: {} })).toThrow(ConfigurationError);
    });
  });

  describe('getConfigurationSummary', () => {
    it('should summarise without secrets', () => {
      expect(getConfigurationSummary(parseConfig({ image: { repository: 'acme/web' } }))).toEqual({
        image: 'acme/web:latest',
        registry: 'docker.io',
        composeFile: 'docker-compose.yml',
        remoteDirectory: '.',
        readiness: 'registry',
        healthCheck: false,
      });
    });
  });
});
