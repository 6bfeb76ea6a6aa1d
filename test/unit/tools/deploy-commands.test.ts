import { describe, it, expect } from '@jest/globals';
import { buildComposeCommands, loginCommand, mkdirCommand, remoteUploadPath } from '../../../src/tools/deploy';

describe('remote command plan', () => {
  it('should tear down with --rmi all then recreate, from the home directory', () => {
    expect(buildComposeCommands({ directory: '.', composeFile: 'docker-compose.yml', removeImages: true })).toEqual([
      'docker compose -f docker-compose.yml down --rmi all',
      'docker compose -f docker-compose.yml up -d',
    ]);
  });

  it('should keep images when asked and change into the remote directory', () => {
    expect(buildComposeCommands({ directory: '/srv/my app', composeFile: 'compose.yml', removeImages: false })).toEqual([
      "cd '/srv/my app' && docker compose -f compose.yml down",
      "cd '/srv/my app' && docker compose -f compose.yml up -d",
    ]);
  });

  it('should create only non-home directories', () => {
    expect(mkdirCommand('.')).toBeUndefined();
    expect(mkdirCommand('~')).toBeUndefined();
    expect(mkdirCommand('~/apps/web')).toBe('mkdir -p ~/apps/web');
  });

  it('should map the upload path for SFTP', () => {
    expect(remoteUploadPath('.', 'docker-compose.yml')).toBe('docker-compose.yml');
    expect(remoteUploadPath('~/apps/web', 'docker-compose.yml')).toBe('apps/web/docker-compose.yml');
    expect(remoteUploadPath('/srv/web/', 'docker-compose.yml')).toBe('/srv/web/docker-compose.yml');
  });

  it('should omit the server for Docker Hub logins', () => {
    expect(loginCommand('docker.io', 'test-user')).toBe('docker login --username test-user --password-stdin');
    expect(loginCommand('ghcr.io', 'test-user')).toBe('docker login ghcr.io --username test-user --password-stdin');
  });
});
