/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for default values used throughout dockship.
 */

export const DEFAULT_CONFIG_FILE = 'dockship.yml';

export const DEFAULT_IMAGE = {
  tag: 'latest',
} as const;

export const DEFAULT_BUILD = {
  context: '.',
  dockerfile: 'Dockerfile',
} as const;

export const DEFAULT_REGISTRY = {
  address: 'docker.io',
} as const;

export const DEFAULT_REMOTE = {
  port: 22,
  /** Relative to the login user's home directory */
  directory: '.',
  readyTimeoutMs: 20000,
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  fixedDelay: 60000, // 1 minute, the original fixed wait
  registryPoll: 5000, // 5 seconds between registry checks
  registryWait: 300000, // 5 minutes
  healthInterval: 3000,
  healthRequest: 5000,
} as const;

export const DEFAULT_DEPLOY = {
  composeFile: 'docker-compose.yml',
  readinessStrategy: 'registry',
  removeImages: true,
  registryLogin: false,
} as const;

export const DEFAULT_HEALTH_CHECK = {
  enabled: false,
  paths: ['/', '/status'],
  scheme: 'http',
  attempts: 5,
} as const;

export const DEFAULT_TRIGGER = {
  events: ['push', 'pull_request'],
  branches: ['main'],
} as const;

/**
 * Generated Dockerfile defaults for a Flask-style application
 */
export const DEFAULT_APP = {
  baseImage: 'python:3.11-slim',
  workdir: '/app',
  requirementsFile: 'requirements.txt',
  port: 5000,
  command: ['python', 'app.py'],
  serviceName: 'web',
  restart: 'always',
} as const;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
