/**
 * Configuration - public surface
 */

export { loadConfig, parseConfig, applyEnvironmentOverrides, getConfigurationSummary } from './config';
export type { LoadConfigOptions, LoadedConfig } from './config';
export { validateConfig, type ValidationIssue, type ValidationResult } from './validation';
export { configSchema, readinessSchema, healthCheckSchema, type ReadinessConfig, type HealthCheckConfig, type DockshipConfig, type DockshipConfigInput, type ReadinessStrategy, type LogLevel } from './types';
export * from './defaults';
