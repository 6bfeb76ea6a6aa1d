/**
 * Generate tool exports.
 */

export { generateFiles, writeGeneratedFiles, type GeneratedFile, type GenerateFilesResult } from './tool';
export { generateComposeDescriptor, generateDockerfile, generateWorkflow, type WorkflowOptions } from './templates';
export { generateFilesSchema, appOptionsSchema, type AppOptions, type GenerateFilesParams } from './schema';
