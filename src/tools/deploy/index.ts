/**
 * Deploy tool exports.
 */

export { deployImage } from './tool';
export { deployImageSchema, type DeployImageParams } from './schema';
export { buildComposeCommands, loginCommand, mkdirCommand, remoteUploadPath, type RemoteCommandPlan } from './commands';
