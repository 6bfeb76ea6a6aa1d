/**
 * Push image tool exports.
 * Co-locates tool implementation with its schema definition.
 */

export { pushImage, authServerAddress, type PushImageResult } from './tool';
export { pushImageSchema, type PushImageParams } from './schema';
