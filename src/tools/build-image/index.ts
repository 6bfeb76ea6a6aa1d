/**
 * Build image tool exports.
 */

export { buildImage, type BuildImageResult } from './tool';
export { buildImageSchema, type BuildImageParams } from './schema';
