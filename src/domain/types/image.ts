/**
 * Container image reference as stored in a registry.
 */
export interface ImageReference {
  /** Registry host, absent for Docker Hub short names */
  registry?: string;
  /** Repository path, e.g. `acme/flask-app` */
  repository: string;
  /** Tag; pushes to the same tag overwrite the previous image */
  tag: string;
}

export const DEFAULT_TAG = 'latest';
