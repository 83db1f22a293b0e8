/**
 * Loadout Core — Storage Locator
 *
 * Maps an artifact descriptor to its absolute destination under the install
 * root:
 *
 *   destination set   → <installRoot>/<destination>/<filename>
 *   known kind        → <installRoot>/<KIND_DIRECTORIES[kind]>/<filename>
 *   unknown kind      → <installRoot>/models/<filename>
 *
 * Pure: no I/O, never creates directories. Callers create the parent
 * directory lazily, right before the first write.
 */

import { join, resolve } from 'node:path';
import type { ArtifactDescriptor } from '../types/artifact.js';

/** Suffix of the staging file holding an in-progress or interrupted transfer. */
export const STAGING_SUFFIX = '.part';

/** Directory used for kinds with no entry in KIND_DIRECTORIES. */
export const DEFAULT_KIND_DIRECTORY = 'models';

/**
 * Kind → directory convention, relative to the install root.
 */
export const KIND_DIRECTORIES: Readonly<Record<string, string>> = {
  'speech-model': 'models/speech',
  'lipsync-model': 'models/lipsync',
  xtts: 'models/xtts',
  latentsync: 'models/latentsync',
  checkpoint: 'models/checkpoints',
  vae: 'models/vae',
  lora: 'models/loras',
  controlnet: 'models/controlnet',
  upscale: 'models/upscale_models',
  embedding: 'models/embeddings',
};

/** Directory (relative to the install root) an artifact is stored in. */
export function artifactDirectory(descriptor: ArtifactDescriptor): string {
  if (descriptor.destination !== undefined && descriptor.destination !== '') {
    return descriptor.destination;
  }
  return KIND_DIRECTORIES[descriptor.kind] ?? DEFAULT_KIND_DIRECTORY;
}

/** Final path of an artifact relative to the install root. */
export function relativeArtifactPath(descriptor: ArtifactDescriptor): string {
  return join(artifactDirectory(descriptor), descriptor.filename);
}

/**
 * Resolve the absolute final path of an artifact.
 *
 * @param installRoot - Install root; resolved against the cwd when relative
 */
export function resolveArtifactPath(descriptor: ArtifactDescriptor, installRoot: string): string {
  return join(resolve(installRoot), relativeArtifactPath(descriptor));
}

/** The staging path for a final path. */
export function stagingPathFor(finalPath: string): string {
  return finalPath + STAGING_SUFFIX;
}
