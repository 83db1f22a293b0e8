/**
 * Loadout Runtime Host — Artifact Filesystem
 *
 * Implements the ArtifactFileSystem port from @loadout/core with
 * node:fs/promises.
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import type { ArtifactFileSystem } from '@loadout/core';
import { isNodeError } from '../util/node-error.js';

export class NodeArtifactFileSystem implements ArtifactFileSystem {
  async isFile(path: string): Promise<boolean> {
    return (await this.sizeOf(path)) !== null;
  }

  async sizeOf(path: string): Promise<number | null> {
    try {
      const info = await stat(path);
      return info.isFile() ? info.size : null;
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return null;
      throw err;
    }
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  async ensureDirectory(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }
}
