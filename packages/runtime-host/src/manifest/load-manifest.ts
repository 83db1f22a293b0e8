/**
 * Loadout Runtime Host — Manifest Loader
 *
 * Reads the artifact manifest (YAML; JSON is valid YAML) and builds the
 * catalog. A missing manifest is a degraded mode, not an error: the catalog
 * is empty and a warning says where the manifest was expected. Every other
 * problem is a ManifestError.
 */

import { readFile } from 'node:fs/promises';
import { load } from 'js-yaml';
import { AcquisitionLogger, ArtifactCatalog, ManifestError } from '@loadout/core';
import { isNodeError } from '../util/node-error.js';

/**
 * @throws {ManifestError} If the file cannot be read or parsed, or fails validation
 */
export async function loadManifest(
  manifestPath: string,
  logger: AcquisitionLogger = new AcquisitionLogger(),
): Promise<ArtifactCatalog> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      logger.warn('manifest.missing', `No manifest at ${manifestPath}; the catalog is empty`, {
        path: manifestPath,
      });
      return ArtifactCatalog.empty();
    }
    throw new ManifestError('Cannot read artifact manifest', { manifestPath, cause: err });
  }

  let document: unknown;
  try {
    document = load(raw, { filename: manifestPath });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestError(`Cannot parse artifact manifest: ${reason}`, { manifestPath, cause: err });
  }

  const catalog = ArtifactCatalog.fromDocument(document, manifestPath);
  logger.info('manifest.loaded', `Loaded ${catalog.size} artifact(s) from ${manifestPath}`, {
    path: manifestPath,
    count: catalog.size,
  });
  return catalog;
}
