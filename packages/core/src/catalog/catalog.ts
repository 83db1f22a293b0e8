/**
 * Loadout Core — Artifact Catalog
 *
 * The read-only set of artifacts a deployment requires, keyed by name.
 * Built once from a validated manifest document; never mutated afterwards,
 * so it can be shared freely between concurrent acquisitions.
 */

import { ManifestError } from '../errors.js';
import type { ArtifactDescriptor } from '../types/artifact.js';
import { relativeArtifactPath } from './locator.js';
import { ManifestValidator } from './manifest.js';

export class ArtifactCatalog {
  private readonly byName: ReadonlyMap<string, ArtifactDescriptor>;

  /**
   * @param descriptors - Already validated descriptors with unique names and paths
   * @throws {ManifestError} If two descriptors share a name or a final path
   */
  constructor(descriptors: ReadonlyArray<ArtifactDescriptor>) {
    const byName = new Map<string, ArtifactDescriptor>();
    const nameByPath = new Map<string, string>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.name)) {
        throw new ManifestError(`Duplicate artifact name '${descriptor.name}'`);
      }
      const storedAt = relativeArtifactPath(descriptor);
      const other = nameByPath.get(storedAt);
      if (other !== undefined) {
        throw new ManifestError(`Artifacts '${other}' and '${descriptor.name}' both resolve to '${storedAt}'`);
      }
      byName.set(descriptor.name, descriptor);
      nameByPath.set(storedAt, descriptor.name);
    }
    this.byName = byName;
  }

  /**
   * Build a catalog from a parsed manifest document.
   *
   * @param document - Parsed YAML/JSON value
   * @param manifestPath - Where the document came from, for error messages
   * @throws {ManifestError} If the document fails validation
   */
  static fromDocument(document: unknown, manifestPath?: string): ArtifactCatalog {
    const result = new ManifestValidator().validateDocument(document);
    if (!result.ok) {
      throw new ManifestError('Invalid artifact manifest', {
        manifestPath,
        issues: result.errors,
      });
    }
    return new ArtifactCatalog(result.value);
  }

  /** The degraded catalog used when no manifest exists. */
  static empty(): ArtifactCatalog {
    return new ArtifactCatalog([]);
  }

  get size(): number {
    return this.byName.size;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** The descriptor for `name`, or undefined when it is not in the catalog. */
  describe(name: string): ArtifactDescriptor | undefined {
    return this.byName.get(name);
  }

  /** All descriptors in manifest order. */
  list(): ReadonlyArray<ArtifactDescriptor> {
    return [...this.byName.values()];
  }

  names(): ReadonlyArray<string> {
    return [...this.byName.keys()];
  }
}
