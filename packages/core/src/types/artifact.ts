/**
 * Loadout Core — Artifact Types
 *
 * Defines the artifact descriptor loaded from the manifest, the derived
 * on-disk state, and the runtime acquisition phase owned by the manager.
 *
 * Descriptors are immutable after the catalog is built. State is never
 * persisted: the filesystem is the source of truth and is re-read on every
 * status query.
 */

// ---------------------------------------------------------------------------
// Artifact Descriptor
// ---------------------------------------------------------------------------

/**
 * One binary artifact required by the execution host, as declared in the
 * manifest.
 *
 * Invariant: `name` is unique within a catalog. Duplicates are rejected at
 * load time.
 */
export interface ArtifactDescriptor {
  /** Unique key. The public handle for every acquisition operation. */
  readonly name: string;
  /** Category tag (manifest field `type`). Selects the default directory. */
  readonly kind: string;
  /** http(s) URL the artifact is fetched from. */
  readonly sourceUri: string;
  /** Leaf filename on disk. Never contains a path separator. */
  readonly filename: string;
  /** Advisory size. 0 means unknown and is never enforced. */
  readonly expectedSizeBytes: number;
  /**
   * Expected content digest as lowercase hex, or undefined when the manifest
   * declares none. Without a digest, presence on disk is treated as valid.
   */
  readonly digest?: string | undefined;
  /** Lowercase digest algorithm name (default 'md5'). */
  readonly digestAlgorithm: string;
  /**
   * Explicit directory relative to the install root. Overrides the kind
   * convention. Never absolute and never contains '..' segments.
   */
  readonly destination?: string | undefined;
  /** Informational version string. */
  readonly version?: string | undefined;
  /** Informational description. */
  readonly description?: string | undefined;
}

// ---------------------------------------------------------------------------
// Derived State
// ---------------------------------------------------------------------------

/**
 * The on-disk state of an artifact, computed on demand.
 *
 * - Absent    — no file at the final path (a staging file alone does not count)
 * - Installed — final file present and verified (or no digest declared)
 * - Corrupted — final file present but its digest does not match
 */
export enum ArtifactState {
  Absent = 'Absent',
  Installed = 'Installed',
  Corrupted = 'Corrupted',
}

/**
 * Runtime status of an artifact as tracked by the acquisition manager.
 *
 * Transitions:
 *   Absent → Fetching → Verifying → Installed | Corrupted
 *   Installed → Corrupted only by an external edit, observed on the next check.
 *
 * Fetching and Verifying exist only while an acquisition is in flight.
 */
export enum AcquisitionPhase {
  Absent = 'Absent',
  Fetching = 'Fetching',
  Verifying = 'Verifying',
  Installed = 'Installed',
  Corrupted = 'Corrupted',
}

/**
 * A status display record for one artifact.
 */
export interface ArtifactReport {
  readonly name: string;
  readonly kind: string;
  readonly state: ArtifactState;
  /** Absolute final path. */
  readonly path: string;
  /** Absolute staging path (`path` + '.part'). */
  readonly stagingPath: string;
  /** Bytes in the staging file, 0 when there is none. */
  readonly stagedBytes: number;
  readonly expectedSizeBytes: number;
  readonly hasDigest: boolean;
}
