/**
 * Loadout Core — Manifest Validator
 *
 * Validates a parsed manifest document (the output of a YAML/JSON parser)
 * and converts each entry into an ArtifactDescriptor.
 *
 * Manifest shape:
 *
 *   artifacts:            # or `models`, accepted when `artifacts` is absent
 *     - name: speech-model
 *       type: speech-model
 *       url: https://example.com/speech.bin
 *       filename: speech.bin
 *       size: 1000000                 # optional, 0 = unknown
 *       checksum: <hex>               # optional
 *       checksum_type: sha256         # optional, default md5
 *       destination: models/custom    # optional, relative to the install root
 *       version: "2.0"                # optional
 *       description: ...              # optional
 *
 * All errors are accumulated; validation does not stop at the first bad
 * entry. Duplicate names are rejected rather than letting a later entry
 * silently replace an earlier one, and so are two entries that resolve to
 * the same file under the install root: they would share a staging file.
 */

import { isAbsolute } from 'node:path';
import { relativeArtifactPath } from './locator.js';
import type { ArtifactDescriptor } from '../types/artifact.js';
import type { ValidationError, ValidationResult } from '../types/validation.js';

/** Digest algorithms with a known hex length. Others pass validation unchecked. */
export const DIGEST_HEX_LENGTHS: Readonly<Record<string, number>> = {
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

/** Applied when an entry omits checksum_type. */
export const DEFAULT_DIGEST_ALGORITHM = 'md5';

const HEX = /^[0-9a-f]+$/;

/**
 * Normalize a digest algorithm name: lowercase, no hyphens or underscores.
 * 'SHA-256' and 'sha_256' both become 'sha256'.
 */
export function normalizeDigestAlgorithm(name: string): string {
  return name.trim().toLowerCase().replace(/[-_]/g, '');
}

/**
 * Validates manifest documents and produces descriptors.
 */
export class ManifestValidator {
  /**
   * Validate an unknown value as a manifest document.
   *
   * @param document - Parsed YAML/JSON value
   * @returns The descriptors in manifest order, or every error found
   */
  validateDocument(document: unknown): ValidationResult<ReadonlyArray<ArtifactDescriptor>> {
    if (!isRecord(document)) {
      return fail([{ message: 'Manifest must be a mapping with a top-level artifact list' }]);
    }

    const listKey = document['artifacts'] !== undefined ? 'artifacts' : 'models';
    const list = document[listKey];
    if (list === undefined || list === null) {
      return fail([{ message: "Manifest is missing the top-level 'artifacts' (or 'models') list" }]);
    }
    if (!Array.isArray(list)) {
      return fail([{ message: 'Artifact list must be a sequence', context: listKey }]);
    }

    const errors: ValidationError[] = [];
    const descriptors: ArtifactDescriptor[] = [];
    const firstIndexByName = new Map<string, number>();
    const firstIndexByPath = new Map<string, number>();

    list.forEach((entry: unknown, index: number) => {
      const context = `${listKey}[${index}]`;
      const result = this.validateEntry(entry, context);
      if (!result.ok) {
        errors.push(...result.errors);
        return;
      }
      const descriptor = result.value;
      const earlier = firstIndexByName.get(descriptor.name);
      if (earlier !== undefined) {
        errors.push({
          message: `Duplicate artifact name '${descriptor.name}' (first declared at ${listKey}[${earlier}])`,
          context: `${context}.name`,
        });
        return;
      }
      const storedAt = relativeArtifactPath(descriptor);
      const sharing = firstIndexByPath.get(storedAt);
      if (sharing !== undefined) {
        errors.push({
          message: `Artifact '${descriptor.name}' resolves to '${storedAt}', already used by ${listKey}[${sharing}]`,
          context: `${context}.filename`,
        });
        return;
      }
      firstIndexByName.set(descriptor.name, index);
      firstIndexByPath.set(storedAt, index);
      descriptors.push(descriptor);
    });

    if (errors.length > 0) return fail(errors);
    return { ok: true, value: descriptors };
  }

  /**
   * Validate a single manifest entry.
   *
   * @param entry - One element of the artifact list
   * @param context - Location prefix used in error contexts (e.g. 'artifacts[2]')
   */
  validateEntry(entry: unknown, context: string): ValidationResult<ArtifactDescriptor> {
    if (!isRecord(entry)) {
      return fail([{ message: 'Artifact entry must be a mapping', context }]);
    }

    const errors: ValidationError[] = [];
    const at = (field: string): string => `${context}.${field}`;

    const name = requireString(entry, 'name', at('name'), errors);
    const kind = requireString(entry, 'type', at('type'), errors);
    const sourceUri = requireString(entry, 'url', at('url'), errors);
    const filename = requireString(entry, 'filename', at('filename'), errors);

    if (sourceUri !== undefined && !isHttpUrl(sourceUri)) {
      errors.push({ message: `Expected an http(s) URL, got '${sourceUri}'`, context: at('url') });
    }

    if (filename !== undefined && !isPlainFilename(filename)) {
      errors.push({
        message: `Filename must be a single path segment, got '${filename}'`,
        context: at('filename'),
      });
    }

    let expectedSizeBytes = 0;
    const size = entry['size'];
    if (size !== undefined && size !== null) {
      if (typeof size === 'number' && Number.isSafeInteger(size) && size >= 0) {
        expectedSizeBytes = size;
      } else {
        errors.push({ message: 'Size must be a non-negative integer', context: at('size') });
      }
    }

    let digestAlgorithm = DEFAULT_DIGEST_ALGORITHM;
    const checksumType = entry['checksum_type'];
    if (checksumType !== undefined && checksumType !== null) {
      if (typeof checksumType === 'string' && normalizeDigestAlgorithm(checksumType) !== '') {
        digestAlgorithm = normalizeDigestAlgorithm(checksumType);
      } else {
        errors.push({ message: 'checksum_type must be a non-empty string', context: at('checksum_type') });
      }
    }

    let digest: string | undefined;
    const checksum = entry['checksum'];
    if (checksum !== undefined && checksum !== null && checksum !== '') {
      if (typeof checksum !== 'string' || !HEX.test(checksum.trim().toLowerCase())) {
        errors.push({ message: 'Checksum must be a hexadecimal string', context: at('checksum') });
      } else {
        digest = checksum.trim().toLowerCase();
        const expectedLength = DIGEST_HEX_LENGTHS[digestAlgorithm];
        if (expectedLength !== undefined && digest.length !== expectedLength) {
          errors.push({
            message:
              `A ${digestAlgorithm} checksum has ${expectedLength} hex characters, ` +
              `got ${digest.length}`,
            context: at('checksum'),
          });
        }
      }
    }

    let destination: string | undefined;
    const rawDestination = entry['destination'];
    if (rawDestination !== undefined && rawDestination !== null && rawDestination !== '') {
      if (typeof rawDestination !== 'string') {
        errors.push({ message: 'Destination must be a string', context: at('destination') });
      } else if (!isContainedRelativePath(rawDestination)) {
        errors.push({
          message: `Destination must be a relative path without '..' segments, got '${rawDestination}'`,
          context: at('destination'),
        });
      } else {
        destination = rawDestination;
      }
    }

    let version: string | undefined;
    const rawVersion = entry['version'];
    if (rawVersion !== undefined && rawVersion !== null) {
      if (typeof rawVersion === 'string' || typeof rawVersion === 'number') {
        version = String(rawVersion);
      } else {
        errors.push({ message: 'Version must be a string or number', context: at('version') });
      }
    }

    let description: string | undefined;
    const rawDescription = entry['description'];
    if (rawDescription !== undefined && rawDescription !== null) {
      if (typeof rawDescription === 'string') {
        description = rawDescription;
      } else {
        errors.push({ message: 'Description must be a string', context: at('description') });
      }
    }

    if (
      errors.length > 0 ||
      name === undefined ||
      kind === undefined ||
      sourceUri === undefined ||
      filename === undefined
    ) {
      return fail(errors);
    }

    return {
      ok: true,
      value: {
        name,
        kind,
        sourceUri,
        filename,
        expectedSizeBytes,
        digestAlgorithm,
        ...(digest !== undefined ? { digest } : {}),
        ...(destination !== undefined ? { destination } : {}),
        ...(version !== undefined ? { version } : {}),
        ...(description !== undefined ? { description } : {}),
      },
    };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function fail(errors: ReadonlyArray<ValidationError>): { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> } {
  return { ok: false, errors };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(
  entry: Record<string, unknown>,
  field: string,
  context: string,
  errors: ValidationError[],
): string | undefined {
  const value = entry[field];
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push({ message: `Required field '${field}' must be a non-empty string`, context });
    return undefined;
  }
  return value;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function isPlainFilename(value: string): boolean {
  return !/[/\\]/.test(value) && value !== '.' && value !== '..' && !value.includes('\0');
}

function isContainedRelativePath(value: string): boolean {
  if (isAbsolute(value) || /^[a-zA-Z]:/.test(value) || value.includes('\0')) return false;
  return value.split(/[/\\]/).every((segment) => segment !== '..');
}
