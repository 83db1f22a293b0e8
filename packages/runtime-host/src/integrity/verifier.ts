/**
 * Loadout Runtime Host — Integrity Verifier
 *
 * Implements the IntegrityChecker port from @loadout/core by streaming a file
 * through node:crypto with a 1 MiB read buffer. Memory use is bounded by the
 * buffer, not the file size.
 *
 * Unsupported algorithms fail closed: the file is reported invalid. Set
 * `allowUnverifiable` to accept such files instead; the verdict is still
 * 'unsupported-algorithm' so callers can tell the two apart.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { AcquisitionLogger, normalizeDigestAlgorithm } from '@loadout/core';
import type { IntegrityCheck, IntegrityChecker } from '@loadout/core';
import { isNodeError } from '../util/node-error.js';

export const SUPPORTED_DIGEST_ALGORITHMS: ReadonlyArray<string> = ['md5', 'sha1', 'sha256', 'sha512'];

export const DIGEST_READ_BUFFER_BYTES = 1024 * 1024;

export interface IntegrityVerifierOptions {
  /** Accept files whose digest algorithm cannot be computed. Default false. */
  readonly allowUnverifiable?: boolean | undefined;
}

export class IntegrityVerifier implements IntegrityChecker {
  private readonly allowUnverifiable: boolean;

  constructor(
    options: IntegrityVerifierOptions = {},
    private readonly logger: AcquisitionLogger = new AcquisitionLogger(),
  ) {
    this.allowUnverifiable = options.allowUnverifiable ?? false;
  }

  static isSupported(algorithm: string): boolean {
    return SUPPORTED_DIGEST_ALGORITHMS.includes(normalizeDigestAlgorithm(algorithm));
  }

  /**
   * Lowercase hex digest of a file.
   *
   * @throws {RangeError} If the algorithm is not supported
   * @throws {NodeJS.ErrnoException} If the file cannot be read
   */
  async digestOf(path: string, algorithm: string): Promise<string> {
    const normalized = normalizeDigestAlgorithm(algorithm);
    if (!SUPPORTED_DIGEST_ALGORITHMS.includes(normalized)) {
      throw new RangeError(`Unsupported digest algorithm '${algorithm}'`);
    }
    const hash = createHash(normalized);
    const chunks: AsyncIterable<unknown> = createReadStream(path, { highWaterMark: DIGEST_READ_BUFFER_BYTES });
    for await (const chunk of chunks) {
      if (Buffer.isBuffer(chunk)) hash.update(chunk);
    }
    return hash.digest('hex');
  }

  async check(path: string, expectedDigest: string | undefined, algorithm: string): Promise<IntegrityCheck> {
    const expected = expectedDigest?.trim().toLowerCase() ?? '';
    if (expected === '') return { verdict: 'no-digest', valid: true };

    if (!IntegrityVerifier.isSupported(algorithm)) {
      const message = this.allowUnverifiable
        ? `Cannot compute '${algorithm}' digests; accepting ${path} unverified`
        : `Cannot compute '${algorithm}' digests; rejecting ${path}`;
      this.logger.warn('verify.unsupported-algorithm', message, { path, algorithm });
      return { verdict: 'unsupported-algorithm', valid: this.allowUnverifiable };
    }

    let computed: string;
    try {
      computed = await this.digestOf(path, algorithm);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return { verdict: 'missing-file', valid: false };
      throw err;
    }

    if (computed === expected) {
      this.logger.debug('verify.match', `${path} matches its ${algorithm} digest`, { path });
      return { verdict: 'match', valid: true, computed };
    }
    this.logger.debug('verify.mismatch', `${path} does not match its ${algorithm} digest`, {
      path,
      expected,
      actual: computed,
    });
    return { verdict: 'mismatch', valid: false, computed };
  }

  /** True when the file matches, or when there is no digest to check. */
  async verify(path: string, expectedDigest: string | undefined, algorithm: string): Promise<boolean> {
    return (await this.check(path, expectedDigest, algorithm)).valid;
  }
}
