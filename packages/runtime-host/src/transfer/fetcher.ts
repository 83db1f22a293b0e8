/**
 * Loadout Runtime Host — Resumable Fetcher
 *
 * Implements the ArtifactFetcher port over HTTP(S) with axios.
 *
 * Every transfer writes to `<destination>.part` and renames it to the final
 * path only after the body has been received in full, so the final path
 * never holds a partial file. An existing staging file is resumed with
 * `Range: bytes=<size>-`:
 *
 *   206 Partial Content     → append to the staging file
 *   200 OK (range ignored)  → truncate the staging file, write from byte 0
 *   416 Range Not Satisfiable
 *     staging size == expected size → the staging file is complete; promote it
 *     otherwise                      → discard the staging file, request in full
 *
 * Bodies are requested with `Accept-Encoding: identity` and decompression off
 * so that byte offsets on disk match offsets on the wire.
 *
 * `timeoutMs` bounds the wait for the response and for each subsequent
 * chunk; a transfer that keeps making progress is never cut off.
 *
 * Transfer failures are returned, never thrown.
 */

import { open, rename, stat, truncate } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { AcquisitionLogger, TransferError, TransferFailureKind, describeError, stagingPathFor } from '@loadout/core';
import type { ArtifactFetcher, FetchRequest, FetchResult } from '@loadout/core';
import { isNodeError } from '../util/node-error.js';

export interface ResumableFetcherOptions {
  /** HTTP client. Defaults to a fresh axios instance. */
  readonly http?: AxiosInstance | undefined;
  readonly logger?: AcquisitionLogger | undefined;
}

/** A local write to the staging file failed. Never escapes this module. */
class StagingWriteError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StagingWriteError';
  }
}

export class ResumableFetcher implements ArtifactFetcher {
  private readonly http: AxiosInstance;
  private readonly logger: AcquisitionLogger;

  constructor(options: ResumableFetcherOptions = {}) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? new AcquisitionLogger();
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    const stagingPath = stagingPathFor(request.destinationPath);

    let offset: number;
    try {
      offset = await this.prepareStaging(stagingPath, request.expectedSizeBytes);
    } catch (err: unknown) {
      return this.failed(request, TransferFailureKind.IoFailure, `Cannot inspect staging file ${stagingPath}`, err);
    }

    if (request.signal?.aborted === true) return { status: 'cancelled', bytesOnDisk: offset };

    return this.transfer(request, stagingPath, offset, true);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Size of the staging file to resume from. A staging file larger than a
   * known expected size cannot be a prefix of the artifact and is truncated.
   */
  private async prepareStaging(stagingPath: string, expectedSizeBytes: number): Promise<number> {
    const size = await sizeOrZero(stagingPath);
    if (expectedSizeBytes > 0 && size > expectedSizeBytes) {
      this.logger.warn(
        'fetch.staging-oversized',
        `Staging file holds ${size} bytes, more than the expected ${expectedSizeBytes}; starting over`,
        { path: stagingPath, size, expected: expectedSizeBytes },
      );
      await truncate(stagingPath, 0);
      return 0;
    }
    return size;
  }

  private async transfer(
    request: FetchRequest,
    stagingPath: string,
    offset: number,
    mayRestart: boolean,
  ): Promise<FetchResult> {
    const controller = new AbortController();
    let body: Readable | undefined;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    // Aborting the request alone does not wake a read that is waiting on the
    // body, so the body is destroyed as well.
    const stop = (): void => {
      controller.abort();
      body?.destroy();
    };
    const arm = (): void => {
      clearTimeout(timer);
      timer = setTimeout(() => {
        timedOut = true;
        stop();
      }, request.timeoutMs);
    };
    request.signal?.addEventListener('abort', stop, { once: true });

    let handle: FileHandle | undefined;
    let startOffset = offset;
    let written = 0;

    try {
      arm();
      if (offset > 0) {
        this.logger.info('fetch.resume', `Resuming ${request.sourceUri} from byte ${offset}`, {
          path: stagingPath,
          offset,
        });
      }

      const response = await this.http.get<unknown>(request.sourceUri, {
        responseType: 'stream',
        decompress: false,
        validateStatus: () => true,
        signal: controller.signal,
        headers: {
          'Accept-Encoding': 'identity',
          ...(offset > 0 ? { Range: `bytes=${offset}-` } : {}),
        },
      });
      const data = response.data;
      if (!(data instanceof Readable)) {
        return this.failed(request, TransferFailureKind.NetworkFailure, 'Response body is not a stream');
      }
      body = data;
      const status = response.status;

      if (status === 416 && offset > 0) {
        body.destroy();
        if (request.expectedSizeBytes > 0 && offset === request.expectedSizeBytes) {
          await writeStep(() => rename(stagingPath, request.destinationPath), `Cannot move ${stagingPath} into place`);
          this.logger.info('fetch.promoted', `Staging file for ${request.destinationPath} was already complete`, {
            path: request.destinationPath,
            bytes: offset,
          });
          return { status: 'completed', outcome: { bytesTransferred: 0, totalBytes: offset, resumedFrom: offset } };
        }
        if (mayRestart) {
          this.logger.warn('fetch.range-rejected', `Server rejected resume at byte ${offset}; starting over`, {
            path: stagingPath,
            offset,
          });
          await writeStep(() => truncate(stagingPath, 0), `Cannot truncate ${stagingPath}`);
          clearTimeout(timer);
          return await this.transfer(request, stagingPath, 0, false);
        }
      }

      if (status < 200 || status >= 300) {
        body.destroy();
        return this.failed(
          request,
          TransferFailureKind.ServerError,
          `Server answered ${status} for ${request.sourceUri}`,
          undefined,
          status,
        );
      }

      if (offset > 0 && status !== 206) {
        this.logger.warn('fetch.range-ignored', `Server ignored the resume request; downloading ${request.sourceUri} in full`, {
          path: stagingPath,
          offset,
        });
        startOffset = 0;
      }

      const contentLength = Number(response.headers['content-length']);
      const totalBytes = Number.isSafeInteger(contentLength) && contentLength > 0 ? contentLength + startOffset : 0;
      const label = basename(request.destinationPath);

      handle = await writeStep(
        () => open(stagingPath, startOffset > 0 ? 'a' : 'w'),
        `Cannot open staging file ${stagingPath}`,
      );
      request.onProgress?.(startOffset, totalBytes, `Downloading ${label}`);

      let cancelled = false;
      const chunks: AsyncIterable<unknown> = body;
      for await (const chunk of chunks) {
        if (Buffer.isBuffer(chunk)) {
          const file = handle;
          await writeStep(() => file.write(chunk), `Cannot write to staging file ${stagingPath}`);
          written += chunk.length;
          arm();
          request.onProgress?.(startOffset + written, totalBytes, `Downloading ${label}`);
        }
        // Checked after the write so a chunk already received is kept.
        if (request.signal?.aborted === true) {
          cancelled = true;
          break;
        }
      }

      await writeStep(() => closeHandle(handle), `Cannot close staging file ${stagingPath}`);
      handle = undefined;

      if (cancelled) return this.cancelled(request, startOffset + written);

      const received = startOffset + written;
      if (totalBytes > 0 && received < totalBytes) {
        return this.failed(
          request,
          TransferFailureKind.NetworkFailure,
          `Connection closed after ${received} of ${totalBytes} bytes`,
        );
      }

      await writeStep(() => rename(stagingPath, request.destinationPath), `Cannot move ${stagingPath} into place`);
      this.logger.debug('fetch.complete', `Received ${written} bytes for ${label}`, {
        path: request.destinationPath,
        bytes: received,
        resumedFrom: startOffset,
      });
      return { status: 'completed', outcome: { bytesTransferred: written, totalBytes, resumedFrom: startOffset } };
    } catch (err: unknown) {
      if (request.signal?.aborted === true) return this.cancelled(request, startOffset + written);
      if (err instanceof StagingWriteError) {
        return this.failed(request, TransferFailureKind.IoFailure, err.message, err.cause);
      }
      if (timedOut) {
        return this.failed(
          request,
          TransferFailureKind.Timeout,
          `No data from ${request.sourceUri} for ${request.timeoutMs} ms`,
          err,
        );
      }
      return this.failed(request, TransferFailureKind.NetworkFailure, `Transfer from ${request.sourceUri} failed`, err);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', stop);
      body?.destroy();
      if (handle !== undefined) await closeQuietly(handle, this.logger, stagingPath);
    }
  }

  private cancelled(request: FetchRequest, bytesOnDisk: number): FetchResult {
    this.logger.info('fetch.cancelled', `Transfer of ${request.sourceUri} cancelled at byte ${bytesOnDisk}`, {
      path: stagingPathFor(request.destinationPath),
      bytesOnDisk,
    });
    return { status: 'cancelled', bytesOnDisk };
  }

  private failed(
    request: FetchRequest,
    kind: TransferFailureKind,
    message: string,
    cause?: unknown,
    httpStatus?: number,
  ): FetchResult {
    const error = new TransferError(kind, message, { sourceUri: request.sourceUri, httpStatus, cause });
    this.logger.debug('fetch.failed', describeError(error), { path: request.destinationPath, kind });
    return { status: 'failed', error };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function sizeOrZero(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return 0;
    throw err;
  }
}

/** Run a local filesystem step, tagging its failure as a staging write error. */
async function writeStep<T>(step: () => Promise<T>, message: string): Promise<T> {
  try {
    return await step();
  } catch (err: unknown) {
    throw new StagingWriteError(message, err);
  }
}

async function closeHandle(handle: FileHandle | undefined): Promise<void> {
  if (handle !== undefined) await handle.close();
}

/** Close a handle on an error path; the original failure is what gets reported. */
async function closeQuietly(handle: FileHandle, logger: AcquisitionLogger, path: string): Promise<void> {
  try {
    await handle.close();
  } catch (err: unknown) {
    logger.warn('fetch.close-failed', `Cannot close staging file ${path}: ${describeError(err)}`, { path });
  }
}
