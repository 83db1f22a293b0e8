/**
 * Loadout Runtime Host — Resumable Fetcher Tests
 *
 *   FET-U1:  a full transfer lands at the final path and reports progress
 *   FET-U2:  an existing staging file is resumed with a Range request (206)
 *   FET-U3:  a server that ignores Range (200) restarts the staging file
 *   FET-U4:  non-2xx answers are server-error failures carrying the status
 *   FET-U5:  a dropped connection is a network failure that leaves the staging file
 *   FET-U6:  a stalled body is a timeout failure
 *   FET-U7:  an abort mid-transfer is cancelled and keeps the staging file,
 *            with every received chunk written to it
 *   FET-U8:  416 with a complete staging file promotes it without a body
 *   FET-U9:  416 with an incomplete staging file restarts once in full
 *   FET-U10: a staging file larger than the expected size is discarded
 *   FET-U11: a body without Content-Length reports a total of 0
 *   FET-U12: an unreachable host is a network failure
 *
 * Isolation: a loopback HTTP server per test, files in temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import axios from 'axios';
import { AcquisitionLogger, MemoryLogSink, TransferFailureKind } from '@loadout/core';
import type { FetchRequest, FetchResult } from '@loadout/core';
import { ResumableFetcher } from '../src/transfer/fetcher.js';
import { dropAfter, payload, serveBytes, startServer } from './support/http-fixture.js';
import type { ArtifactServer } from './support/http-fixture.js';

const BODY = payload(64 * 1024);

let server: ArtifactServer;
let dir: string;
let sink: MemoryLogSink;
let fetcher: ResumableFetcher;

beforeEach(async () => {
  server = await startServer(serveBytes(BODY));
  dir = mkdtempSync(join(tmpdir(), 'loadout-fetch-'));
  sink = new MemoryLogSink();
  fetcher = new ResumableFetcher({ http: axios.create({ proxy: false }), logger: new AcquisitionLogger(sink) });
});

afterEach(async () => {
  await server.close();
});

function request(overrides: Partial<FetchRequest> = {}): FetchRequest {
  return {
    sourceUri: `${server.baseUrl}/artifact.bin`,
    destinationPath: join(dir, 'artifact.bin'),
    expectedSizeBytes: BODY.length,
    timeoutMs: 5_000,
    ...overrides,
  };
}

function destination(): string {
  return join(dir, 'artifact.bin');
}

function staging(): string {
  return join(dir, 'artifact.bin.part');
}

function failureOf(result: FetchResult): { kind: TransferFailureKind; httpStatus: number | undefined; message: string } {
  if (result.status !== 'failed') throw new Error(`Expected a failed transfer, got ${result.status}`);
  return { kind: result.error.kind, httpStatus: result.error.httpStatus, message: result.error.message };
}

describe('ResumableFetcher — FET-U1: full transfer', () => {
  it('writes the body to the final path and removes the staging file', async () => {
    const progress: Array<[number, number, string]> = [];

    const result = await fetcher.fetch(request({ onProgress: (done, total, message) => progress.push([done, total, message]) }));

    expect(result).toEqual({
      status: 'completed',
      outcome: { bytesTransferred: BODY.length, totalBytes: BODY.length, resumedFrom: 0 },
    });
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(existsSync(staging())).toBe(false);
    expect(progress[0]).toEqual([0, BODY.length, 'Downloading artifact.bin']);
    expect(progress[progress.length - 1]).toEqual([BODY.length, BODY.length, 'Downloading artifact.bin']);
    expect(server.requests).toEqual([{ url: '/artifact.bin', range: undefined }]);
  });
});

describe('ResumableFetcher — FET-U2: resume', () => {
  it('requests the remaining bytes and appends them', async () => {
    writeFileSync(staging(), BODY.subarray(0, 1000));
    const progress: number[] = [];

    const result = await fetcher.fetch(request({ onProgress: (done) => progress.push(done) }));

    expect(result).toEqual({
      status: 'completed',
      outcome: { bytesTransferred: BODY.length - 1000, totalBytes: BODY.length, resumedFrom: 1000 },
    });
    expect(server.requests[0]?.range).toBe('bytes=1000-');
    expect(progress[0]).toBe(1000);
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(sink.list('fetch.resume')).toHaveLength(1);
  });
});

describe('ResumableFetcher — FET-U3: range ignored', () => {
  it('truncates the staging file and writes from byte 0', async () => {
    writeFileSync(staging(), Buffer.from('stale prefix'));
    server.handle((_req, res) => {
      res.writeHead(200, { 'Content-Length': String(BODY.length) });
      res.end(BODY);
    });

    const result = await fetcher.fetch(request());

    expect(result).toEqual({
      status: 'completed',
      outcome: { bytesTransferred: BODY.length, totalBytes: BODY.length, resumedFrom: 0 },
    });
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(sink.list('fetch.range-ignored')).toHaveLength(1);
  });
});

describe('ResumableFetcher — FET-U4: server errors', () => {
  it.each([404, 503])('reports %i as a server error', async (status) => {
    server.handle((_req, res) => {
      res.writeHead(status);
      res.end('unavailable');
    });

    const failure = failureOf(await fetcher.fetch(request()));

    expect(failure.kind).toBe(TransferFailureKind.ServerError);
    expect(failure.httpStatus).toBe(status);
    expect(failure.message).toBe(`Server answered ${status} for ${server.baseUrl}/artifact.bin`);
    expect(existsSync(destination())).toBe(false);
  });
});

describe('ResumableFetcher — FET-U5: dropped connection', () => {
  it('fails with a network failure, then resumes from the staged bytes', async () => {
    server.handle(dropAfter(BODY, 20_000));

    const first = await fetcher.fetch(request());

    expect(failureOf(first).kind).toBe(TransferFailureKind.NetworkFailure);
    expect(existsSync(destination())).toBe(false);
    const staged = readFileSync(staging());
    expect(staged.length).toBeGreaterThan(0);
    expect(staged.equals(BODY.subarray(0, staged.length))).toBe(true);

    server.handle(serveBytes(BODY));
    const second = await fetcher.fetch(request());

    expect(second.status).toBe('completed');
    expect(server.requests[1]?.range).toBe(`bytes=${staged.length}-`);
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
  });
});

describe('ResumableFetcher — FET-U6: idle timeout', () => {
  it('gives up when no data arrives within timeoutMs', async () => {
    server.handle((_req, res) => {
      res.writeHead(200, { 'Content-Length': String(BODY.length) });
      res.write(BODY.subarray(0, 100));
    });

    const failure = failureOf(await fetcher.fetch(request({ timeoutMs: 200 })));

    expect(failure.kind).toBe(TransferFailureKind.Timeout);
    expect(failure.message).toBe(`No data from ${server.baseUrl}/artifact.bin for 200 ms`);
    expect(existsSync(destination())).toBe(false);
  });
});

describe('ResumableFetcher — FET-U7: cancellation', () => {
  it('stops at the next chunk once the signal aborts', async () => {
    server.handle((_req, res) => {
      res.writeHead(200, { 'Content-Length': String(BODY.length) });
      res.write(BODY.subarray(0, 1000));
    });
    const controller = new AbortController();

    const result = await fetcher.fetch(
      request({
        signal: controller.signal,
        onProgress: (done) => {
          if (done > 0) controller.abort();
        },
      }),
    );

    expect(result.status).toBe('cancelled');
    expect(existsSync(destination())).toBe(false);
    expect(existsSync(staging())).toBe(true);
  });

  it('writes the chunk in hand before stopping', async () => {
    server.handle((_req, res) => {
      res.writeHead(200, { 'Content-Length': String(BODY.length) });
      res.write(BODY.subarray(0, 1000));
    });
    const controller = new AbortController();
    let reported = 0;

    const result = await fetcher.fetch(
      request({
        signal: controller.signal,
        onProgress: (done) => {
          reported = done;
          if (done > 0) controller.abort();
        },
      }),
    );

    expect(reported).toBeGreaterThan(0);
    expect(result).toEqual({ status: 'cancelled', bytesOnDisk: reported });
    expect(statSync(staging()).size).toBe(reported);
    expect(readFileSync(staging())).toEqual(BODY.subarray(0, reported));
  });

  it('does not contact the server when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await fetcher.fetch(request({ signal: controller.signal }));

    expect(result).toEqual({ status: 'cancelled', bytesOnDisk: 0 });
    expect(server.requests).toHaveLength(0);
  });
});

describe('ResumableFetcher — FET-U8: 416 with a complete staging file', () => {
  it('promotes the staging file', async () => {
    writeFileSync(staging(), BODY);

    const result = await fetcher.fetch(request());

    expect(result).toEqual({
      status: 'completed',
      outcome: { bytesTransferred: 0, totalBytes: BODY.length, resumedFrom: BODY.length },
    });
    expect(server.requests).toEqual([{ url: '/artifact.bin', range: `bytes=${BODY.length}-` }]);
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(existsSync(staging())).toBe(false);
  });
});

describe('ResumableFetcher — FET-U9: 416 with an incomplete staging file', () => {
  it('discards the staging file and requests the whole body once', async () => {
    writeFileSync(staging(), Buffer.from('junk'));
    server.handle((req, res) => {
      if (req.headers.range !== undefined) {
        res.writeHead(416);
        res.end();
        return;
      }
      res.writeHead(200, { 'Content-Length': String(BODY.length) });
      res.end(BODY);
    });

    const result = await fetcher.fetch(request({ expectedSizeBytes: 0 }));

    expect(result.status).toBe('completed');
    expect(server.requests.map((r) => r.range)).toEqual(['bytes=4-', undefined]);
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(sink.list('fetch.range-rejected')).toHaveLength(1);
  });
});

describe('ResumableFetcher — FET-U10: oversized staging file', () => {
  it('starts over without a Range header', async () => {
    writeFileSync(staging(), Buffer.concat([BODY, Buffer.from('trailing')]));

    const result = await fetcher.fetch(request());

    expect(result.status).toBe('completed');
    expect(server.requests[0]?.range).toBeUndefined();
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
    expect(sink.list('fetch.staging-oversized')[0]?.fields).toEqual({
      path: staging(),
      size: BODY.length + 8,
      expected: BODY.length,
    });
  });
});

describe('ResumableFetcher — FET-U11: unknown length', () => {
  it('reports a total of 0 for a chunked body', async () => {
    server.handle((_req, res) => {
      res.writeHead(200);
      res.write(BODY.subarray(0, 30_000));
      res.end(BODY.subarray(30_000));
    });
    const totals = new Set<number>();

    const result = await fetcher.fetch(request({ expectedSizeBytes: 0, onProgress: (_done, total) => totals.add(total) }));

    expect(result).toEqual({
      status: 'completed',
      outcome: { bytesTransferred: BODY.length, totalBytes: 0, resumedFrom: 0 },
    });
    expect([...totals]).toEqual([0]);
    expect(readFileSync(destination()).equals(BODY)).toBe(true);
  });
});

describe('ResumableFetcher — FET-U12: unreachable host', () => {
  it('reports a network failure', async () => {
    const uri = `${server.baseUrl}/artifact.bin`;
    await server.close();
    server = await startServer(serveBytes(BODY));

    const failure = failureOf(await fetcher.fetch(request({ sourceUri: uri })));

    expect(failure.kind).toBe(TransferFailureKind.NetworkFailure);
    expect(failure.message).toBe(`Transfer from ${uri} failed`);
  });
});
