import { createHash } from 'node:crypto';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { CancelToken, Downloader } from '../../../src/core/download/index.js';
import type { DownloaderOptions } from '../../../src/core/download/index.js';
import { UpdateError } from '../../../src/core/errors/index.js';
import { RetryStrategy } from '../../../src/core/retry/index.js';
import { HttpTransport } from '../../../src/core/transport/index.js';
import {
    FakeFetch,
    createGate,
    makeBytes,
    serveBytes,
    statusResponse,
} from '../../utils/fake-fetch.js';

const ARTIFACT_URL = 'https://cdn.test/app-1.10.0.zip';

const quickRetry = new RetryStrategy({
    maxAttempts: 2,
    initialDelayMs: 1,
    backoffFactor: 1,
    maxDelayMs: 1,
    enableJitter: false,
});

function md5(data: Uint8Array): string {

    return createHash('md5').update(data).digest('hex');

}

async function exists(path: string): Promise<boolean> {

    return stat(path).then(() => true, () => false);

}

function settle(promise: Promise<string>): Promise<string | Error> {

    return promise.then((path) => path, (err: unknown) => err instanceof Error ? err : new Error(String(err)));

}

/**
 * Resolves on the first progress event reaching `bytes`.
 */
function progressReached(downloader: Downloader, bytes: number): Promise<void> {

    return new Promise((resolve) => {

        const cleanup = downloader.on('download:progress', ({ downloaded }) => {

            if (downloaded >= bytes) {

                cleanup();
                resolve();

            }

        });

    });

}

describe('download: downloader', () => {

    let tempDir: string;
    let transport: HttpTransport;
    let server: FakeFetch;

    beforeEach(async () => {

        tempDir = await mkdtemp(join(tmpdir(), 'updater-test-'));
        server = new FakeFetch();
        transport = new HttpTransport({ fetch: server.fetch });

    });

    afterEach(async () => {

        await transport.close();
        await rm(tempDir, { recursive: true, force: true });

    });

    function createDownloader(options: Partial<DownloaderOptions> = {}): Downloader {

        return new Downloader({
            url: ARTIFACT_URL,
            savePath: join(tempDir, 'app.zip'),
            transport,
            retry: RetryStrategy.disabled,
            ...options,
        });

    }

    it('should download the artifact and verify its checksum', async () => {

        const data = makeBytes(1000);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, { chunkSizes: [256] }));

        const downloader = createDownloader({ checksum: md5(data).toUpperCase(), expectedSize: 1000 });
        const verified: string[] = [];

        downloader.on('download:verified', ({ checksum }) => verified.push(checksum));

        const path = await downloader.download();

        expect(path).toBe(join(tempDir, 'app.zip'));
        expect(Buffer.compare(await readFile(path), Buffer.from(data))).toBe(0);
        expect(await exists(downloader.partialPath)).toBe(false);
        expect(downloader.status).toBe('downloaded');
        expect(downloader.progress).toMatchObject({ downloaded: 1000, total: 1000, percent: 100 });
        expect(verified).toEqual([md5(data)]);

    });

    it('should return the path again once downloaded', async () => {

        const data = makeBytes(10);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request));

        const downloader = createDownloader();

        await downloader.download();

        expect(await downloader.download()).toBe(downloader.savePath);
        expect(server.requests).toHaveLength(1);

    });

    it('should pause and resume with a Range request', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, request.index === 0
            ? { chunkSizes: [600, 400], hold: { beforeChunk: 1, until: gate.promise } }
            : {}));

        const downloader = createDownloader({ checksum: md5(data) });
        const paused: number[] = [];

        downloader.on('download:paused', ({ downloaded }) => paused.push(downloaded));

        const reached = progressReached(downloader, 600);
        const result = settle(downloader.download());

        await reached;
        await downloader.pause();

        expect(downloader.status).toBe('paused');
        expect(paused).toEqual([600]);
        expect((await stat(downloader.partialPath)).size).toBe(600);

        const path = await downloader.resume();

        expect(await result).toBe(path);
        expect(server.requests.map((request) => request.rangeStart)).toEqual([null, 600]);
        expect(Buffer.compare(await readFile(path), Buffer.from(data))).toBe(0);

    });

    it('should restart when the server ignores Range', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, request.index === 0
            ? { chunkSizes: [600, 400], hold: { beforeChunk: 1, until: gate.promise } }
            : { supportRange: false }));

        const downloader = createDownloader();
        const reached = progressReached(downloader, 600);
        const result = settle(downloader.download());

        await reached;
        await downloader.pause();

        const path = await downloader.resume();

        expect(await result).toBe(path);
        expect(server.requests[1]?.rangeStart).toBe(600);
        expect((await readFile(path)).length).toBe(1000);
        expect(Buffer.compare(await readFile(path), Buffer.from(data))).toBe(0);

    });

    it('should not send Range when range support is off', async () => {

        const data = makeBytes(100);

        await writeFile(join(tempDir, 'app.zip.download'), Buffer.from(data.subarray(0, 40)));

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request));

        const downloader = createDownloader({ supportRange: false });
        const path = await downloader.download();

        expect(server.requests[0]?.headers['range']).toBeUndefined();
        expect((await readFile(path)).length).toBe(100);

    });

    it('should retry a 503 and then succeed', async () => {

        const data = makeBytes(200);

        server.route(ARTIFACT_URL, (request) => request.index === 0
            ? statusResponse(503, 'Service Unavailable')
            : serveBytes(data, request));

        const downloader = createDownloader({ retry: quickRetry });
        const retries: Array<{ attempt: number; delayMs: number; code: string }> = [];

        downloader.on('download:retry', ({ attempt, delayMs, code }) => retries.push({ attempt, delayMs, code }));

        await downloader.download();

        expect(retries).toEqual([{ attempt: 1, delayMs: 1, code: 'DOWNLOAD_ERROR' }]);
        expect(server.requests).toHaveLength(2);

    });

    it('should not retry a 404', async () => {

        server.route(ARTIFACT_URL, () => statusResponse(404, 'Not Found'));

        const downloader = createDownloader({ retry: quickRetry });
        const outcome = await settle(downloader.download());

        expect(outcome).toBeInstanceOf(UpdateError);
        expect(outcome).toMatchObject({
            code: 'DOWNLOAD_ERROR',
            message: `Unexpected HTTP status 404 for ${ARTIFACT_URL}`,
        });
        expect(server.requests).toHaveLength(1);
        expect(downloader.status).toBe('error');

    });

    it('should fail with NETWORK_ERROR when the body ends early', async () => {

        const data = makeBytes(1000);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, { chunkSizes: [600], endAfterChunks: 1 }));

        const downloader = createDownloader();
        const outcome = await settle(downloader.download());

        expect(outcome).toMatchObject({
            code: 'NETWORK_ERROR',
            message: 'Connection closed after 600 of 1000 bytes',
        });
        expect(downloader.error?.code).toBe('NETWORK_ERROR');
        expect((await stat(downloader.partialPath)).size).toBe(600);

    });

    it('should resume from the sidecar on retry after an early end', async () => {

        const data = makeBytes(1000);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, request.index === 0
            ? { chunkSizes: [600], endAfterChunks: 1 }
            : {}));

        const downloader = createDownloader({ retry: quickRetry, checksum: md5(data) });
        const path = await downloader.download();

        expect(server.requests.map((request) => request.rangeStart)).toEqual([null, 600]);
        expect(Buffer.compare(await readFile(path), Buffer.from(data))).toBe(0);

    });

    it('should delete the sidecar on checksum mismatch', async () => {

        const data = makeBytes(50);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request));

        const downloader = createDownloader({ checksum: 'ABC123', retry: quickRetry });
        const outcome = await settle(downloader.download());

        expect(outcome).toMatchObject({
            code: 'MD5_MISMATCH',
            message: `md5 mismatch: expected abc123, got ${md5(data)}`,
        });
        expect(await exists(downloader.partialPath)).toBe(false);
        expect(await exists(downloader.savePath)).toBe(false);
        expect(server.requests).toHaveLength(1);

    });

    it('should verify with the configured algorithm', async () => {

        const data = makeBytes(64);
        const sha256 = createHash('sha256').update(data).digest('hex');

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request));

        const downloader = createDownloader({ checksum: sha256, checksumAlgorithm: 'sha256' });

        expect(await downloader.download()).toBe(downloader.savePath);

    });

    it('should finish without a request when the sidecar is complete', async () => {

        const data = makeBytes(100);

        await writeFile(join(tempDir, 'app.zip.download'), Buffer.from(data));

        const downloader = createDownloader({ expectedSize: 100, checksum: md5(data) });
        const path = await downloader.download();

        expect(server.requests).toHaveLength(0);
        expect((await readFile(path)).length).toBe(100);

    });

    it('should cancel through a token and delete the sidecar', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, {
            chunkSizes: [600, 400],
            hold: { beforeChunk: 1, until: gate.promise },
        }));

        const downloader = createDownloader();
        const token = new CancelToken();
        const canceled: number[] = [];

        downloader.on('download:canceled', ({ downloaded }) => canceled.push(downloaded));

        const reached = progressReached(downloader, 600);
        const result = settle(downloader.download(token));

        await reached;
        token.cancel();
        await downloader.whenSettled();

        expect(await result).toMatchObject({ code: 'DOWNLOAD_CANCELED', message: 'Download canceled' });
        expect(downloader.status).toBe('canceled');
        expect(canceled).toEqual([600]);
        expect(await exists(downloader.partialPath)).toBe(false);

    });

    it('should cancel while paused', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, {
            chunkSizes: [600, 400],
            hold: { beforeChunk: 1, until: gate.promise },
        }));

        const downloader = createDownloader();
        const reached = progressReached(downloader, 600);
        const result = settle(downloader.download());

        await reached;
        await downloader.pause();
        await downloader.cancel();

        expect(await result).toMatchObject({ code: 'DOWNLOAD_CANCELED' });
        expect(downloader.status).toBe('canceled');
        expect(await exists(downloader.partialPath)).toBe(false);

    });

    it('should let a cancel override a pause that has not settled', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, {
            chunkSizes: [600, 400],
            hold: { beforeChunk: 1, until: gate.promise },
        }));

        const downloader = createDownloader();
        const paused: number[] = [];

        downloader.on('download:paused', ({ downloaded }) => paused.push(downloaded));

        const reached = progressReached(downloader, 600);
        const result = settle(downloader.download());

        await reached;

        const pausing = downloader.pause();

        await downloader.cancel();
        await pausing;

        expect(await result).toMatchObject({ code: 'DOWNLOAD_CANCELED' });
        expect(downloader.status).toBe('canceled');
        expect(paused).toEqual([]);
        expect(await exists(downloader.partialPath)).toBe(false);

    });

    it('should cancel during the retry backoff', async () => {

        server.route(ARTIFACT_URL, () => statusResponse(503, 'Service Unavailable'));

        const downloader = createDownloader({
            retry: new RetryStrategy({
                maxAttempts: 3,
                initialDelayMs: 60_000,
                backoffFactor: 1,
                maxDelayMs: 60_000,
                enableJitter: false,
            }),
        });
        const cancels: Array<Promise<void>> = [];

        downloader.on('download:retry', () => {

            cancels.push(downloader.cancel());

        });

        const outcome = await settle(downloader.download());

        await Promise.all(cancels);

        expect(outcome).toMatchObject({ code: 'DOWNLOAD_CANCELED' });
        expect(cancels).toHaveLength(1);
        expect(server.requests).toHaveLength(1);
        expect(downloader.status).toBe('canceled');
        expect(await exists(downloader.partialPath)).toBe(false);

    });

    it('should honor the token of a caller joining a running download', async () => {

        const data = makeBytes(1000);
        const gate = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, {
            chunkSizes: [600, 400],
            hold: { beforeChunk: 1, until: gate.promise },
        }));

        const downloader = createDownloader();
        const token = new CancelToken();
        const reached = progressReached(downloader, 600);
        const first = settle(downloader.download());

        await reached;

        const second = settle(downloader.download(token));

        token.cancel();
        await downloader.whenSettled();

        expect(await first).toMatchObject({ code: 'DOWNLOAD_CANCELED' });
        expect(await second).toMatchObject({ code: 'DOWNLOAD_CANCELED' });
        expect(server.requests).toHaveLength(1);
        expect(await exists(downloader.partialPath)).toBe(false);

    });

    it('should fail with DOWNLOAD_TIMEOUT when the run exceeds its budget', async () => {

        const data = makeBytes(100);
        const never = createGate();

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request, {
            hold: { beforeChunk: 0, until: never.promise },
        }));

        const downloader = createDownloader({ timeoutMs: 30 });
        const outcome = await settle(downloader.download());

        expect(outcome).toMatchObject({
            code: 'DOWNLOAD_TIMEOUT',
            message: 'Download did not finish within 30ms',
        });
        expect(downloader.status).toBe('error');

    });

    it('should publish status transitions', async () => {

        const data = makeBytes(10);

        server.route(ARTIFACT_URL, (request) => serveBytes(data, request));

        const downloader = createDownloader();
        const statuses: string[] = [];

        downloader.on('download:status', ({ status }) => statuses.push(status));

        await downloader.download();

        expect(statuses).toEqual(['downloading', 'downloaded']);

    });

});
