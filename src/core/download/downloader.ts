/**
 * Resumable artifact downloader.
 *
 * Streams an artifact into a `<target>.download` sidecar, resumes from
 * the sidecar with Range requests, retries transient failures with
 * backoff, verifies the checksum and finally renames the sidecar onto
 * the target path.
 *
 * ```
 * idle -> downloading <-> paused
 * downloading -> downloaded | error | canceled
 * ```
 *
 * @example
 * ```typescript
 * const downloader = new Downloader({
 *     url: descriptor.downloadUrl,
 *     savePath: '/tmp/app-1.10.0.zip',
 *     expectedSize: descriptor.fileSize,
 *     checksum: descriptor.checksum,
 *     transport,
 * })
 *
 * downloader.on('download:progress', ({ percent }) => render(percent))
 *
 * const path = await downloader.download()
 * ```
 */
import { mkdir, open, rename, rm, stat } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import { attempt } from '@logosdx/utils';

import { HttpStatusError, UpdateError } from '../errors/errors.js';
import { errorMessage, toUpdateError } from '../errors/normalize.js';
import { systemErrorCode } from '../errors/classify.js';
import { createObserver } from '../observer.js';
import type { UpdaterEventCallback, UpdaterEventNames, UpdaterObserver } from '../observer.js';
import { RetryStrategy } from '../retry/strategy.js';
import { discardBody } from '../transport/http.js';
import type { HttpTransport } from '../transport/http.js';
import type { ByteStreamReader, TransportResponse } from '../transport/types.js';
import type { CancelToken } from './cancel.js';
import { checksumsMatch, computeFileChecksum } from './checksum.js';
import { progressPercent } from './format.js';
import { SpeedMeter, estimateEta } from './speed.js';
import type {
    ChecksumAlgorithm,
    DownloadProgress,
    DownloadStatus,
    DownloaderOptions,
    TransferState,
} from './types.js';
import { DEFAULT_DOWNLOAD_OPTIONS, PARTIAL_SUFFIX } from './types.js';

// =============================================================================
// Internals
// =============================================================================

/**
 * Why a run was stopped from outside.
 */
type InterruptReason = 'pause' | 'cancel' | 'timeout';

/**
 * One pass of the transfer loop, from start or resume until it exits.
 */
interface Run {
    controller: AbortController;
    reason: InterruptReason | null;
}

/**
 * Thrown inside the loop when the run was interrupted.
 */
class TransferInterrupted extends Error {

    override readonly name = 'TransferInterrupted' as const;

    constructor(public readonly reason: InterruptReason) {

        super(`Transfer interrupted: ${reason}`);

    }

}

/**
 * Promise settled from outside, shared by `download()` callers across
 * pause and resume.
 */
class Deferred<T> {

    readonly promise: Promise<T>;
    #resolve: (value: T) => void = () => undefined;
    #reject: (error: Error) => void = () => undefined;

    constructor() {

        this.promise = new Promise<T>((resolve, reject) => {

            this.#resolve = resolve;
            this.#reject = reject;

        });

    }

    resolve(value: T): void {

        this.#resolve(value);

    }

    reject(error: Error): void {

        this.#reject(error);

    }

}

function interrupt(run: Run, reason: InterruptReason): void {

    if (run.reason === null) {

        run.reason = reason;
        run.controller.abort(reason);

        return;

    }

    // Cancel outranks a pause or timeout that has not settled yet
    if (reason === 'cancel') {

        run.reason = 'cancel';

    }

}

function checkInterrupted(run: Run): void {

    if (run.reason !== null) {

        throw new TransferInterrupted(run.reason);

    }

}

/**
 * Parse the TOTAL out of `Content-Range: bytes N-M/TOTAL`.
 */
export function parseContentRangeTotal(header: string | null): number | undefined {

    const match = header?.match(/\/(\d+)\s*$/);

    if (!match?.[1]) {

        return undefined;

    }

    return Number(match[1]);

}

function parseContentLength(header: string | null): number | undefined {

    if (header === null || !/^\d+$/.test(header.trim())) {

        return undefined;

    }

    return Number(header.trim());

}

// =============================================================================
// Downloader
// =============================================================================

export class Downloader {

    #url: string;
    #savePath: string;
    #partialPath: string;
    #transport: HttpTransport;
    #expectedSize: number;
    #checksum: string;
    #algorithm: ChecksumAlgorithm;
    #headers: Record<string, string>;
    #supportRange: boolean;
    #retry: RetryStrategy;
    #timeoutMs: number;
    #observer: UpdaterObserver;
    #speed: SpeedMeter;

    #status: DownloadStatus = 'idle';
    #transfer: TransferState | null = null;
    #progress: DownloadProgress = { downloaded: 0, total: 0, percent: 0 };
    #error: UpdateError | null = null;

    #pending: Deferred<string> | null = null;
    #run: Run | null = null;
    #loop: Promise<void> = Promise.resolve();
    #canceling: Promise<void> | null = null;
    #tokenCleanups: Array<() => void> = [];
    #startedAt = 0;

    constructor(options: DownloaderOptions) {

        this.#url = options.url;
        this.#savePath = options.savePath;
        this.#partialPath = `${options.savePath}${PARTIAL_SUFFIX}`;
        this.#transport = options.transport;
        this.#expectedSize = options.expectedSize ?? 0;
        this.#checksum = options.checksum?.trim() ?? '';
        this.#algorithm = options.checksumAlgorithm ?? DEFAULT_DOWNLOAD_OPTIONS.checksumAlgorithm;
        this.#headers = { ...options.headers };
        this.#supportRange = options.supportRange ?? DEFAULT_DOWNLOAD_OPTIONS.supportRange;
        this.#retry = options.retry ?? RetryStrategy.standard;
        this.#timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_OPTIONS.timeoutMs;
        this.#observer = options.observer ?? createObserver('downloader');
        this.#speed = new SpeedMeter(DEFAULT_DOWNLOAD_OPTIONS.speedWindowMs, options.clock);

    }

    // ─────────────────────────────────────────────────────────────
    // State
    // ─────────────────────────────────────────────────────────────

    get status(): DownloadStatus {

        return this.#status;

    }

    /**
     * Live transfer state; null before the first download and after
     * cancel or completion.
     */
    get transfer(): Readonly<TransferState> | null {

        return this.#transfer;

    }

    get progress(): Readonly<DownloadProgress> {

        return this.#progress;

    }

    /**
     * Failure of the last run, when status is 'error'.
     */
    get error(): UpdateError | null {

        return this.#error;

    }

    get url(): string {

        return this.#url;

    }

    get savePath(): string {

        return this.#savePath;

    }

    get partialPath(): string {

        return this.#partialPath;

    }

    /**
     * Subscribe to an event on this downloader's observer.
     *
     * @returns Cleanup function to unsubscribe
     */
    on<E extends UpdaterEventNames>(event: E, listener: UpdaterEventCallback<E>): () => void {

        return this.#observer.on(event, listener);

    }

    // ─────────────────────────────────────────────────────────────
    // Operations
    // ─────────────────────────────────────────────────────────────

    /**
     * Download the artifact.
     *
     * Resolves with the target path. Calling it again while a download
     * is running returns the same pending result; while paused it resumes.
     * A previous sidecar is resumed from, not discarded. Canceling any
     * caller's `token` cancels the shared transfer.
     *
     * @throws UpdateError DOWNLOAD_CANCELED, DOWNLOAD_TIMEOUT, MD5_MISMATCH,
     * FILE_ERROR, or the last transfer failure
     */
    download(token?: CancelToken): Promise<string> {

        if (this.#status === 'downloaded') {

            return Promise.resolve(this.#savePath);

        }

        let result: Promise<string>;

        if (this.#status === 'paused') {

            result = this.resume();

        }
        else if (this.#status === 'downloading' && this.#pending) {

            result = this.#pending.promise;

        }
        else {

            result = this.#begin();

        }

        if (token && this.#pending) {

            this.#watch(token);

        }

        return result;

    }

    /**
     * Pause a running download, keeping the sidecar.
     *
     * Resolves once the transfer has stopped. Does nothing unless
     * downloading.
     */
    async pause(): Promise<void> {

        const run = this.#run;

        if (this.#status !== 'downloading' || !run) {

            return;

        }

        interrupt(run, 'pause');

        await this.#loop;

    }

    /**
     * Continue a paused download from the sidecar.
     *
     * While downloading, returns the pending result. In any other state
     * behaves like `download()`.
     */
    async resume(): Promise<string> {

        if (this.#run?.reason === 'pause') {

            await this.#loop;

        }

        if (this.#status === 'paused' && this.#pending) {

            const pending = this.#pending;

            this.#observer.emit('download:resumed', {
                url: this.#url,
                offset: this.#transfer?.downloadedBytes ?? 0,
            });

            this.#startLoop();

            return pending.promise;

        }

        return this.download();

    }

    /**
     * Cancel the download and delete the sidecar.
     *
     * A pending `download()` rejects with DOWNLOAD_CANCELED. Does nothing
     * once canceled or downloaded.
     */
    async cancel(): Promise<void> {

        if (this.#status === 'canceled' || this.#status === 'downloaded') {

            return;

        }

        const run = this.#run;

        if (run) {

            interrupt(run, 'cancel');

            await this.#loop;

            return;

        }

        // The run has ended but its outcome is still being settled
        if (this.#status === 'downloading') {

            await this.#loop;

            return this.cancel();

        }

        await this.#finishCanceled();

    }

    /**
     * Resolves once no run is active and any cancellation requested
     * through a `CancelToken` has finished.
     */
    async whenSettled(): Promise<void> {

        await this.#loop;

        if (this.#canceling) {

            await this.#canceling;

        }

    }

    #begin(): Promise<string> {

        const pending = new Deferred<string>();

        this.#pending = pending;
        this.#error = null;
        this.#startedAt = Date.now();
        this.#transfer = {
            status: this.#status,
            downloadedBytes: 0,
            totalBytes: this.#expectedSize,
            attemptNumber: 0,
            partialFilePath: this.#partialPath,
        };

        this.#startLoop();

        return pending.promise;

    }

    /**
     * Cancel the pending download when `token` is canceled. Every caller
     * sharing the pending result may bring its own token.
     */
    #watch(token: CancelToken): void {

        this.#tokenCleanups.push(token.onCancel(() => {

            this.#canceling = this.cancel();

        }));

    }

    // ─────────────────────────────────────────────────────────────
    // Transfer loop
    // ─────────────────────────────────────────────────────────────

    #startLoop(): void {

        const run: Run = { controller: new AbortController(), reason: null };

        this.#run = run;
        this.#setStatus('downloading');
        this.#loop = this.#runLoop(run);

    }

    /**
     * Drive one run to its end and settle the outcome. Never rejects.
     */
    async #runLoop(run: Run): Promise<void> {

        const timer = setTimeout(() => interrupt(run, 'timeout'), this.#timeoutMs);

        timer.unref();

        const [path, err] = await attempt(() => this.#transferWithRetry(run));

        clearTimeout(timer);
        this.#run = null;

        if (!err) {

            this.#finishDownloaded(path);

            return;

        }

        switch (run.reason) {

        case 'pause':
            this.#finishPaused();
            return;
        case 'cancel':
            await this.#finishCanceled();
            return;
        case 'timeout':
            this.#finishFailed(new UpdateError(
                'DOWNLOAD_TIMEOUT',
                `Download did not finish within ${this.#timeoutMs}ms`,
                { cause: err },
            ));
            return;
        default:
            this.#finishFailed(toUpdateError(err, 'DOWNLOAD_ERROR', 'Download failed'));

        }

    }

    /**
     * Attempt the transfer, retrying transient failures.
     */
    async #transferWithRetry(run: Run): Promise<string> {

        let retries = 0;

        for (;;) {

            checkInterrupted(run);

            const [path, err] = await attempt(() => this.#attemptTransfer(run));

            if (!err) {

                return path;

            }

            if (run.reason !== null) {

                throw new TransferInterrupted(run.reason);

            }

            const error = toUpdateError(err, 'DOWNLOAD_ERROR', 'Transfer failed');

            if (!this.#retry.shouldRetry(error, retries)) {

                throw error;

            }

            const delayMs = this.#retry.getDelay(retries);

            this.#observer.emit('download:retry', {
                url: this.#url,
                attempt: retries + 1,
                delayMs,
                code: error.code,
                error: error.message,
            });

            await sleep(delayMs, undefined, { signal: run.controller.signal });

            retries++;

            if (this.#transfer) {

                this.#transfer.attemptNumber = retries;

            }

        }

    }

    /**
     * One request: resume from the sidecar, stream to disk, finalize.
     */
    async #attemptTransfer(run: Run): Promise<string> {

        const [, dirErr] = await attempt(() => mkdir(dirname(this.#savePath), { recursive: true }));

        if (dirErr) {

            throw toUpdateError(dirErr, 'FILE_ERROR', `Cannot create ${dirname(this.#savePath)}`);

        }

        const offset = await this.#partialSize();
        const known = this.#transfer?.totalBytes || this.#expectedSize;

        if (known > 0 && offset >= known) {

            this.#updateProgress(offset, known);

            return this.#finalize();

        }

        const ranged = this.#supportRange && offset > 0;

        this.#observer.emit('download:start', {
            url: this.#url,
            savePath: this.#savePath,
            offset: ranged ? offset : 0,
            attempt: this.#transfer?.attemptNumber ?? 0,
        });

        const response = await this.#transport.request(this.#url, {
            headers: ranged ? { ...this.#headers, range: `bytes=${offset}-` } : this.#headers,
            signal: run.controller.signal,
        });

        // A server that ignores Range answers 200 with the whole file
        const restart = response.status === 200;

        if (!restart && !(ranged && response.status === 206)) {

            await discardBody(response);

            throw new UpdateError(
                'DOWNLOAD_ERROR',
                `Unexpected HTTP status ${response.status} for ${this.#url}`,
                { cause: new HttpStatusError(response.status, response.statusText, this.#url) },
            );

        }

        const start = restart ? 0 : offset;
        const total = this.#resolveTotal(response, start, restart);
        const body = response.body;

        if (!body) {

            throw new UpdateError('INVALID_RESPONSE', `Empty response body for ${this.#url}`);

        }

        const downloaded = await this.#stream(run, body.getReader(), restart ? 'w' : 'a', start, total);

        if (total > 0 && downloaded < total) {

            throw new UpdateError(
                'NETWORK_ERROR',
                `Connection closed after ${downloaded} of ${total} bytes`,
            );

        }

        return this.#finalize();

    }

    #resolveTotal(response: TransportResponse, start: number, restart: boolean): number {

        const length = parseContentLength(response.headers.get('content-length'));

        if (restart) {

            return length ?? this.#expectedSize;

        }

        const rangeTotal = parseContentRangeTotal(response.headers.get('content-range'));

        if (rangeTotal !== undefined) {

            return rangeTotal;

        }

        return length !== undefined ? start + length : this.#expectedSize;

    }

    /**
     * Append the body to the sidecar, publishing progress per chunk.
     *
     * @returns Bytes in the sidecar when the stream stopped
     */
    async #stream(
        run: Run,
        reader: ByteStreamReader,
        mode: 'a' | 'w',
        start: number,
        total: number,
    ): Promise<number> {

        const [handle, openErr] = await attempt(() => open(this.#partialPath, mode));

        if (openErr) {

            await this.#teardown(run, reader, null, true);

            throw toUpdateError(openErr, 'FILE_ERROR', `Cannot open ${this.#partialPath}`);

        }

        let downloaded = start;
        let finished = false;

        this.#speed.reset();
        this.#updateProgress(downloaded, total);

        const [, streamErr] = await attempt(async () => {

            for (;;) {

                checkInterrupted(run);

                const { done, value } = await reader.read();

                if (done) {

                    finished = true;

                    return;

                }

                if (!value || value.byteLength === 0) {

                    continue;

                }

                await handle.write(value);

                downloaded += value.byteLength;

                this.#speed.record(value.byteLength);
                this.#updateProgress(downloaded, total);

            }

        });

        await this.#teardown(run, reader, handle, !finished);

        if (streamErr) {

            throw streamErr;

        }

        return downloaded;

    }

    /**
     * Release the body reader and the file handle.
     *
     * Failures are reported as warnings; the transfer outcome is decided
     * by the caller. An interrupted run aborts its own body, so a failed
     * body release is expected there and not reported.
     */
    async #teardown(
        run: Run,
        reader: ByteStreamReader,
        handle: FileHandle | null,
        cancelBody: boolean,
    ): Promise<void> {

        if (cancelBody) {

            const [, cancelErr] = await attempt(() => reader.cancel());

            if (cancelErr && run.reason === null) {

                this.#warn('Failed to release response body', cancelErr);

            }

        }

        reader.releaseLock();

        if (handle) {

            const [, closeErr] = await attempt(() => handle.close());

            if (closeErr) {

                this.#warn(`Failed to close ${this.#partialPath}`, closeErr);

            }

        }

    }

    /**
     * Verify the sidecar and move it onto the target path.
     */
    async #finalize(): Promise<string> {

        if (this.#checksum) {

            const [actual, hashErr] = await attempt(() => computeFileChecksum(this.#partialPath, this.#algorithm));

            if (hashErr) {

                throw toUpdateError(hashErr, 'FILE_ERROR', 'Checksum computation failed');

            }

            if (!checksumsMatch(this.#checksum, actual)) {

                await this.#removePartial();

                throw new UpdateError(
                    'MD5_MISMATCH',
                    `${this.#algorithm} mismatch: expected ${this.#checksum.toLowerCase()}, got ${actual}`,
                );

            }

            this.#observer.emit('download:verified', {
                url: this.#url,
                algorithm: this.#algorithm,
                checksum: actual,
            });

        }

        const [, rmErr] = await attempt(() => rm(this.#savePath, { force: true }));

        if (rmErr) {

            throw toUpdateError(rmErr, 'FILE_ERROR', `Cannot replace ${this.#savePath}`);

        }

        const [, renameErr] = await attempt(() => rename(this.#partialPath, this.#savePath));

        if (renameErr) {

            throw toUpdateError(renameErr, 'FILE_ERROR', `Cannot move download to ${this.#savePath}`);

        }

        return this.#savePath;

    }

    // ─────────────────────────────────────────────────────────────
    // Outcomes
    // ─────────────────────────────────────────────────────────────

    #finishDownloaded(path: string): void {

        const bytes = this.#progress.downloaded;

        this.#transfer = null;
        this.#setStatus('downloaded');

        this.#observer.emit('download:complete', {
            url: this.#url,
            path,
            bytes,
            durationMs: Date.now() - this.#startedAt,
        });

        this.#settle((pending) => pending.resolve(path));

    }

    #finishPaused(): void {

        this.#speed.reset();
        this.#setStatus('paused');

        this.#observer.emit('download:paused', {
            url: this.#url,
            downloaded: this.#transfer?.downloadedBytes ?? 0,
        });

    }

    async #finishCanceled(): Promise<void> {

        const downloaded = this.#transfer?.downloadedBytes ?? 0;

        await this.#removePartial();

        this.#transfer = null;
        this.#setStatus('canceled');

        this.#observer.emit('download:canceled', { url: this.#url, downloaded });

        this.#settle((pending) => pending.reject(new UpdateError('DOWNLOAD_CANCELED', 'Download canceled')));

    }

    #finishFailed(error: UpdateError): void {

        this.#error = error;
        this.#setStatus('error');

        this.#observer.emit('download:failed', {
            url: this.#url,
            code: error.code,
            error: error.message,
        });

        this.#settle((pending) => pending.reject(error));

    }

    #settle(action: (pending: Deferred<string>) => void): void {

        const pending = this.#pending;

        this.#pending = null;

        for (const cleanup of this.#tokenCleanups.splice(0)) {

            cleanup();

        }

        if (pending) {

            action(pending);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Helpers
    // ─────────────────────────────────────────────────────────────

    #setStatus(next: DownloadStatus): void {

        const previous = this.#status;

        if (previous === next) {

            return;

        }

        this.#status = next;

        if (this.#transfer) {

            this.#transfer.status = next;

        }

        this.#observer.emit('download:status', { url: this.#url, status: next, previous });

    }

    #updateProgress(downloaded: number, total: number): void {

        const speed = this.#speed.bytesPerSecond;
        const eta = estimateEta(total, downloaded, speed);

        if (this.#transfer) {

            this.#transfer.downloadedBytes = downloaded;
            this.#transfer.totalBytes = total;
            this.#transfer.speedBytesPerSec = speed;
            this.#transfer.etaSeconds = eta;

        }

        this.#progress = {
            downloaded,
            total,
            speed,
            eta,
            percent: progressPercent(downloaded, total),
        };

        this.#observer.emit('download:progress', { url: this.#url, ...this.#progress });

    }

    async #partialSize(): Promise<number> {

        const [stats, err] = await attempt(() => stat(this.#partialPath));

        if (err) {

            if (systemErrorCode(err) === 'ENOENT') {

                return 0;

            }

            throw toUpdateError(err, 'FILE_ERROR', `Cannot read ${this.#partialPath}`);

        }

        return stats.size;

    }

    async #removePartial(): Promise<void> {

        const [, err] = await attempt(() => rm(this.#partialPath, { force: true }));

        if (err) {

            this.#warn(`Failed to delete ${this.#partialPath}`, err);

        }

    }

    #warn(message: string, error: unknown): void {

        this.#observer.emit('download:warning', {
            url: this.#url,
            message,
            error: errorMessage(error),
        });

    }

}
