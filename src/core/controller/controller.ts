/**
 * Update controller.
 *
 * Orchestrates the check -> download -> install flow and keeps the
 * state an application needs to render it: status, descriptor,
 * progress and the last error.
 *
 * Every operation resolves to a `[value, error]` tuple and never rejects.
 *
 * @example
 * ```typescript
 * const controller = new UpdateController({
 *     currentVersion: '1.9.0',
 *     updateUrl: 'https://updates.example.com/latest.json',
 *     transport,
 *     installer,
 * })
 *
 * controller.on('controller:status', ({ status }) => render(status))
 *
 * const [descriptor, err] = await controller.checkForUpdate()
 * if (descriptor) {
 *     await controller.download({ autoInstall: true })
 * }
 * ```
 */
import { access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';

import { attempt } from '@logosdx/utils';

import { Downloader } from '../download/downloader.js';
import type { CancelToken } from '../download/cancel.js';
import type { DownloadProgress, DownloadStatus } from '../download/types.js';
import { UpdateError } from '../errors/errors.js';
import { toUpdateError } from '../errors/normalize.js';
import type { Installer } from '../installer/types.js';
import { createObserver } from '../observer.js';
import type { UpdaterEventCallback, UpdaterEventNames, UpdaterObserver } from '../observer.js';
import type { HttpTransport } from '../transport/http.js';
import { UpdateChecker } from '../update/checker.js';
import type { UpdateDescriptor } from '../update/types.js';
import type {
    ControllerDownloadOptions,
    ControllerStatus,
    Result,
    UpdateControllerOptions,
} from './types.js';

/**
 * Downloader statuses mirrored onto the controller while a transfer runs.
 */
const MIRRORED_STATUSES: Partial<Record<DownloadStatus, ControllerStatus>> = {
    downloading: 'downloading',
    paused: 'paused',
    canceled: 'canceled',
};

const EMPTY_PROGRESS: DownloadProgress = Object.freeze({ downloaded: 0, total: 0, percent: 0 });

/**
 * Build the default artifact file name.
 *
 * @example
 * ```typescript
 * defaultArtifactName('1.10.0', 'https://cdn.example.com/app.zip?sig=1', 1700000000000)
 * // 'update-1.10.0-1700000000000.zip'
 * ```
 */
export function defaultArtifactName(version: string, url: string, timestamp: number): string {

    let pathname = url;
    const parsed = URL.canParse(url) ? new URL(url) : null;

    if (parsed) {

        pathname = parsed.pathname;

    }

    const ext = extname(pathname) || '.bin';
    const safeVersion = version.replace(/[^\w.-]/g, '_') || 'unknown';

    return `update-${safeVersion}-${timestamp}${ext}`;

}

export class UpdateController {

    #checker: UpdateChecker;
    #transport: HttpTransport | null;
    #observer: UpdaterObserver;
    #options: UpdateControllerOptions;
    #installer: Installer | null;

    #status: ControllerStatus = 'idle';
    #descriptor: UpdateDescriptor | null = null;
    #progress: DownloadProgress = EMPTY_PROGRESS;
    #error: UpdateError | null = null;
    #downloadedPath: string | null = null;

    #downloader: Downloader | null = null;
    #task: Promise<Result<string>> | null = null;
    #downloaderCleanup: Array<() => void> = [];
    #disposed = false;

    /**
     * @throws UpdateError when the checker configuration is invalid
     * (MISSING_URL, INVALID_METHOD, INVALID_BODY, APPLICATION_ERROR)
     */
    constructor(options: UpdateControllerOptions & { observer?: UpdaterObserver }) {

        this.#observer = options.observer ?? createObserver('controller');
        this.#options = options;
        this.#transport = options.transport ?? null;
        this.#installer = options.installer ?? null;
        this.#checker = new UpdateChecker({ ...options, observer: this.#observer });

    }

    // ─────────────────────────────────────────────────────────────
    // State
    // ─────────────────────────────────────────────────────────────

    get status(): ControllerStatus {

        return this.#status;

    }

    get descriptor(): UpdateDescriptor | null {

        return this.#descriptor;

    }

    get progress(): Readonly<DownloadProgress> {

        return this.#progress;

    }

    get error(): UpdateError | null {

        return this.#error;

    }

    get hasUpdate(): boolean {

        return this.#descriptor !== null;

    }

    get isForceUpdate(): boolean {

        return this.#descriptor?.isForceUpdate ?? false;

    }

    get isDownloading(): boolean {

        return this.#status === 'downloading';

    }

    get isDownloaded(): boolean {

        return this.#status === 'downloaded';

    }

    get downloadedFilePath(): string | null {

        return this.#downloadedPath;

    }

    get currentVersion(): string {

        return this.#checker.currentVersion;

    }

    /**
     * Replace the running version. Empty values are ignored.
     */
    set currentVersion(version: string) {

        this.#checker.currentVersion = version;

    }

    get observer(): UpdaterObserver {

        return this.#observer;

    }

    /**
     * Subscribe to an event on the controller's observer.
     *
     * Downloads started by this controller publish on the same observer.
     *
     * @returns Cleanup function to unsubscribe
     */
    on<E extends UpdaterEventNames>(event: E, listener: UpdaterEventCallback<E>): () => void {

        return this.#observer.on(event, listener);

    }

    // ─────────────────────────────────────────────────────────────
    // Check
    // ─────────────────────────────────────────────────────────────

    /**
     * Check for a newer version.
     *
     * Resolves to the descriptor, or null when the running version is
     * current.
     */
    async checkForUpdate(): Promise<Result<UpdateDescriptor | null>> {

        const blocked = this.#guard();

        if (blocked) {

            return [null, blocked];

        }

        if (this.currentVersion.trim() === '') {

            return this.#fail(new UpdateError('MISSING_VERSION', 'The current version is not set'));

        }

        if (this.#status === 'downloading' || this.#status === 'paused') {

            return [null, new UpdateError('APPLICATION_ERROR', 'Cannot check for updates while a download is active')];

        }

        this.#setStatus('checking');

        const [descriptor, err] = await attempt(() => this.#checker.checkForUpdate());

        if (err) {

            return this.#fail(toUpdateError(err, 'APPLICATION_ERROR'));

        }

        const sameArtifact = descriptor !== null
            && this.#descriptor !== null
            && descriptor.newVersion === this.#descriptor.newVersion
            && descriptor.downloadUrl === this.#descriptor.downloadUrl;

        // A different release starts a fresh download cycle
        if (!sameArtifact) {

            this.#releaseDownloader();
            this.#downloadedPath = null;
            this.#progress = EMPTY_PROGRESS;

        }

        this.#descriptor = descriptor;
        this.#error = null;

        if (!descriptor) {

            this.#setStatus('notAvailable');

        }
        else {

            this.#setStatus(this.#downloadedPath ? 'downloaded' : 'available');

        }

        return [descriptor, null];

    }

    // ─────────────────────────────────────────────────────────────
    // Download
    // ─────────────────────────────────────────────────────────────

    /**
     * Download the artifact of the current descriptor.
     *
     * While a download is running this returns its pending outcome; while
     * paused it resumes. Once downloaded it resolves with the same path
     * again.
     */
    download(options: ControllerDownloadOptions = {}, token?: CancelToken): Promise<Result<string>> {

        if (this.#task) {

            return this.#status === 'paused' ? this.resume() : this.#task;

        }

        const blocked = this.#guard();

        if (blocked) {

            return Promise.resolve([null, blocked]);

        }

        const descriptor = this.#descriptor;

        if (!descriptor) {

            return Promise.resolve(this.#fail(new UpdateError('NO_UPDATE', 'No update available to download')));

        }

        if (this.#status === 'downloaded' && this.#downloadedPath) {

            return Promise.resolve([this.#downloadedPath, null]);

        }

        if (descriptor.downloadUrl === '') {

            return Promise.resolve(this.#fail(new UpdateError('MISSING_URL', 'The update has no download URL')));

        }

        if (!this.#transport) {

            return Promise.resolve(this.#fail(new UpdateError('APPLICATION_ERROR', 'Downloading requires an HTTP transport')));

        }

        const downloader = this.#downloader ?? this.#createDownloader(descriptor, this.#transport, options.savePath);
        const autoInstall = options.autoInstall ?? this.#options.autoInstall ?? false;

        const task = this.#track(downloader, downloader.download(token), autoInstall);

        this.#task = task;

        return task;

    }

    /**
     * Pause the running download. The sidecar is kept for `resume()`.
     */
    async pause(): Promise<Result<void>> {

        const downloader = this.#downloader;

        if (!downloader || this.#status !== 'downloading') {

            return [null, new UpdateError('APPLICATION_ERROR', 'No download in progress')];

        }

        await downloader.pause();

        return [undefined, null];

    }

    /**
     * Resume a paused download.
     *
     * Resolves with the same outcome as the pending `download()` call.
     */
    async resume(): Promise<Result<string>> {

        const downloader = this.#downloader;

        if (!downloader || this.#status !== 'paused') {

            return [null, new UpdateError('APPLICATION_ERROR', 'No paused download to resume')];

        }

        const task = this.#task;
        const [path, err] = await attempt(() => downloader.resume());

        if (task) {

            return task;

        }

        return err ? [null, toUpdateError(err, 'DOWNLOAD_ERROR')] : [path, null];

    }

    /**
     * Cancel the download and delete its partial file.
     */
    async cancel(): Promise<Result<void>> {

        const downloader = this.#downloader;

        if (!downloader || (this.#status !== 'downloading' && this.#status !== 'paused')) {

            return [null, new UpdateError('APPLICATION_ERROR', 'No download to cancel')];

        }

        const task = this.#task;

        await downloader.cancel();

        if (task) {

            await task;

        }

        return [undefined, null];

    }

    // ─────────────────────────────────────────────────────────────
    // Install
    // ─────────────────────────────────────────────────────────────

    /**
     * Hand the downloaded artifact to the installer.
     */
    async install(): Promise<Result<string>> {

        const path = this.#downloadedPath;
        const descriptor = this.#descriptor;

        if (this.#status !== 'downloaded' || !path || !descriptor) {

            return [null, new UpdateError('APPLICATION_ERROR', 'No downloaded update to install')];

        }

        const [, accessErr] = await attempt(() => access(path));

        if (accessErr) {

            return this.#installFailed(path, toUpdateError(accessErr, 'FILE_ERROR', 'Downloaded file is missing'));

        }

        const installer = this.#installer;

        if (!installer || (installer.supports && !installer.supports(process.platform))) {

            return this.#installFailed(path, new UpdateError(
                'PLATFORM_NOT_SUPPORTED',
                `No installer available for platform '${process.platform}'`,
            ));

        }

        this.#observer.emit('install:start', { path, version: descriptor.newVersion });

        const [, err] = await attempt(() => installer.install(path, descriptor));

        if (err) {

            const error = err instanceof UpdateError
                ? err
                : new UpdateError('INSTALL_FAILED', `Installation failed: ${err.message}`, { cause: err });

            return this.#installFailed(path, error);

        }

        this.#observer.emit('install:complete', { path, version: descriptor.newVersion });

        return [path, null];

    }

    // ─────────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Return to idle, canceling any active download.
     */
    async reset(): Promise<void> {

        if (this.#status === 'downloading' || this.#status === 'paused') {

            await this.cancel();

        }

        this.#releaseDownloader();
        this.#descriptor = null;
        this.#progress = EMPTY_PROGRESS;
        this.#error = null;
        this.#downloadedPath = null;
        this.#setStatus('idle');

    }

    /**
     * Cancel any active download and stop publishing. Further operations
     * fail with APPLICATION_ERROR.
     */
    async dispose(): Promise<void> {

        if (this.#disposed) {

            return;

        }

        if (this.#status === 'downloading' || this.#status === 'paused') {

            await this.cancel();

        }

        this.#releaseDownloader();
        this.#disposed = true;

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    #createDownloader(descriptor: UpdateDescriptor, transport: HttpTransport, savePath?: string): Downloader {

        const options = this.#options;
        const target = savePath ?? join(
            options.downloadDir ?? tmpdir(),
            defaultArtifactName(descriptor.newVersion, descriptor.downloadUrl, Date.now()),
        );

        const downloader = new Downloader({
            url: descriptor.downloadUrl,
            savePath: target,
            transport,
            observer: this.#observer,
            ...(descriptor.fileSize !== undefined ? { expectedSize: descriptor.fileSize } : {}),
            ...(descriptor.checksum !== undefined ? { checksum: descriptor.checksum } : {}),
            ...(options.checksumAlgorithm ? { checksumAlgorithm: options.checksumAlgorithm } : {}),
            ...(options.downloadHeaders ? { headers: options.downloadHeaders } : {}),
            ...(options.supportRange !== undefined ? { supportRange: options.supportRange } : {}),
            ...(options.retry ? { retry: options.retry } : {}),
            ...(options.downloadTimeoutMs !== undefined ? { timeoutMs: options.downloadTimeoutMs } : {}),
        });

        // The observer may be shared with other downloaders; only follow ours
        this.#downloaderCleanup.push(
            downloader.on('download:status', (data) => {

                if (data.url !== downloader.url || this.#downloader !== downloader) {

                    return;

                }

                const mirrored = MIRRORED_STATUSES[data.status];

                if (mirrored) {

                    this.#setStatus(mirrored);

                }

            }),
            downloader.on('download:progress', (data) => {

                if (data.url === downloader.url && this.#downloader === downloader) {

                    this.#progress = downloader.progress;

                }

            }),
        );

        this.#downloader = downloader;

        return downloader;

    }

    /**
     * Settle a download: record the path, install when asked, map
     * failures onto the controller state.
     */
    async #track(downloader: Downloader, transfer: Promise<string>, autoInstall: boolean): Promise<Result<string>> {

        const [path, err] = await attempt(() => transfer);

        this.#task = null;

        if (err) {

            const error = toUpdateError(err, 'DOWNLOAD_ERROR');

            if (error.code === 'DOWNLOAD_CANCELED') {

                this.#error = error;
                this.#setStatus('canceled');

                return [null, error];

            }

            return this.#fail(error);

        }

        this.#downloadedPath = path;
        this.#progress = downloader.progress;
        this.#error = null;
        this.#setStatus('downloaded');

        if (autoInstall) {

            const [, installErr] = await this.install();

            if (installErr) {

                return [null, installErr];

            }

        }

        return [path, null];

    }

    #installFailed(path: string, error: UpdateError): Result<string> {

        this.#error = error;

        this.#observer.emit('install:failed', { path, code: error.code, error: error.message });

        return [null, error];

    }

    #releaseDownloader(): void {

        for (const cleanup of this.#downloaderCleanup) {

            cleanup();

        }

        this.#downloaderCleanup = [];
        this.#downloader = null;
        this.#task = null;

    }

    #guard(): UpdateError | null {

        return this.#disposed
            ? new UpdateError('APPLICATION_ERROR', 'The update controller has been disposed')
            : null;

    }

    #fail(error: UpdateError): [null, UpdateError] {

        this.#error = error;
        this.#setStatus('error');

        return [null, error];

    }

    #setStatus(next: ControllerStatus): void {

        const previous = this.#status;

        if (previous === next) {

            return;

        }

        this.#status = next;

        this.#observer.emit('controller:status', { status: next, previous });

    }

}
