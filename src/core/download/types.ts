/**
 * Download Types
 *
 * Type definitions for the resumable downloader.
 */
import type { UpdaterObserver } from '../observer.js';
import type { RetryStrategy } from '../retry/strategy.js';
import type { HttpTransport } from '../transport/http.js';

/**
 * Transfer lifecycle.
 *
 * ```
 * idle -> downloading <-> paused
 * downloading -> downloaded | error | canceled
 * ```
 */
export type DownloadStatus = 'idle' | 'downloading' | 'paused' | 'downloaded' | 'error' | 'canceled';

/**
 * Supported digest algorithms for artifact verification.
 */
export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256' | 'sha512';

/**
 * Live state of the current transfer.
 */
export interface TransferState {
    status: DownloadStatus;

    /** Bytes persisted in the sidecar file */
    downloadedBytes: number;

    /** Expected size; 0 while unknown */
    totalBytes: number;

    speedBytesPerSec?: number;
    etaSeconds?: number;

    /** Retries so far in the current run */
    attemptNumber: number;

    /** The `<target>.download` sidecar */
    partialFilePath: string;
}

/**
 * Progress snapshot published to observers.
 */
export interface DownloadProgress {
    downloaded: number;

    /** 0 while unknown */
    total: number;

    /** Bytes per second over the sliding window */
    speed?: number | undefined;

    /** Seconds remaining */
    eta?: number | undefined;

    /** 0-100, one decimal; 0 while the total is unknown */
    percent: number;
}

/**
 * Downloader configuration.
 */
export interface DownloaderOptions {
    url: string;

    /** Final artifact path; the sidecar lives next to it */
    savePath: string;

    transport: HttpTransport;

    /** Size announced by the metadata, used until the server reports one */
    expectedSize?: number;

    /** Expected hex digest; empty disables verification */
    checksum?: string;

    /** Defaults to md5 */
    checksumAlgorithm?: ChecksumAlgorithm;

    headers?: Record<string, string>;

    /** Resume with Range requests; defaults to true */
    supportRange?: boolean;

    /** Defaults to `RetryStrategy.standard` */
    retry?: RetryStrategy;

    /** Wall-clock budget per run; defaults to 30 minutes */
    timeoutMs?: number;

    observer?: UpdaterObserver;

    /** Millisecond clock for speed sampling */
    clock?: () => number;
}

/**
 * Default downloader configuration.
 */
export const DEFAULT_DOWNLOAD_OPTIONS = {
    checksumAlgorithm: 'md5',
    supportRange: true,
    timeoutMs: 30 * 60 * 1000,
    speedWindowMs: 3_000,
} as const;

/**
 * Suffix of the partial-download sidecar.
 */
export const PARTIAL_SUFFIX = '.download';
