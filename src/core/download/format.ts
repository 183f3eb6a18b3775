/**
 * Progress formatting for display.
 */
import type { DownloadProgress } from './types.js';

const KB = 1024;
const MB = 1024 * 1024;

/**
 * Completed share of a transfer, 0-1. 0 while the total is unknown.
 */
export function progressRatio(progress: Pick<DownloadProgress, 'downloaded' | 'total'>): number {

    if (progress.total <= 0) {

        return 0;

    }

    return Math.min(progress.downloaded / progress.total, 1);

}

/**
 * Percentage with one decimal.
 *
 * @example
 * ```typescript
 * progressPercent(600, 1000)  // 60
 * progressPercent(1, 3)       // 33.3
 * ```
 */
export function progressPercent(downloaded: number, total: number): number {

    return Math.round(progressRatio({ downloaded, total }) * 1000) / 10;

}

/**
 * Format a transfer speed.
 *
 * @example
 * ```typescript
 * formatSpeed(512)          // '512 B/s'
 * formatSpeed(1536)         // '1.5 KB/s'
 * formatSpeed(3 * 1048576)  // '3.0 MB/s'
 * formatSpeed(undefined)    // 'unknown'
 * ```
 */
export function formatSpeed(bytesPerSecond: number | undefined): string {

    if (bytesPerSecond === undefined) {

        return 'unknown';

    }

    if (bytesPerSecond < KB) {

        return `${Math.round(bytesPerSecond)} B/s`;

    }

    if (bytesPerSecond < MB) {

        return `${(bytesPerSecond / KB).toFixed(1)} KB/s`;

    }

    return `${(bytesPerSecond / MB).toFixed(1)} MB/s`;

}

/**
 * Format remaining time.
 *
 * @example
 * ```typescript
 * formatEta(45)    // '45s'
 * formatEta(125)   // '2m 5s'
 * formatEta(3780)  // '1h 3m'
 * ```
 */
export function formatEta(seconds: number | undefined): string {

    if (seconds === undefined || seconds < 0) {

        return 'unknown';

    }

    if (seconds < 60) {

        return `${seconds}s`;

    }

    if (seconds < 3600) {

        return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;

    }

    return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;

}

/**
 * Format a byte count.
 *
 * @example
 * ```typescript
 * formatBytes(1000)     // '1000 B'
 * formatBytes(1048576)  // '1.0 MB'
 * ```
 */
export function formatBytes(bytes: number): string {

    if (bytes < KB) {

        return `${bytes} B`;

    }

    if (bytes < MB) {

        return `${(bytes / KB).toFixed(1)} KB`;

    }

    return `${(bytes / MB).toFixed(1)} MB`;

}
