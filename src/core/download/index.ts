/**
 * Download module.
 *
 * Resumable, verified artifact transfer.
 */
export { Downloader, parseContentRangeTotal } from './downloader.js';
export { CancelToken } from './cancel.js';
export { SpeedMeter, estimateEta } from './speed.js';
export { computeFileChecksum, checksumsMatch } from './checksum.js';
export { formatSpeed, formatEta, formatBytes, progressRatio, progressPercent } from './format.js';
export { DEFAULT_DOWNLOAD_OPTIONS, PARTIAL_SUFFIX } from './types.js';
export type {
    DownloadStatus,
    DownloadProgress,
    DownloaderOptions,
    TransferState,
    ChecksumAlgorithm,
} from './types.js';
