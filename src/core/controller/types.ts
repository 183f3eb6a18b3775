/**
 * Controller Types
 */
import type { UpdateError } from '../errors/errors.js';
import type { ChecksumAlgorithm } from '../download/types.js';
import type { Installer } from '../installer/types.js';
import type { RetryStrategy } from '../retry/strategy.js';
import type { UpdateCheckerOptions } from '../update/types.js';

/**
 * Overall update lifecycle as seen by the application.
 */
export type ControllerStatus =
    | 'idle'
    | 'checking'
    | 'available'
    | 'notAvailable'
    | 'downloading'
    | 'paused'
    | 'downloaded'
    | 'canceled'
    | 'error';

/**
 * Outcome of a controller operation. Operations never reject.
 *
 * @example
 * ```typescript
 * const [descriptor, err] = await controller.checkForUpdate()
 * if (err) {
 *     console.error(err.code, err.message)
 *     return
 * }
 * ```
 */
export type Result<T> = [T, null] | [null, UpdateError];

/**
 * Controller configuration.
 *
 * Checker options are passed through; the controller supplies the
 * observer itself.
 */
export interface UpdateControllerOptions extends Omit<UpdateCheckerOptions, 'observer'> {
    /** Where artifacts are saved when `download()` gets no path */
    downloadDir?: string;

    retry?: RetryStrategy;

    /** Resume with Range requests; defaults to true */
    supportRange?: boolean;

    /** Wall-clock budget per download run */
    downloadTimeoutMs?: number;

    checksumAlgorithm?: ChecksumAlgorithm;

    /** Extra headers for artifact requests */
    downloadHeaders?: Record<string, string>;

    installer?: Installer;

    /** Hand the artifact to the installer as soon as it is verified */
    autoInstall?: boolean;
}

/**
 * Per-call download options.
 */
export interface ControllerDownloadOptions {
    /** Target path; defaults to `<downloadDir>/update-<version>-<timestamp><ext>` */
    savePath?: string;

    /** Overrides the controller's `autoInstall` */
    autoInstall?: boolean;
}
