/**
 * In-app updater SDK
 *
 * Programmatic access to update checks, resumable downloads and install
 * hand-off.
 *
 * @example
 * ```typescript
 * import { createUpdater } from 'inapp-updater'
 *
 * const updater = await createUpdater({
 *     config: {
 *         currentVersion: '1.9.0',
 *         updateUrl: 'https://updates.example.com/latest.json',
 *     },
 *     installer,
 * })
 *
 * const { controller } = updater
 *
 * controller.on('download:progress', ({ percent }) => progressBar.update(percent))
 *
 * const [descriptor] = await controller.checkForUpdate()
 * if (descriptor) {
 *     const [path, err] = await controller.download()
 * }
 *
 * await updater.close()
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { resolveConfig } from '../core/config/index.js';
import type { UpdaterConfig } from '../core/config/index.js';
import { UpdateController, UpdateScheduler } from '../core/controller/index.js';
import { Logger } from '../core/logger/index.js';
import { createObserver } from '../core/observer.js';
import type { UpdaterObserver } from '../core/observer.js';
import { RetryStrategy } from '../core/retry/index.js';
import { HttpTransport } from '../core/transport/index.js';
import type { CreateUpdaterOptions } from './types.js';
import { Updater } from './updater.js';

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Build the retry strategy from a preset and its field overrides.
 *
 * @example
 * ```typescript
 * buildRetryStrategy({ preset: 'fast', maxAttempts: 2 })
 * // RetryStrategy(2, 500ms, x1.5, max 10000ms, jitter)
 * ```
 */
export function buildRetryStrategy(retry: UpdaterConfig['retry']): RetryStrategy {

    return RetryStrategy.preset(retry.preset).with({
        ...(retry.maxAttempts !== undefined ? { maxAttempts: retry.maxAttempts } : {}),
        ...(retry.initialDelayMs !== undefined ? { initialDelayMs: retry.initialDelayMs } : {}),
        ...(retry.backoffFactor !== undefined ? { backoffFactor: retry.backoffFactor } : {}),
        ...(retry.maxDelayMs !== undefined ? { maxDelayMs: retry.maxDelayMs } : {}),
        ...(retry.jitter !== undefined ? { enableJitter: retry.jitter } : {}),
    });

}

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Assemble an updater from a resolved config.
 *
 * The transport's connection pool is opened here and stays open until
 * `updater.close()`.
 *
 * @throws UpdateError when the metadata source is misconfigured
 */
export async function buildUpdater(
    config: UpdaterConfig,
    options: Omit<CreateUpdaterOptions, 'config' | 'file' | 'env'> & { observer: UpdaterObserver },
): Promise<Updater> {

    const observer = options.observer;
    const logStream = options.logStream === undefined ? process.stderr : options.logStream;

    const silenced = logStream === null && !options.logFile;

    const logger = new Logger({
        observer,
        config: silenced ? { ...config.logging, level: 'silent' } : config.logging,
        ...(logStream ? { console: logStream } : {}),
        ...(options.logFile ? { file: options.logFile } : {}),
    });

    logger.start();

    const transport = new HttpTransport({
        maxConnectionsPerHost: config.transport.maxConnectionsPerHost,
        keepAliveTimeoutMs: config.transport.keepAliveTimeoutMs,
        requestTimeoutMs: config.transport.requestTimeoutMs,
        observer,
        ...(options.fetch ? { fetch: options.fetch } : {}),
    });

    const [controller, err] = attemptSync(() => new UpdateController({
        currentVersion: config.currentVersion,
        ...(options.onCheckUpdate
            ? { onCheckUpdate: options.onCheckUpdate }
            : { updateUrl: config.updateUrl ?? '' }),
        transport,
        method: config.method,
        headers: config.headers,
        ...(config.body !== undefined ? { body: config.body } : {}),
        fieldKeys: config.fieldKeys,
        ...(config.download.directory ? { downloadDir: config.download.directory } : {}),
        retry: buildRetryStrategy(config.retry),
        supportRange: config.download.supportRange,
        downloadTimeoutMs: config.download.timeoutMs,
        checksumAlgorithm: config.download.checksumAlgorithm,
        ...(options.installer ? { installer: options.installer } : {}),
        autoInstall: config.autoInstall,
        observer,
    }));

    if (err) {

        logger.error(`Invalid updater setup: ${err.message}`);

        await transport.close();
        await logger.stop();

        throw err;

    }

    const scheduler = new UpdateScheduler(controller, {
        intervalMs: config.schedule.intervalMs,
        cooldownMs: config.schedule.cooldownMs,
        observer,
    });

    return new Updater({ config, observer, logger, transport, controller, scheduler });

}

/**
 * Create an updater.
 *
 * Configuration is resolved using the full priority chain:
 * defaults <- YAML file <- UPDATER_* env <- `options.config`
 *
 * @throws ConfigValidationError when the merged config is invalid
 * @throws UpdateError when the metadata source is misconfigured
 *
 * @example
 * ```typescript
 * const updater = await createUpdater({
 *     file: './updater.yml',
 *     config: { currentVersion: '1.9.0', schedule: { intervalMs: 21_600_000 } },
 * })
 *
 * updater.scheduler.start()
 * ```
 */
export async function createUpdater(options: CreateUpdaterOptions = {}): Promise<Updater> {

    const observer = options.observer ?? createObserver();

    const config = await resolveConfig({
        observer,
        ...(options.file ? { file: options.file } : {}),
        ...(options.env ? { env: options.env } : {}),
        ...(options.config ? { overrides: options.config } : {}),
    });

    return buildUpdater(config, { ...options, observer });

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export { Updater } from './updater.js';
export type { CreateUpdaterOptions } from './types.js';

export * from '../core/errors/index.js';
export * from '../core/update/index.js';
export * from '../core/transport/index.js';
export * from '../core/retry/index.js';
export * from '../core/download/index.js';
export * from '../core/controller/index.js';
export * from '../core/config/index.js';
export type { Installer } from '../core/installer/index.js';
export { Logger, type LogLevel, type LoggerOptions } from '../core/logger/index.js';
export {
    createObserver,
    type UpdaterEvents,
    type UpdaterEventNames,
    type UpdaterEventCallback,
    type UpdaterObserver,
} from '../core/observer.js';
