/**
 * SDK Types.
 */
import type { Writable } from 'node:stream';

import type { UpdaterConfigLayer } from '../core/config/index.js';
import type { Installer } from '../core/installer/index.js';
import type { UpdaterObserver } from '../core/observer.js';
import type { FetchFunction } from '../core/transport/index.js';
import type { CheckUpdateCallback } from '../core/update/index.js';

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating an updater.
 *
 * @example
 * ```typescript
 * // Everything from code
 * const updater = await createUpdater({
 *     config: {
 *         currentVersion: '1.9.0',
 *         updateUrl: 'https://updates.example.com/latest.json',
 *         retry: { preset: 'fast' },
 *     },
 * })
 *
 * // From a YAML file, version from code
 * const updater = await createUpdater({
 *     file: './updater.yml',
 *     config: { currentVersion: app.version },
 * })
 *
 * // Env-only mode (CI/CD)
 * // UPDATER_CURRENT_VERSION=1.9.0 UPDATER_UPDATE_URL=https://...
 * const updater = await createUpdater()
 * ```
 */
export interface CreateUpdaterOptions {
    /** Highest-priority config values */
    config?: UpdaterConfigLayer;

    /** YAML config file (defaults to UPDATER_CONFIG) */
    file?: string;

    /** Environment for UPDATER_* variables (defaults to process.env) */
    env?: NodeJS.ProcessEnv;

    /** Metadata source used instead of `updateUrl` */
    onCheckUpdate?: CheckUpdateCallback;

    installer?: Installer;

    /** Replaces the pooled HTTP client */
    fetch?: FetchFunction;

    /** Shared observer; one is created when omitted */
    observer?: UpdaterObserver;

    /** Where log lines go (defaults to stderr); null disables logging */
    logStream?: Writable | null;

    /** Extra file stream for log output */
    logFile?: Writable;
}
