/**
 * Central event system for the updater.
 *
 * Core modules emit events, the CLI and logger subscribe. Business logic
 * never writes output directly.
 *
 * Unlike a process-wide singleton, every component accepts an engine so
 * several updaters can live side by side. `createUpdater()` shares one
 * engine between all the components it builds.
 *
 * @example
 * ```typescript
 * const observer = createObserver()
 *
 * // In core module - emit events at key points
 * observer.emit('download:progress', { url, downloaded, total, percent })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('download:complete', (data) => done(data.path))
 *
 * // Pattern matching for multiple events
 * observer.on(/^download:/, ({ event, data }) => logDownloadEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'
import type { DownloadStatus } from './download/types.js'
import type { ControllerStatus } from './controller/types.js'
import type { UpdateErrorCode } from './errors/codes.js'


/**
 * All events emitted by updater core modules.
 *
 * Events are namespaced by module:
 * - `check:*` - Update metadata checks
 * - `download:*` - Artifact transfer lifecycle
 * - `controller:*` - Orchestration status
 * - `install:*` - Installer hand-off
 * - `scheduler:*` - Periodic checks
 * - `transport:*` - HTTP connection pool
 * - `config:*` - Configuration loading
 * - `error` - Catch-all errors
 */
export interface UpdaterEvents {

    // Checker
    'check:start': { source: 'http' | 'callback'; url: string | null; currentVersion: string }
    'check:complete': { currentVersion: string; newVersion: string | null; available: boolean; durationMs: number }
    'check:failed': { code: UpdateErrorCode; error: string }

    // Downloader
    'download:start': { url: string; savePath: string; offset: number; attempt: number }
    'download:status': { url: string; status: DownloadStatus; previous: DownloadStatus }
    'download:progress': { url: string; downloaded: number; total: number; percent: number; speed?: number | undefined; eta?: number | undefined }
    'download:retry': { url: string; attempt: number; delayMs: number; code: UpdateErrorCode; error: string }
    'download:paused': { url: string; downloaded: number }
    'download:resumed': { url: string; offset: number }
    'download:verified': { url: string; algorithm: string; checksum: string }
    'download:complete': { url: string; path: string; bytes: number; durationMs: number }
    'download:canceled': { url: string; downloaded: number }
    'download:failed': { url: string; code: UpdateErrorCode; error: string }
    'download:warning': { url: string; message: string; error: string }

    // Controller
    'controller:status': { status: ControllerStatus; previous: ControllerStatus }

    // Installer
    'install:start': { path: string; version: string }
    'install:complete': { path: string; version: string }
    'install:failed': { path: string; code: UpdateErrorCode; error: string }

    // Scheduler
    'scheduler:started': { intervalMs: number; checkOnStart: boolean }
    'scheduler:stopped': { checks: number }
    'scheduler:skipped': { reason: 'cooldown' | 'busy'; nextCheckInMs: number }

    // Transport
    'transport:open': { maxConnectionsPerHost: number; keepAliveTimeoutMs: number }
    'transport:close': { requests: number }
    'transport:request': { method: string; url: string; status: number; durationMs: number }

    // Config
    'config:loaded': { path: string | null; sources: string[] }

    // Errors
    'error': { source: string; error: Error }
}

export type UpdaterEventNames = Events<UpdaterEvents>;
export type UpdaterEventCallback<E extends UpdaterEventNames> = ObserverEngine.EventCallback<UpdaterEvents[E]>
export type UpdaterObserver = ObserverEngine<UpdaterEvents>

/**
 * Create an observer engine for updater events.
 *
 * Enable debug mode with `UPDATER_DEBUG=1` to see all events as they occur.
 *
 * @example
 * ```typescript
 * const observer = createObserver()
 *
 * const cleanup = observer.on('download:complete', (data) => {
 *     console.log(`Saved ${data.bytes} bytes to ${data.path}`)
 * })
 *
 * // Clean up when done
 * cleanup()
 * ```
 */
export function createObserver(name = 'updater'): UpdaterObserver {

    return new ObserverEngine<UpdaterEvents>({
        name,
        spy: isDebug()
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined
    })
}

export type { ObserverEngine }
