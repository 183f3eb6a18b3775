/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for output. Each JSON entry is a single line.
 */
import { attemptSync } from '@logosdx/utils'

import { formatBytes, formatEta, formatSpeed } from '../download/format.js'
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


function bytes(value: unknown): string {

    return typeof value === 'number' ? formatBytes(value) : String(value)
}

function optionalNumber(value: unknown): number | undefined {

    return typeof value === 'number' ? value : undefined
}


/**
 * Human-readable message templates for updater events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Check
    'check:start': (d) => d['url']
        ? `Checking ${d['url']} for updates (current ${d['currentVersion']})`
        : `Checking for updates (current ${d['currentVersion']})`,
    'check:complete': (d) => d['available']
        ? `Update available: ${d['currentVersion']} -> ${d['newVersion']} (${d['durationMs']}ms)`
        : `Up to date at ${d['currentVersion']} (${d['durationMs']}ms)`,
    'check:failed': (d) => `Update check failed [${d['code']}]: ${d['error']}`,

    // Download
    'download:start': (d) => Number(d['offset']) > 0
        ? `Downloading ${d['url']} from byte ${d['offset']} (attempt ${d['attempt']})`
        : `Downloading ${d['url']} (attempt ${d['attempt']})`,
    'download:status': (d) => `Download ${d['previous']} -> ${d['status']}`,
    'download:progress': (d) => `${bytes(d['downloaded'])} of ${bytes(d['total'])} (${d['percent']}%) at ${formatSpeed(optionalNumber(d['speed']))}, ${formatEta(optionalNumber(d['eta']))} left`,
    'download:retry': (d) => `Retrying download in ${d['delayMs']}ms (attempt ${d['attempt']}) after [${d['code']}]: ${d['error']}`,
    'download:paused': (d) => `Download paused at ${bytes(d['downloaded'])}`,
    'download:resumed': (d) => `Download resumed from ${bytes(d['offset'])}`,
    'download:verified': (d) => `Verified ${d['algorithm']} checksum ${d['checksum']}`,
    'download:complete': (d) => `Downloaded ${bytes(d['bytes'])} to ${d['path']} (${d['durationMs']}ms)`,
    'download:canceled': (d) => `Download canceled after ${bytes(d['downloaded'])}`,
    'download:failed': (d) => `Download failed [${d['code']}]: ${d['error']}`,
    'download:warning': (d) => `${d['message']}: ${d['error']}`,

    // Controller
    'controller:status': (d) => `Update status ${d['previous']} -> ${d['status']}`,

    // Install
    'install:start': (d) => `Installing ${d['version']} from ${d['path']}`,
    'install:complete': (d) => `Installed ${d['version']}`,
    'install:failed': (d) => `Install failed [${d['code']}]: ${d['error']}`,

    // Scheduler
    'scheduler:started': (d) => `Checking for updates every ${d['intervalMs']}ms`,
    'scheduler:stopped': (d) => `Scheduler stopped after ${d['checks']} checks`,
    'scheduler:skipped': (d) => `Skipped scheduled check (${d['reason']}), next in ${d['nextCheckInMs']}ms`,

    // Transport
    'transport:open': (d) => `HTTP pool open: ${d['maxConnectionsPerHost']} connections per host`,
    'transport:close': (d) => `HTTP pool closed after ${d['requests']} requests`,
    'transport:request': (d) => `${d['method']} ${d['url']} -> ${d['status']} (${d['durationMs']}ms)`,

    // Config
    'config:loaded': (d) => d['path']
        ? `Config loaded from ${d['path']}`
        : 'Config loaded',

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : d['error']}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('download:paused', { url: 'https://x/app.zip', downloaded: 600 })
 * // 'Download paused at 600 B'
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        const [message, err] = attemptSync(() => template(data))

        if (!err) {

            return message
        }
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the full payload (verbose mode)
 *
 * @example
 * ```typescript
 * const entry = formatEntry('check:failed', { code: 'TIMEOUT', error: 'timed out' }, undefined, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'error',
 * //     event: 'check:failed',
 * //     message: 'Update check failed [TIMEOUT]: timed out',
 * //     data: { code: 'TIMEOUT', error: 'timed out' },
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make payload values JSON-safe.
 * Errors keep name, message and the top of the stack.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        // Circular references and other non-serializable values
        const [, err] = attemptSync(() => JSON.stringify(value))

        result[key] = err ? String(value) : value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
