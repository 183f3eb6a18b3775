/**
 * Logger Types
 *
 * The logger captures updater observer events and streams them to the
 * console and/or a file with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'verbose'];

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level in the log output.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single log entry. Written one JSON object per line in JSON mode.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "download:complete",
 *     "message": "Downloaded 1.0 KB to /tmp/update-1.10.0.zip (120ms)",
 *     "context": { "app": "desktop" }
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Minimum level to capture */
    level: LogLevel;

    /** Write JSON entries instead of compact lines */
    json: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    json: false,
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
