/**
 * Logger
 *
 * Stream-based logger that captures every updater observer event and
 * writes it to console and/or file streams, as compact lines or JSON
 * entries.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     observer,
 *     config: { level: 'info' },
 *     file: createWriteStream('updater.log', { flags: 'a' }),
 * })
 *
 * logger.start()
 * // every event is now written with formatting and redaction
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import type { UpdaterObserver } from '../observer.js';
import { isCi } from '../environment.js';
import { classifyEvent, getEntryLevelPriority, shouldLog } from './classifier.js';
import { formatEntry, generateMessage, sanitizeData, serializeEntry } from './formatter.js';
import { filterData } from './redact.js';
import type { EntryLevel, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Observer whose events are logged */
    observer: UpdaterObserver;

    config?: Partial<LoggerConfig>;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** File stream to write to; ended by `stop()` */
    file?: Writable;

    /** Console stream to write to (defaults to stdout in CI mode) */
    console?: Writable;
}

function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null) {

        return data === undefined ? {} : { value: data };

    }

    return Object.fromEntries(Object.entries(data));

}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #observer: UpdaterObserver;
    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #console: Writable | null = null;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions) {

        this.#observer = options.observer;
        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};

        if (options.console) {

            this.#console = options.console;

        }
        else if (isCi()) {

            this.#console = process.stdout;

        }

        if (options.file) {

            this.#file = options.file;

        }

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get isEnabled(): boolean {

        return this.#config.level !== 'silent' && (this.#console !== null || this.#file !== null);

    }

    /**
     * Merge into the context included with every entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    clearContext(): void {

        this.#context = {};

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup = this.#observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

    }

    /**
     * Stop capturing events and end the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        const filtered = filterData(data, this.#config.level);

        if (this.#config.json) {

            const entry = formatEntry(event, filtered, this.#context, this.#config.level === 'verbose');

            this.#write(serializeEntry(entry));

            return;

        }

        this.#writeLine(classifyEvent(event), `[${event}] ${generateMessage(event, filtered)}`, filtered);

    }

    /**
     * Write a compact log line.
     *
     * @example
     * ```
     * [2024-01-15T10:30:00.000Z] [INFO ] [check:start] Checking for updates (current 1.9.0)
     * ```
     */
    #writeLine(level: EntryLevel, message: string, data: Record<string, unknown>): void {

        const timestamp = new Date().toISOString();
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] ${message}`;

        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(sanitizeData(data))}`;

        }

        this.#write(line + '\n');

    }

    #write(line: string): void {

        if (this.#console) {

            this.#console.write(line);

        }

        if (this.#file) {

            this.#file.write(line);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running') {

            return;

        }

        if (getEntryLevelPriority(level) > LOG_LEVEL_PRIORITY[this.#config.level]) {

            return;

        }

        const filtered = data ? filterData(data, this.#config.level) : {};

        if (this.#config.json) {

            this.#write(serializeEntry({
                timestamp: new Date().toISOString(),
                level,
                event: 'log',
                message,
                ...(Object.keys(filtered).length > 0 ? { data: sanitizeData(filtered) } : {}),
                ...(Object.keys(this.#context).length > 0 ? { context: this.#context } : {}),
            }));

            return;

        }

        this.#writeLine(level, message, filtered);

    }

}
