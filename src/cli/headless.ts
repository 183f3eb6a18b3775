/**
 * Headless event output for the CLI.
 *
 * Prints updater events as they happen, either as short human-readable
 * lines or as one JSON object per event.
 *
 * @example
 * ```bash
 * # Human output
 * inapp-updater download --url https://updates.example.com/latest.json --current 1.9.0
 *
 * # JSON output for scripting
 * inapp-updater download --json ... | jq 'select(.event == "download:progress") | .percent'
 * ```
 */
import type { Writable } from 'node:stream'

import ansis from 'ansis'

import { formatBytes, formatEta, formatSpeed } from '../core/download/index.js'
import type { UpdaterEventNames, UpdaterEvents, UpdaterObserver } from '../core/observer.js'


/**
 * Progress lines are printed at most once per this many percent.
 */
const PROGRESS_STEP = 10


function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null) {

        return {}
    }

    return Object.fromEntries(
        Object.entries(data).map(([key, value]) => [key, value instanceof Error ? value.message : value]),
    )
}


/**
 * Event printer for headless mode.
 *
 * Subscribes to observer events and writes them to a stream.
 */
export class HeadlessLogger {

    #json: boolean
    #observer: UpdaterObserver
    #out: Writable
    #cleanup: Array<() => void> = []
    #lastProgressStep = -1

    constructor(observer: UpdaterObserver, json: boolean, out: Writable = process.stdout) {

        this.#observer = observer
        this.#json = json
        this.#out = out
    }

    /**
     * Start printing observer events.
     */
    start(): void {

        if (this.#json) {

            // Subscribe to all events using pattern matching
            this.#cleanup.push(this.#observer.on(/./, ({ event, data }) => {

                this.#write(JSON.stringify({
                    event: String(event),
                    timestamp: new Date().toISOString(),
                    ...toRecord(data),
                }))
            }))

            return
        }

        this.#print('check:start', (d) => ansis.dim(`Checking for updates (current ${d.currentVersion})...`))
        this.#print('check:complete', (d) => d.available
            ? `${ansis.green('✓')} Update available: ${d.currentVersion} -> ${ansis.bold(String(d.newVersion))}`
            : `${ansis.green('✓')} Up to date (${d.currentVersion})`)
        this.#print('check:failed', (d) => `${ansis.red('✗')} Update check failed [${d.code}]: ${d.error}`)

        this.#print('download:start', (d) => d.offset > 0
            ? `Resuming ${d.url} from ${formatBytes(d.offset)}...`
            : `Downloading ${d.url}...`)
        this.#print('download:progress', (d) => this.#progressLine(d))
        this.#print('download:retry', (d) => `${ansis.yellow('⚠')} ${d.error}, retrying in ${d.delayMs}ms (attempt ${d.attempt})`)
        this.#print('download:verified', (d) => `${ansis.green('✓')} ${d.algorithm} checksum verified`)
        this.#print('download:complete', (d) => `${ansis.green('✓')} Saved ${formatBytes(d.bytes)} to ${d.path} (${d.durationMs}ms)`)
        this.#print('download:canceled', () => `${ansis.yellow('○')} Download canceled`)
        this.#print('download:failed', (d) => `${ansis.red('✗')} Download failed [${d.code}]: ${d.error}`)
        this.#print('download:warning', (d) => `${ansis.yellow('⚠')} ${d.message}: ${d.error}`)

        this.#print('install:complete', (d) => `${ansis.green('✓')} Installed ${d.version}`)
        this.#print('install:failed', (d) => `${ansis.red('✗')} Install failed [${d.code}]: ${d.error}`)

        this.#print('error', (d) => `${ansis.red('Error')} [${d.source}]: ${d.error.message}`)
    }

    /**
     * Stop printing and clean up subscriptions.
     */
    stop(): void {

        for (const cleanup of this.#cleanup) {

            cleanup()
        }

        this.#cleanup = []
    }

    /**
     * Write a single line.
     */
    line(text: string): void {

        this.#write(text)
    }

    #print<E extends UpdaterEventNames>(event: E, format: (data: UpdaterEvents[E]) => string | null): void {

        this.#cleanup.push(this.#observer.on(event, (data) => {

            const text = format(data)

            if (text !== null) {

                this.#write(text)
            }
        }))
    }

    #progressLine(d: UpdaterEvents['download:progress']): string | null {

        if (d.total <= 0) {

            return null
        }

        const step = Math.floor(d.percent / PROGRESS_STEP)

        if (step === this.#lastProgressStep) {

            return null
        }

        this.#lastProgressStep = step

        return ansis.dim(`  ${d.percent}% of ${formatBytes(d.total)} at ${formatSpeed(d.speed)}, ${formatEta(d.eta)} left`)
    }

    #write(text: string): void {

        this.#out.write(text + '\n')
    }
}
