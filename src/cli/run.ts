/**
 * CLI command runner.
 *
 * Builds an updater from flags, env and an optional config file, runs one
 * command and maps the outcome to an exit code.
 */
import type { Writable } from 'node:stream'

import { attempt } from '@logosdx/utils'
import type { ZodType } from 'zod'

import { ConfigValidationError, LogLevelSchema, RetryPresetSchema } from '../core/config/index.js'
import type { UpdaterConfigLayer } from '../core/config/index.js'
import { UpdateError } from '../core/errors/index.js'
import { createObserver } from '../core/observer.js'
import type { FetchFunction } from '../core/transport/index.js'
import { descriptorToRecord } from '../core/update/index.js'
import type { UpdateDescriptor } from '../core/update/index.js'
import { createUpdater } from '../sdk/index.js'
import type { Updater } from '../sdk/index.js'
import { HeadlessLogger } from './headless.js'
import { CLI_COMMANDS, EXIT_CODES } from './types.js'
import type { CliCommand, CliFlags, ExitCode } from './types.js'


/**
 * Streams and hooks the runner talks to.
 */
export interface CliIo {
    stdout: Writable
    stderr: Writable
    env: NodeJS.ProcessEnv
    fetch?: FetchFunction
}


export function isCliCommand(value: string | undefined): value is CliCommand {

    return CLI_COMMANDS.some((command) => command === value)
}


function parseFlag<T>(
    flag: string,
    value: string,
    schema: ZodType<T>,
): T {

    const result = schema.safeParse(value)

    if (!result.success) {

        throw new ConfigValidationError(`Invalid --${flag} '${value}'`, flag, result.error.issues)
    }

    return result.data
}


/**
 * Map CLI flags onto config overrides.
 *
 * @throws ConfigValidationError for an unknown retry preset or log level
 *
 * @example
 * ```typescript
 * flagsToConfig({ url: 'https://x/latest.json', current: '1.9.0', retry: 'fast', json: false })
 * // { updateUrl: 'https://x/latest.json', currentVersion: '1.9.0', retry: { preset: 'fast' } }
 * ```
 */
export function flagsToConfig(flags: CliFlags): UpdaterConfigLayer {

    const config: UpdaterConfigLayer = {}

    if (flags.url) config.updateUrl = flags.url
    if (flags.current) config.currentVersion = flags.current
    if (flags.dir) config.download = { directory: flags.dir }
    if (flags.retry) config.retry = { preset: parseFlag('retry', flags.retry, RetryPresetSchema) }

    if (flags.logLevel) {

        config.logging = { level: parseFlag('log-level', flags.logLevel, LogLevelSchema), json: flags.json }
    }

    return config
}


function describe(descriptor: UpdateDescriptor | null): Record<string, unknown> | null {

    return descriptor ? descriptorToRecord(descriptor) : null
}


async function runCheck(updater: Updater, out: HeadlessLogger, json: boolean): Promise<ExitCode> {

    const [descriptor, err] = await updater.controller.checkForUpdate()

    if (err) {

        return EXIT_CODES.failure
    }

    if (json) {

        out.line(JSON.stringify({ result: 'check', available: descriptor !== null, update: describe(descriptor) }))
    }
    else if (descriptor?.changelog) {

        out.line(descriptor.changelog)
    }

    return EXIT_CODES.success
}


async function runDownload(updater: Updater, out: HeadlessLogger, json: boolean): Promise<ExitCode> {

    const [descriptor, checkErr] = await updater.controller.checkForUpdate()

    if (checkErr) {

        return EXIT_CODES.failure
    }

    if (!descriptor) {

        if (json) {

            out.line(JSON.stringify({ result: 'download', available: false, path: null }))
        }

        return EXIT_CODES.success
    }

    const [path, err] = await updater.controller.download()

    if (err) {

        return EXIT_CODES.failure
    }

    if (json) {

        out.line(JSON.stringify({ result: 'download', available: true, path, update: describe(descriptor) }))
    }

    return EXIT_CODES.success
}


function reportError(io: CliIo, json: boolean, error: Error): void {

    const code = error instanceof UpdateError ? error.code : error.name

    io.stderr.write(json
        ? JSON.stringify({ error: code, message: error.message }) + '\n'
        : `Error: ${error.message}\n`)
}


/**
 * Run one command.
 *
 * @returns Exit code: 0 on success (including "no update"), 1 when the
 * check or download fails, 2 for usage and configuration errors
 */
export async function runCommand(
    command: string | undefined,
    flags: CliFlags,
    io: CliIo,
): Promise<ExitCode> {

    if (!isCliCommand(command)) {

        io.stderr.write(command
            ? `Unknown command '${command}'. Use one of: ${CLI_COMMANDS.join(', ')}\n`
            : `Missing command. Use one of: ${CLI_COMMANDS.join(', ')}\n`)

        return EXIT_CODES.usage
    }

    const observer = createObserver('cli')

    const [updater, err] = await attempt(() => createUpdater({
        observer,
        config: flagsToConfig(flags),
        env: io.env,
        logStream: flags.logLevel ? io.stderr : null,
        ...(flags.config ? { file: flags.config } : {}),
        ...(io.fetch ? { fetch: io.fetch } : {}),
    }))

    if (err) {

        reportError(io, flags.json, err)

        return err instanceof ConfigValidationError || err instanceof UpdateError
            ? EXIT_CODES.usage
            : EXIT_CODES.failure
    }

    const out = new HeadlessLogger(observer, flags.json, io.stdout)

    out.start()

    const [code, runErr] = await attempt(() => command === 'check'
        ? runCheck(updater, out, flags.json)
        : runDownload(updater, out, flags.json))

    out.stop()

    await updater.close()

    if (runErr) {

        reportError(io, flags.json, runErr)

        return EXIT_CODES.failure
    }

    return code
}
