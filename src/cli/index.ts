#!/usr/bin/env node
/**
 * CLI entry point for the in-app updater.
 *
 * Parses command line arguments with meow and runs one command headless.
 *
 * @example
 * ```bash
 * inapp-updater check --url https://updates.example.com/latest.json --current 1.9.0
 * inapp-updater download -c ./updater.yml --dir ./downloads --retry conservative
 * inapp-updater download --json ... | jq '.event'
 * ```
 */
import meow from 'meow'

import { runCommand } from './run.js'
import type { CliFlags } from './types.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ inapp-updater <command> [options]

  Commands
    check               Check for a newer version
    download            Check, then download and verify the update

  Options
    --url, -u <url>         Update metadata endpoint
    --current <version>     Version of the running application
    --dir, -d <path>        Download directory (defaults to the OS temp dir)
    --config, -c <file>     YAML config file
    --retry <preset>        disabled | fast | standard | conservative
    --json                  One JSON object per line
    --log-level <level>     Log to stderr: silent | error | warn | info | verbose
    --help, -h              Show this help
    --version               Show version

  Environment
    UPDATER_UPDATE_URL, UPDATER_CURRENT_VERSION, UPDATER_CONFIG and the
    other UPDATER_* variables set any config value.

  Exit codes
    0  Success, or no update available
    1  Check or download failed
    2  Usage or configuration error

  Examples
    $ inapp-updater check --url https://updates.example.com/latest.json --current 1.9.0
    $ inapp-updater download -c ./updater.yml --dir ./downloads
`


/**
 * Parse CLI arguments with meow.
 */
function parseCli(argv: readonly string[] = process.argv.slice(2)): { command: string | undefined; flags: CliFlags } {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        argv,
        flags: {
            url: {
                type: 'string',
                shortFlag: 'u'
            },
            current: {
                type: 'string'
            },
            dir: {
                type: 'string',
                shortFlag: 'd'
            },
            config: {
                type: 'string',
                shortFlag: 'c'
            },
            retry: {
                type: 'string'
            },
            json: {
                type: 'boolean',
                default: false
            },
            logLevel: {
                type: 'string'
            }
        }
    })

    const flags: CliFlags = {
        url: cli.flags.url,
        current: cli.flags.current,
        dir: cli.flags.dir,
        config: cli.flags.config,
        retry: cli.flags.retry,
        json: cli.flags.json,
        logLevel: cli.flags.logLevel
    }

    return { command: cli.input[0], flags }
}


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    const { command, flags } = parseCli()

    process.exitCode = await runCommand(command, flags, {
        stdout: process.stdout,
        stderr: process.stderr,
        env: process.env
    })
}


main().catch((error: unknown) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
