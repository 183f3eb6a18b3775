/**
 * CLI types.
 */

/**
 * Commands the CLI runs.
 */
export type CliCommand = 'check' | 'download';

export const CLI_COMMANDS: readonly CliCommand[] = ['check', 'download'];

/**
 * CLI flags parsed by meow.
 */
export interface CliFlags {
    /** Metadata endpoint */
    url?: string | undefined;

    /** Version of the running application */
    current?: string | undefined;

    /** Download directory */
    dir?: string | undefined;

    /** YAML config file */
    config?: string | undefined;

    /** Retry preset name */
    retry?: string | undefined;

    /** One JSON object per line on stdout */
    json: boolean;

    /** Log level for stderr logging; logging is off when unset */
    logLevel?: string | undefined;
}

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
    success: 0,
    failure: 1,
    usage: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
