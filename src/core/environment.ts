/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, headless, etc.).
 * Used by the logger and the CLI that need to adapt behavior based on context.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - UPDATER_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Log to stdout instead of file
 *     console.log('Running in CI mode')
 * }
 * ```
 */
export function isCi(): boolean {

    // Explicit headless flag
    if (process.env['UPDATER_HEADLESS'] === 'true') {

        return true;

    }

    // Check CI environment variables
    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // No TTY available (piped output, non-interactive)
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if debug logging is enabled.
 *
 * @returns true if UPDATER_DEBUG is set to 'true' or '1'
 */
export function isDebug(): boolean {

    const value = process.env['UPDATER_DEBUG'];

    return value === 'true' || value === '1';

}
