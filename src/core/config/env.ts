/**
 * Environment variable configuration.
 *
 * Every config property can be overridden via an UPDATER_* environment
 * variable. Values are converted to the property's type here; the schema
 * validates them afterwards along with the other sources.
 *
 * @example
 * ```bash
 * UPDATER_CURRENT_VERSION=1.9.0
 * UPDATER_UPDATE_URL=https://updates.example.com/latest.json
 * UPDATER_METHOD=post
 *
 * UPDATER_DOWNLOAD_DIRECTORY=/var/cache/app-updates
 * UPDATER_DOWNLOAD_TIMEOUT_MS=600000
 *
 * UPDATER_RETRY_PRESET=conservative
 * UPDATER_RETRY_MAX_ATTEMPTS=4
 *
 * UPDATER_LOG_LEVEL=verbose
 * UPDATER_LOG_JSON=true
 * ```
 */
import { attemptSync } from '@logosdx/utils'

import { ConfigValidationError } from './schema.js'


type EnvKind = 'string' | 'number' | 'boolean' | 'json'

interface EnvBinding {
    /** Dotted config path, at most two levels */
    path: string
    kind: EnvKind
}


/**
 * Meta env vars that control behavior, not config values.
 */
export const META_ENV_VARS = new Set([
    'UPDATER_CONFIG',    // Config file path
    'UPDATER_DEBUG',     // Observer spy
    'UPDATER_HEADLESS',  // Force CI output
])


/**
 * Env var name to config path.
 */
export const ENV_BINDINGS: Readonly<Record<string, EnvBinding>> = {
    UPDATER_CURRENT_VERSION: { path: 'currentVersion', kind: 'string' },
    UPDATER_UPDATE_URL: { path: 'updateUrl', kind: 'string' },
    UPDATER_METHOD: { path: 'method', kind: 'string' },
    UPDATER_HEADERS: { path: 'headers', kind: 'json' },
    UPDATER_AUTO_INSTALL: { path: 'autoInstall', kind: 'boolean' },

    UPDATER_DOWNLOAD_DIRECTORY: { path: 'download.directory', kind: 'string' },
    UPDATER_DOWNLOAD_SUPPORT_RANGE: { path: 'download.supportRange', kind: 'boolean' },
    UPDATER_DOWNLOAD_TIMEOUT_MS: { path: 'download.timeoutMs', kind: 'number' },
    UPDATER_DOWNLOAD_CHECKSUM_ALGORITHM: { path: 'download.checksumAlgorithm', kind: 'string' },

    UPDATER_RETRY_PRESET: { path: 'retry.preset', kind: 'string' },
    UPDATER_RETRY_MAX_ATTEMPTS: { path: 'retry.maxAttempts', kind: 'number' },
    UPDATER_RETRY_INITIAL_DELAY_MS: { path: 'retry.initialDelayMs', kind: 'number' },
    UPDATER_RETRY_BACKOFF_FACTOR: { path: 'retry.backoffFactor', kind: 'number' },
    UPDATER_RETRY_MAX_DELAY_MS: { path: 'retry.maxDelayMs', kind: 'number' },
    UPDATER_RETRY_JITTER: { path: 'retry.jitter', kind: 'boolean' },

    UPDATER_TRANSPORT_MAX_CONNECTIONS_PER_HOST: { path: 'transport.maxConnectionsPerHost', kind: 'number' },
    UPDATER_TRANSPORT_KEEP_ALIVE_TIMEOUT_MS: { path: 'transport.keepAliveTimeoutMs', kind: 'number' },
    UPDATER_TRANSPORT_REQUEST_TIMEOUT_MS: { path: 'transport.requestTimeoutMs', kind: 'number' },

    UPDATER_SCHEDULE_INTERVAL_MS: { path: 'schedule.intervalMs', kind: 'number' },
    UPDATER_SCHEDULE_COOLDOWN_MS: { path: 'schedule.cooldownMs', kind: 'number' },

    UPDATER_LOG_LEVEL: { path: 'logging.level', kind: 'string' },
    UPDATER_LOG_JSON: { path: 'logging.json', kind: 'boolean' },
}


function convert(name: string, raw: string, binding: EnvBinding): unknown {

    const field = binding.path

    switch (binding.kind) {

    case 'string':
        return raw

    case 'number': {

        const value = Number(raw)

        if (raw.trim() === '' || Number.isNaN(value)) {

            throw new ConfigValidationError(`Invalid ${name}: expected a number, got '${raw}'`, field, [])
        }

        return value
    }

    case 'boolean': {

        const lower = raw.trim().toLowerCase()

        if (lower === 'true' || lower === '1') return true
        if (lower === 'false' || lower === '0') return false

        throw new ConfigValidationError(`Invalid ${name}: expected true or false, got '${raw}'`, field, [])
    }

    case 'json': {

        const [value, err] = attemptSync((): unknown => JSON.parse(raw))

        if (err) {

            throw new ConfigValidationError(`Invalid ${name}: ${err.message}`, field, [])
        }

        return value
    }

    }
}


/**
 * Read config values from environment variables.
 *
 * Empty values are ignored. Unknown UPDATER_* names are ignored too.
 *
 * @throws ConfigValidationError when a value cannot be converted
 *
 * @example
 * ```typescript
 * getEnvConfig({
 *     UPDATER_UPDATE_URL: 'https://updates.example.com/latest.json',
 *     UPDATER_RETRY_MAX_ATTEMPTS: '5',
 * })
 * // {
 * //   updateUrl: 'https://updates.example.com/latest.json',
 * //   retry: { maxAttempts: 5 },
 * // }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {

    const config: Record<string, unknown> = {}

    for (const [name, binding] of Object.entries(ENV_BINDINGS)) {

        const raw = env[name]

        if (raw === undefined || raw === '') {

            continue
        }

        const value = convert(name, raw, binding)
        const [section, key] = binding.path.split('.')

        if (section === undefined) {

            continue
        }

        if (key === undefined) {

            config[section] = value
            continue
        }

        const existing = config[section]
        const nested: Record<string, unknown> = typeof existing === 'object' && existing !== null
            ? { ...existing }
            : {}

        nested[key] = value
        config[section] = nested
    }

    return config
}


/**
 * Config file path from UPDATER_CONFIG.
 */
export function getEnvConfigPath(env: NodeJS.ProcessEnv = process.env): string | undefined {

    const path = env['UPDATER_CONFIG']

    return path && path.trim() !== '' ? path : undefined
}
