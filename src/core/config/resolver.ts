/**
 * Config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Explicit overrides (CLI flags, SDK options)
 * 2. Environment variables (UPDATER_*)
 * 3. YAML config file
 * 4. Schema defaults
 */
import { readFile } from 'node:fs/promises'

import { attempt, attemptSync, clone, merge } from '@logosdx/utils'
import { parse as parseYaml } from 'yaml'

import type { UpdaterObserver } from '../observer.js'
import { getEnvConfig, getEnvConfigPath } from './env.js'
import { ConfigValidationError, parseConfig } from './schema.js'
import type { UpdaterConfig, UpdaterConfigLayer } from './schema.js'


/**
 * Options for resolving a config.
 */
export interface ResolveOptions {

    /** YAML file to load (overrides UPDATER_CONFIG) */
    file?: string

    /** Environment to read UPDATER_* variables from */
    env?: NodeJS.ProcessEnv

    /** Highest-priority values */
    overrides?: UpdaterConfigLayer

    observer?: UpdaterObserver
}


function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value)
}


/**
 * Drop undefined values so they never mask a lower source.
 */
export function pruneUndefined(layer: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(layer)) {

        if (value === undefined) {

            continue
        }

        result[key] = isRecord(value) ? pruneUndefined(value) : value
    }

    return result
}


/**
 * Load a YAML config file.
 *
 * An empty file yields an empty layer.
 *
 * @throws ConfigValidationError when the file cannot be read or is not a YAML mapping
 *
 * @example
 * ```typescript
 * const layer = await loadConfigFile('./updater.yml')
 * // { updateUrl: 'https://updates.example.com/latest.json', retry: { preset: 'fast' } }
 * ```
 */
export async function loadConfigFile(path: string): Promise<Record<string, unknown>> {

    const [content, readErr] = await attempt(() => readFile(path, 'utf8'))

    if (readErr) {

        throw new ConfigValidationError(`Failed to read config file ${path}: ${readErr.message}`, 'file', [])
    }

    const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

    if (yamlErr) {

        throw new ConfigValidationError(`Invalid YAML in config file ${path}: ${yamlErr.message}`, 'file', [])
    }

    if (parsed === null || parsed === undefined) {

        return {}
    }

    if (!isRecord(parsed)) {

        throw new ConfigValidationError(`Config file ${path} must contain a mapping`, 'file', [])
    }

    return parsed
}


/**
 * Resolve the updater config from all sources.
 *
 * @throws ConfigValidationError when a source is unreadable or the merged config is invalid
 *
 * @example
 * ```typescript
 * const config = await resolveConfig({
 *     file: './updater.yml',
 *     overrides: { currentVersion: '1.9.0' },
 * })
 * ```
 *
 * @example
 * ```typescript
 * // Env only (CI)
 * // UPDATER_CURRENT_VERSION=1.9.0 UPDATER_UPDATE_URL=https://... node app.js
 * const config = await resolveConfig()
 * ```
 */
export async function resolveConfig(options: ResolveOptions = {}): Promise<UpdaterConfig> {

    const env = options.env ?? process.env
    const path = options.file ?? getEnvConfigPath(env) ?? null
    const sources = ['defaults']

    let merged: Record<string, unknown> = {}

    if (path) {

        merged = clone(await loadConfigFile(path))
        sources.push('file')
    }

    const envConfig = getEnvConfig(env)

    if (Object.keys(envConfig).length > 0) {

        merged = merge(merged, envConfig)
        sources.push('env')
    }

    if (options.overrides) {

        merged = merge(merged, pruneUndefined(options.overrides))
        sources.push('overrides')
    }

    const config = parseConfig(merged)

    options.observer?.emit('config:loaded', { path, sources })

    return config
}
