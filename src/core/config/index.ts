/**
 * Config module - configuration management for the updater.
 *
 * Handles config loading, validation, and merging from defaults, a YAML
 * file, UPDATER_* environment variables and explicit overrides.
 */

// Schema & Validation
export {
    UpdaterConfigSchema,
    RetryPresetSchema,
    ChecksumAlgorithmSchema,
    LogLevelSchema,
    ConfigValidationError,
    parseConfig,
    type UpdaterConfig,
    type UpdaterConfigInput,
    type UpdaterConfigLayer,
} from './schema.js';

// Resolver
export {
    resolveConfig,
    loadConfigFile,
    pruneUndefined,
    type ResolveOptions,
} from './resolver.js';

// Environment variables
export {
    getEnvConfig,
    getEnvConfigPath,
    ENV_BINDINGS,
    META_ENV_VARS,
} from './env.js';
