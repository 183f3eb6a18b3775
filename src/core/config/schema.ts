/**
 * Configuration Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference. Every section has defaults, so an object with only
 * `currentVersion` and `updateUrl` parses into a complete config.
 */
import { z } from 'zod';

export const RetryPresetSchema = z.enum(['disabled', 'fast', 'standard', 'conservative']);

export const ChecksumAlgorithmSchema = z.enum(['md5', 'sha1', 'sha256', 'sha512']);

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Metadata request method, any casing.
 */
const MethodSchema = z
    .string()
    .toUpperCase()
    .pipe(z.enum(['GET', 'POST'], { message: 'Method must be GET or POST' }));

const DurationSchema = z.number().int().min(0);

/**
 * Descriptor key mapping. `null` disables an optional field.
 */
const FieldKeysSchema = z.object({
    version: z.string().min(1).optional(),
    downloadUrl: z.string().min(1).optional(),
    changelog: z.string().min(1).nullable().optional(),
    isForceUpdate: z.string().min(1).nullable().optional(),
    publishDate: z.string().min(1).nullable().optional(),
    fileSize: z.string().min(1).nullable().optional(),
    checksum: z.string().min(1).nullable().optional(),
});

const DownloadSchema = z.object({
    /** Defaults to the OS temp directory */
    directory: z.string().min(1).optional(),
    supportRange: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(30 * 60 * 1000),
    checksumAlgorithm: ChecksumAlgorithmSchema.default('md5'),
});

/**
 * Retry policy: a preset plus optional field overrides.
 */
const RetrySchema = z.object({
    preset: RetryPresetSchema.default('standard'),
    maxAttempts: z.number().int().min(0).optional(),
    initialDelayMs: DurationSchema.optional(),
    backoffFactor: z.number().min(1, 'Backoff factor must be at least 1').optional(),
    maxDelayMs: DurationSchema.optional(),
    jitter: z.boolean().optional(),
});

const TransportSchema = z.object({
    maxConnectionsPerHost: z.number().int().min(1).default(6),
    keepAliveTimeoutMs: DurationSchema.default(4000),
    requestTimeoutMs: z.number().int().positive().default(30_000),
});

const ScheduleSchema = z.object({
    /** 0 disables periodic checks */
    intervalMs: DurationSchema.default(0),
    cooldownMs: DurationSchema.default(60 * 60 * 1000),
});

const LoggingSchema = z.object({
    level: LogLevelSchema.default('info'),
    json: z.boolean().default(false),
});

/**
 * Complete updater configuration.
 */
export const UpdaterConfigSchema = z.object({
    currentVersion: z.string().trim().min(1, 'Current version is required'),
    updateUrl: z.string().url('Update URL must be a valid URL').optional(),
    method: MethodSchema.default('GET'),
    headers: z.record(z.string()).default({}),
    body: z.union([z.string(), z.record(z.unknown())]).optional(),
    fieldKeys: FieldKeysSchema.default({}),
    autoInstall: z.boolean().default(false),
    download: DownloadSchema.default({}),
    retry: RetrySchema.default({}),
    transport: TransportSchema.default({}),
    schedule: ScheduleSchema.default({}),
    logging: LoggingSchema.default({}),
});

export type UpdaterConfig = z.output<typeof UpdaterConfigSchema>;

/**
 * Config as written by hand, before defaults are applied.
 */
export type UpdaterConfigInput = z.input<typeof UpdaterConfigSchema>;

/**
 * Partial config from a single source (file, env, flags).
 */
export type UpdaterConfigLayer = Partial<UpdaterConfigInput>;

/**
 * Config validation error with the offending field path.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Parse and validate config, returning defaults for missing fields.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({
 *     currentVersion: '1.9.0',
 *     updateUrl: 'https://updates.example.com/latest.json',
 * })
 * // config.method === 'GET'
 * // config.retry.preset === 'standard'
 * // config.download.checksumAlgorithm === 'md5'
 * ```
 */
export function parseConfig(config: unknown): UpdaterConfig {

    const result = UpdaterConfigSchema.safeParse(config);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'unknown';

        throw new ConfigValidationError(
            `Invalid config at ${field}: ${firstIssue?.message ?? 'Validation failed'}`,
            field,
            result.error.issues,
        );

    }

    return result.data;

}
