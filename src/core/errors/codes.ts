/**
 * Update error codes.
 *
 * Every failure that leaves a component carries one of these codes.
 * The retry policy keys off them, see `src/core/errors/classify.ts`.
 */
export const UPDATE_ERROR_CODES = [
    'NETWORK_ERROR',
    'TIMEOUT',
    'CONNECTION_ERROR',
    'SERVER_ERROR',
    'SERVICE_UNAVAILABLE',
    'DOWNLOAD_ERROR',
    'DOWNLOAD_TIMEOUT',
    'DOWNLOAD_CANCELED',
    'PARSE_ERROR',
    'INVALID_RESPONSE',
    'FILE_ERROR',
    'MD5_MISMATCH',
    'MISSING_URL',
    'MISSING_VERSION',
    'INVALID_METHOD',
    'INVALID_BODY',
    'PERMISSION_DENIED',
    'PLATFORM_NOT_SUPPORTED',
    'INSTALL_FAILED',
    'NO_UPDATE',
    'APPLICATION_ERROR',
] as const;

export type UpdateErrorCode = (typeof UPDATE_ERROR_CODES)[number];

/**
 * Codes that describe a transient condition. Retrying may succeed.
 */
export const RETRYABLE_CODES: ReadonlySet<UpdateErrorCode> = new Set<UpdateErrorCode>([
    'NETWORK_ERROR',
    'TIMEOUT',
    'CONNECTION_ERROR',
    'SERVER_ERROR',
    'SERVICE_UNAVAILABLE',
]);

/**
 * Codes that never succeed on retry.
 */
export const NON_RETRYABLE_CODES: ReadonlySet<UpdateErrorCode> = new Set<UpdateErrorCode>([
    'PARSE_ERROR',
    'INVALID_RESPONSE',
    'MISSING_URL',
    'MISSING_VERSION',
    'INVALID_METHOD',
    'INVALID_BODY',
    'FILE_ERROR',
    'MD5_MISMATCH',
    'PERMISSION_DENIED',
    'PLATFORM_NOT_SUPPORTED',
]);

/**
 * HTTP statuses worth another attempt.
 */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

/**
 * Type guard for error codes read from untrusted input.
 */
export function isUpdateErrorCode(value: unknown): value is UpdateErrorCode {

    return UPDATE_ERROR_CODES.some((code) => code === value);

}
