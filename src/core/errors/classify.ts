/**
 * Error Classifier
 *
 * Sorts any thrown value into a small set of failure classes. The retry
 * policy and `toUpdateError` both read from it.
 *
 * Classification rules:
 * - `UpdateError` -> by code, or by its cause when the code says nothing
 * - `HttpStatusError` -> server (500/502/503/504), client (4xx), else opaque
 * - Node system errors -> network, timeout or filesystem by `code`
 * - `SyntaxError` -> parse
 * - Anything else with a `cause` -> wrapped
 * - Everything else -> opaque
 */
import { NON_RETRYABLE_CODES, RETRYABLE_CODES, RETRYABLE_STATUSES } from './codes.js';
import type { UpdateErrorCode } from './codes.js';
import { HttpStatusError, UpdateError } from './errors.js';

/**
 * Failure classes.
 */
export type ErrorClass =
    | 'network'
    | 'timeout'
    | 'server'
    | 'client'
    | 'parse'
    | 'filesystem'
    | 'fatal'
    | 'wrapped'
    | 'opaque';

/**
 * Classes a retry can fix.
 */
const TRANSIENT_CLASSES: ReadonlySet<ErrorClass> = new Set<ErrorClass>(['network', 'timeout', 'server']);

/**
 * Cause chains deeper than this are treated as opaque.
 */
const MAX_CAUSE_DEPTH = 8;

const NETWORK_SYSTEM_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'EPIPE',
    'ENOTFOUND',
    'EAI_AGAIN',
    'ENETUNREACH',
    'ENETDOWN',
    'EHOSTUNREACH',
    'EPROTO',
    'UND_ERR_SOCKET',
    'UND_ERR_CLOSED',
    'UND_ERR_CONNECT',
    'ERR_SSL_WRONG_VERSION_NUMBER',
    'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const TIMEOUT_SYSTEM_CODES = new Set([
    'ETIMEDOUT',
    'ESOCKETTIMEDOUT',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

const FILESYSTEM_SYSTEM_CODES = new Set([
    'ENOENT',
    'EACCES',
    'EPERM',
    'EEXIST',
    'EISDIR',
    'ENOTDIR',
    'ENOSPC',
    'EROFS',
    'EMFILE',
    'EBADF',
    'EBUSY',
]);

const CODE_CLASSES: Partial<Record<UpdateErrorCode, ErrorClass>> = {
    NETWORK_ERROR: 'network',
    CONNECTION_ERROR: 'network',
    TIMEOUT: 'timeout',
    SERVER_ERROR: 'server',
    SERVICE_UNAVAILABLE: 'server',
    PARSE_ERROR: 'parse',
    INVALID_RESPONSE: 'parse',
    FILE_ERROR: 'filesystem',
    PERMISSION_DENIED: 'filesystem',
};

/**
 * Read the `code` property Node attaches to system errors.
 */
export function systemErrorCode(error: unknown): string | undefined {

    if (typeof error !== 'object' || error === null || !('code' in error)) {

        return undefined;

    }

    const { code } = error;

    return typeof code === 'string' ? code : undefined;

}

/**
 * Classify a thrown value.
 *
 * @example
 * ```typescript
 * classifyError(new UpdateError('TIMEOUT', 'slow'))       // 'timeout'
 * classifyError(new HttpStatusError(503, '', url))        // 'server'
 * classifyError(new HttpStatusError(404, '', url))        // 'client'
 * classifyError(new TypeError('fetch failed', { cause })) // 'wrapped'
 * ```
 */
export function classifyError(error: unknown): ErrorClass {

    if (error instanceof UpdateError) {

        const byCode = CODE_CLASSES[error.code];

        if (byCode) {

            return byCode;

        }

        if (NON_RETRYABLE_CODES.has(error.code)) {

            return 'fatal';

        }

        return error.cause !== undefined ? 'wrapped' : 'opaque';

    }

    if (error instanceof HttpStatusError) {

        if (RETRYABLE_STATUSES.has(error.status)) {

            return 'server';

        }

        return error.status >= 400 && error.status < 500 ? 'client' : 'opaque';

    }

    const code = systemErrorCode(error);

    if (code && TIMEOUT_SYSTEM_CODES.has(code)) {

        return 'timeout';

    }

    if (code && NETWORK_SYSTEM_CODES.has(code)) {

        return 'network';

    }

    if (code && FILESYSTEM_SYSTEM_CODES.has(code)) {

        return 'filesystem';

    }

    if (error instanceof Error) {

        // AbortSignal.timeout() rejects with a DOMException named TimeoutError
        if (error.name === 'TimeoutError') {

            return 'timeout';

        }

        if (error instanceof SyntaxError) {

            return 'parse';

        }

        if (error.cause !== undefined) {

            return 'wrapped';

        }

    }

    return 'opaque';

}

/**
 * Follow `wrapped` errors down their cause chain and classify the
 * first one that says something.
 */
export function classifyRootError(error: unknown): ErrorClass {

    let current: unknown = error;

    for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {

        const kind = classifyError(current);

        if (kind !== 'wrapped' || !(current instanceof Error)) {

            return kind;

        }

        current = current.cause;

    }

    return 'opaque';

}

/**
 * Whether a retry could fix this failure.
 *
 * Retryable codes always are. Non-retryable codes never are. Other
 * domain errors defer to their cause, and have no opinion without one.
 *
 * @example
 * ```typescript
 * isTransientError(new UpdateError('SERVER_ERROR', 'down'))   // true
 * isTransientError(new UpdateError('MD5_MISMATCH', 'bad'))    // false
 * isTransientError(new UpdateError('DOWNLOAD_ERROR', 'x', {
 *     cause: new HttpStatusError(502, 'Bad Gateway', url),
 * }))                                                          // true
 * ```
 */
export function isTransientError(error: unknown): boolean {

    if (error instanceof UpdateError) {

        if (RETRYABLE_CODES.has(error.code)) {

            return true;

        }

        if (NON_RETRYABLE_CODES.has(error.code)) {

            return false;

        }

    }

    return TRANSIENT_CLASSES.has(classifyRootError(error));

}
