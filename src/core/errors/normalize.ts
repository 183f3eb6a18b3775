/**
 * Normalize thrown values into `UpdateError`.
 *
 * Components call this at their boundary so nothing but `UpdateError`
 * ever reaches a caller.
 */
import type { UpdateErrorCode } from './codes.js';
import { classifyRootError, systemErrorCode } from './classify.js';
import { UpdateError } from './errors.js';

/**
 * Human-readable message of any thrown value.
 */
export function errorMessage(error: unknown): string {

    if (error instanceof Error) {

        return error.message;

    }

    return String(error);

}

/**
 * Convert any thrown value into an `UpdateError`.
 *
 * `UpdateError` passes through untouched. Everything else is wrapped,
 * with a code derived from what went wrong and the original kept as
 * `cause`.
 *
 * @param error - Thrown value
 * @param fallback - Code used when the failure class says nothing
 * @param context - Prefix for the message (e.g. 'Update check failed')
 *
 * @example
 * ```typescript
 * const [res, err] = await attempt(() => transport.request(url))
 * if (err) throw toUpdateError(err, 'SERVER_ERROR', 'Update check failed')
 * ```
 */
export function toUpdateError(
    error: unknown,
    fallback: UpdateErrorCode = 'APPLICATION_ERROR',
    context?: string,
): UpdateError {

    if (error instanceof UpdateError) {

        return error;

    }

    const detail = errorMessage(error);
    const message = context ? `${context}: ${detail}` : detail;

    return new UpdateError(codeFor(error, fallback), message, { cause: error });

}

function codeFor(error: unknown, fallback: UpdateErrorCode): UpdateErrorCode {

    switch (classifyRootError(error)) {

    case 'network':
        return 'NETWORK_ERROR';
    case 'timeout':
        return 'TIMEOUT';
    case 'server':
        return 'SERVER_ERROR';
    case 'parse':
        return 'PARSE_ERROR';
    case 'filesystem': {

        const code = systemErrorCode(error);

        return code === 'EACCES' || code === 'EPERM' ? 'PERMISSION_DENIED' : 'FILE_ERROR';

    }
    default:
        return fallback;

    }

}
