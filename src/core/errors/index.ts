/**
 * Errors module.
 *
 * Error codes, the `UpdateError` type and the classification used by
 * the retry policy.
 */
export {
    UPDATE_ERROR_CODES,
    RETRYABLE_CODES,
    NON_RETRYABLE_CODES,
    RETRYABLE_STATUSES,
    isUpdateErrorCode,
} from './codes.js';
export type { UpdateErrorCode } from './codes.js';
export { UpdateError, HttpStatusError } from './errors.js';
export { classifyError, classifyRootError, isTransientError, systemErrorCode } from './classify.js';
export type { ErrorClass } from './classify.js';
export { toUpdateError, errorMessage } from './normalize.js';
