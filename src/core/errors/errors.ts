/**
 * Update errors.
 *
 * Callers branch on `code`, never on the message.
 */
import type { UpdateErrorCode } from './codes.js';


/**
 * Domain error raised by every updater component.
 *
 * The underlying failure, when there is one, is kept as `cause`.
 *
 * @example
 * ```typescript
 * const [path, err] = await controller.download()
 * if (err?.code === 'MD5_MISMATCH') {
 *     console.log('Corrupted download, try again later')
 * }
 * ```
 */
export class UpdateError extends Error {

    override readonly name = 'UpdateError' as const;

    constructor(
        public readonly code: UpdateErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {

        super(message, options);

    }

    /**
     * Plain representation for JSON output and logging.
     */
    toJSON(): { code: UpdateErrorCode; message: string; cause?: string } {

        const json: { code: UpdateErrorCode; message: string; cause?: string } = {
            code: this.code,
            message: this.message,
        };

        if (this.cause !== undefined) {

            json.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);

        }

        return json;

    }

}


/**
 * Error for a response whose status the caller did not expect.
 *
 * Transport-level only. Components wrap it in an `UpdateError`
 * before it leaves them.
 *
 * @example
 * ```typescript
 * if (response.status !== 200) {
 *     throw new UpdateError(
 *         'SERVER_ERROR',
 *         `Metadata request failed: ${response.status}`,
 *         { cause: new HttpStatusError(response.status, response.statusText, url) },
 *     )
 * }
 * ```
 */
export class HttpStatusError extends Error {

    override readonly name = 'HttpStatusError' as const;

    constructor(
        public readonly status: number,
        public readonly statusText: string,
        public readonly url: string,
    ) {

        const text = statusText ? ` ${statusText}` : '';

        super(`HTTP ${status}${text} for ${url}`);

    }

}
