/**
 * Cooperative cancellation.
 *
 * A `CancelToken` is owned by whoever starts a download. The transfer
 * loop polls `isCanceled` at every chunk boundary and before each retry
 * sleep; `signal` reaches calls that can be interrupted (fetch, sleep).
 *
 * @example
 * ```typescript
 * const token = new CancelToken()
 * const pending = downloader.download(token)
 *
 * onUserClickedCancel(() => token.cancel())
 * ```
 */
export class CancelToken {

    #controller = new AbortController();
    #listeners = new Set<() => void>();

    /**
     * Whether `cancel()` has been called.
     */
    get isCanceled(): boolean {

        return this.#controller.signal.aborted;

    }

    /**
     * Aborts when the token is canceled.
     */
    get signal(): AbortSignal {

        return this.#controller.signal;

    }

    /**
     * Cancel. Single-use: later calls do nothing.
     */
    cancel(): void {

        if (this.isCanceled) {

            return;

        }

        this.#controller.abort('cancel');

        for (const listener of this.#listeners) {

            listener();

        }

        this.#listeners.clear();

    }

    /**
     * Run `listener` once on cancellation, immediately when already
     * canceled.
     *
     * @returns Cleanup function to stop listening
     */
    onCancel(listener: () => void): () => void {

        if (this.isCanceled) {

            listener();

            return () => undefined;

        }

        this.#listeners.add(listener);

        return () => {

            this.#listeners.delete(listener);

        };

    }

}
