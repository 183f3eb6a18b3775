/**
 * In-process HTTP stand-in.
 *
 * Routes requests by URL to handlers that build web `Response` objects.
 * Bodies can be split into chunks, held before a chunk until a gate
 * opens, or cut short, and every stream honors the request's abort
 * signal.
 */
import type { FetchFunction, FetchInit, TransportResponse } from '../../src/core/transport/index.js';

export interface FakeRequest {
    url: string;
    method: string;
    headers: Record<string, string>;
    body: string | undefined;
    signal: AbortSignal | undefined;

    /** Start offset of a `Range: bytes=N-` header */
    rangeStart: number | null;

    /** 0-based count of earlier requests to the same URL */
    index: number;
}

export type FakeHandler = (request: FakeRequest) => Response | Promise<Response>;

/**
 * A promise that resolves when `open()` is called.
 */
export interface Gate {
    promise: Promise<void>;
    open(): void;
}

export function createGate(): Gate {

    let open: () => void = () => undefined;

    const promise = new Promise<void>((resolve) => {

        open = resolve;

    });

    return { promise, open };

}

function waitOrAbort(promise: Promise<void>, signal: AbortSignal | undefined): Promise<void> {

    if (!signal) {

        return promise;

    }

    return new Promise<void>((resolve, reject) => {

        if (signal.aborted) {

            reject(signal.reason);

            return;

        }

        const onAbort = (): void => reject(signal.reason);

        signal.addEventListener('abort', onAbort, { once: true });

        promise.then(() => {

            signal.removeEventListener('abort', onAbort);
            resolve();

        }, reject);

    });

}

export interface StreamOptions {
    /** Wait for a gate before sending the chunk at this index */
    hold?: { beforeChunk: number; until: Promise<void> };

    /** Close the stream after this many chunks */
    endAfterChunks?: number;
}

/**
 * A body stream emitting the given chunks in order.
 */
export function chunkedStream(
    chunks: Uint8Array[],
    signal: AbortSignal | undefined,
    options: StreamOptions = {},
): ReadableStream<Uint8Array> {

    let index = 0;

    return new ReadableStream<Uint8Array>({
        async pull(controller) {

            const hold = options.hold;

            if (hold && hold.beforeChunk === index) {

                await waitOrAbort(hold.until, signal);

            }

            if (signal?.aborted) {

                controller.error(signal.reason);

                return;

            }

            const chunk = chunks[index];

            if (!chunk || (options.endAfterChunks !== undefined && index >= options.endAfterChunks)) {

                controller.close();

                return;

            }

            index++;
            controller.enqueue(chunk);

        },
    });

}

/**
 * Split bytes into chunks of the given sizes; the last size repeats.
 */
export function splitBytes(data: Uint8Array, sizes: number[]): Uint8Array[] {

    const chunks: Uint8Array[] = [];
    let offset = 0;
    let i = 0;

    while (offset < data.length) {

        const size = sizes[Math.min(i, sizes.length - 1)] ?? data.length;

        chunks.push(data.subarray(offset, offset + size));
        offset += size;
        i++;

    }

    return chunks;

}

/**
 * Deterministic test payload.
 */
export function makeBytes(length: number): Uint8Array {

    const data = new Uint8Array(length);

    for (let i = 0; i < length; i++) {

        data[i] = (i * 7 + 3) % 256;

    }

    return data;

}

export interface ServeOptions extends StreamOptions {
    /** Chunk sizes; defaults to one chunk */
    chunkSizes?: number[];

    /** Answer Range requests with 206; defaults to true */
    supportRange?: boolean;

    /** Send Content-Length; defaults to true */
    contentLength?: boolean;
}

/**
 * Serve a byte payload the way a static file server would.
 */
export function serveBytes(data: Uint8Array, request: FakeRequest, options: ServeOptions = {}): Response {

    const supportRange = options.supportRange ?? true;
    const start = supportRange && request.rangeStart !== null ? request.rangeStart : 0;
    const slice = data.subarray(start);
    const chunks = splitBytes(slice, options.chunkSizes ?? [slice.length || 1]);

    const headers: Record<string, string> = {};

    if (options.contentLength ?? true) {

        headers['content-length'] = String(slice.length);

    }

    if (start > 0) {

        headers['content-range'] = `bytes ${start}-${data.length - 1}/${data.length}`;

    }

    return new Response(chunkedStream(chunks, request.signal, options), {
        status: start > 0 ? 206 : 200,
        headers,
    });

}

export function jsonResponse(value: unknown, status = 200): Response {

    return new Response(JSON.stringify(value), {
        status,
        headers: { 'content-type': 'application/json' },
    });

}

export function statusResponse(status: number, statusText = ''): Response {

    return new Response('', { status, statusText });

}

/**
 * Fetch stand-in with a request log.
 *
 * @example
 * ```typescript
 * const server = new FakeFetch()
 *     .route('https://updates.test/latest.json', () => jsonResponse({ version: '2.0.0' }))
 *
 * const transport = new HttpTransport({ fetch: server.fetch })
 * ```
 */
export class FakeFetch {

    readonly requests: FakeRequest[] = [];

    #routes = new Map<string, FakeHandler>();

    route(url: string, handler: FakeHandler): this {

        this.#routes.set(url, handler);

        return this;

    }

    /**
     * Requests sent to one URL.
     */
    requestsTo(url: string): FakeRequest[] {

        return this.requests.filter((request) => request.url === url);

    }

    readonly fetch: FetchFunction = async (url: string, init: FetchInit): Promise<TransportResponse> => {

        if (init.signal?.aborted) {

            throw init.signal.reason;

        }

        const handler = this.#routes.get(url);

        if (!handler) {

            throw new TypeError(`fetch failed: no route for ${url}`);

        }

        const range = /^bytes=(\d+)-$/.exec(init.headers['range'] ?? '');

        const request: FakeRequest = {
            url,
            method: init.method,
            headers: init.headers,
            body: init.body,
            signal: init.signal,
            rangeStart: range?.[1] !== undefined ? Number(range[1]) : null,
            index: this.requestsTo(url).length,
        };

        this.requests.push(request);

        return handler(request);

    };

}
