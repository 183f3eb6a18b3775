/**
 * HTTP transport.
 *
 * Owns the connection pool shared by the update checker and the
 * downloader. There is no global client: the composition root opens one
 * transport at startup and closes it at shutdown.
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({ maxConnectionsPerHost: 4 })
 *
 * const metadata = await transport.fetchJson('https://updates.example.com/latest.json')
 * const response = await transport.request(artifactUrl, { headers: { range: 'bytes=600-' } })
 *
 * await transport.close()
 * ```
 */
import { Agent, fetch as undiciFetch } from 'undici';
import { attempt, attemptSync } from '@logosdx/utils';

import { HttpStatusError, UpdateError } from '../errors/errors.js';
import { toUpdateError } from '../errors/normalize.js';
import type { UpdaterObserver } from '../observer.js';
import type {
    FetchFunction,
    HttpTransportOptions,
    TransportRequest,
    TransportResponse,
} from './types.js';
import { DEFAULT_TRANSPORT_OPTIONS } from './types.js';

/**
 * Pooled HTTP client.
 *
 * Uses an undici `Agent` so the number of sockets per origin is bounded
 * and keep-alive sockets are reused between the metadata request and
 * the artifact download.
 */
export class HttpTransport {

    #fetch: FetchFunction;
    #agent: Agent | null = null;
    #observer: UpdaterObserver | null;
    #requestTimeoutMs: number;
    #userAgent: string;
    #closed = false;
    #requests = 0;

    constructor(options: HttpTransportOptions = {}) {

        const maxConnectionsPerHost = options.maxConnectionsPerHost
            ?? DEFAULT_TRANSPORT_OPTIONS.maxConnectionsPerHost;
        const keepAliveTimeoutMs = options.keepAliveTimeoutMs
            ?? DEFAULT_TRANSPORT_OPTIONS.keepAliveTimeoutMs;

        this.#observer = options.observer ?? null;
        this.#requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TRANSPORT_OPTIONS.requestTimeoutMs;
        this.#userAgent = options.userAgent ?? DEFAULT_TRANSPORT_OPTIONS.userAgent;

        if (options.fetch) {

            this.#fetch = options.fetch;

        }
        else {

            const agent = new Agent({
                connections: maxConnectionsPerHost,
                keepAliveTimeout: keepAliveTimeoutMs,
            });

            this.#agent = agent;
            this.#fetch = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });

        }

        this.#observer?.emit('transport:open', { maxConnectionsPerHost, keepAliveTimeoutMs });

    }

    /**
     * Whether `close()` has been called.
     */
    get isClosed(): boolean {

        return this.#closed;

    }

    /**
     * Number of requests that received a response.
     */
    get requestCount(): number {

        return this.#requests;

    }

    /**
     * Send a request and return the raw response.
     *
     * Rejections from the underlying fetch propagate unchanged so the
     * caller can tell its own aborts apart from network failures.
     */
    async request(url: string, request: TransportRequest = {}): Promise<TransportResponse> {

        if (this.#closed) {

            throw new UpdateError('APPLICATION_ERROR', 'HTTP transport is closed');

        }

        const method = request.method ?? 'GET';
        const started = Date.now();

        const response = await this.#fetch(url, {
            method,
            headers: { 'user-agent': this.#userAgent, ...request.headers },
            body: request.body,
            signal: combineSignals(request.signal, request.timeoutMs ?? 0),
        });

        this.#requests++;

        this.#observer?.emit('transport:request', {
            method,
            url,
            status: response.status,
            durationMs: Date.now() - started,
        });

        return response;

    }

    /**
     * Request a JSON document.
     *
     * Anything other than a 200 with a parseable body fails with an
     * `UpdateError`: 5xx as `SERVER_ERROR` (503 as `SERVICE_UNAVAILABLE`),
     * other statuses as `INVALID_RESPONSE`, bad JSON as `PARSE_ERROR`,
     * socket failures as `NETWORK_ERROR` and timeouts as `TIMEOUT`.
     *
     * @example
     * ```typescript
     * const [data, err] = await attempt(() => transport.fetchJson(url, {
     *     method: 'POST',
     *     body: JSON.stringify({ channel: 'stable' }),
     * }))
     * ```
     */
    async fetchJson(url: string, request: TransportRequest = {}): Promise<unknown> {

        const [response, err] = await attempt(() => this.request(url, {
            ...request,
            timeoutMs: request.timeoutMs ?? this.#requestTimeoutMs,
            headers: { accept: 'application/json', ...request.headers },
        }));

        if (err) {

            throw toUpdateError(err, 'NETWORK_ERROR', `Request to ${url} failed`);

        }

        if (response.status !== 200) {

            await discardBody(response);

            const cause = new HttpStatusError(response.status, response.statusText, url);
            const code = response.status === 503
                ? 'SERVICE_UNAVAILABLE'
                : response.status >= 500 ? 'SERVER_ERROR' : 'INVALID_RESPONSE';

            throw new UpdateError(code, `HTTP status ${response.status}: ${response.statusText}`, { cause });

        }

        const [text, readErr] = await attempt(() => response.text());

        if (readErr) {

            throw toUpdateError(readErr, 'NETWORK_ERROR', `Reading response from ${url} failed`);

        }

        const [data, parseErr] = attemptSync((): unknown => JSON.parse(text));

        if (parseErr) {

            throw new UpdateError('PARSE_ERROR', `Invalid JSON from ${url}: ${parseErr.message}`, { cause: parseErr });

        }

        return data;

    }

    /**
     * Release pooled sockets. Further requests fail.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return;

        }

        this.#closed = true;

        if (this.#agent) {

            await this.#agent.close();
            this.#agent = null;

        }

        this.#observer?.emit('transport:close', { requests: this.#requests });

    }

}

/**
 * Merge a caller signal with a timeout.
 */
function combineSignals(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal | undefined {

    const signals: AbortSignal[] = [];

    if (signal) {

        signals.push(signal);

    }

    if (timeoutMs > 0) {

        signals.push(AbortSignal.timeout(timeoutMs));

    }

    if (signals.length <= 1) {

        return signals[0];

    }

    return AbortSignal.any(signals);

}

/**
 * Cancel an unread response body so its socket returns to the pool.
 *
 * @returns The cancellation failure, if any
 */
export async function discardBody(response: TransportResponse): Promise<Error | null> {

    const body = response.body;

    if (!body) {

        return null;

    }

    const [, err] = await attempt(() => body.getReader().cancel());

    return err;

}
