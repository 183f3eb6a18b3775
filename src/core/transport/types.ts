/**
 * Transport Types
 *
 * The slice of the fetch API the updater relies on. Both undici's
 * `fetch` and the global one satisfy it, and tests provide their own.
 */
import type { UpdaterObserver } from '../observer.js';

/**
 * Reader over a response body.
 */
export interface ByteStreamReader {
    read(): Promise<{ done: boolean; value?: Uint8Array | undefined }>;
    cancel(reason?: unknown): Promise<void>;
    releaseLock(): void;
}

/**
 * Response returned by the transport.
 */
export interface TransportResponse {
    readonly status: number;
    readonly statusText: string;
    readonly headers: { get(name: string): string | null };
    readonly body: { getReader(): ByteStreamReader } | null;
    text(): Promise<string>;
}

/**
 * Request init passed to the underlying fetch.
 */
export interface FetchInit {
    method: string;
    headers: Record<string, string>;
    body?: string | undefined;
    signal?: AbortSignal | undefined;
}

/**
 * Fetch implementation used by the transport.
 */
export type FetchFunction = (url: string, init: FetchInit) => Promise<TransportResponse>;

/**
 * Supported request methods.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * A single request.
 */
export interface TransportRequest {
    /** Defaults to GET */
    method?: HttpMethod;

    headers?: Record<string, string>;

    /** Serialized request body (POST only) */
    body?: string;

    /** Caller cancellation */
    signal?: AbortSignal;

    /** Per-request timeout; 0 disables */
    timeoutMs?: number;
}

/**
 * Transport configuration.
 */
export interface HttpTransportOptions {
    /** Upper bound on open sockets per origin */
    maxConnectionsPerHost?: number;

    /** Idle keep-alive socket lifetime */
    keepAliveTimeoutMs?: number;

    /** Default timeout for metadata requests; downloads set their own */
    requestTimeoutMs?: number;

    /** Sent on every request unless the caller overrides it */
    userAgent?: string;

    /** Replaces the pooled undici fetch (tests) */
    fetch?: FetchFunction;

    observer?: UpdaterObserver;
}

/**
 * Default transport configuration.
 */
export const DEFAULT_TRANSPORT_OPTIONS = {
    maxConnectionsPerHost: 6,
    keepAliveTimeoutMs: 4_000,
    requestTimeoutMs: 30_000,
    userAgent: 'inapp-updater',
} as const;
