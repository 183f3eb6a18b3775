/**
 * Update checker.
 *
 * Fetches update metadata (over HTTP or from a caller callback), parses
 * it into an `UpdateDescriptor` and decides whether it is newer than the
 * running version.
 *
 * @example
 * ```typescript
 * const checker = new UpdateChecker({
 *     currentVersion: '1.9.0',
 *     updateUrl: 'https://updates.example.com/latest.json',
 *     transport,
 * });
 *
 * const descriptor = await checker.checkForUpdate();
 * if (descriptor) {
 *     console.log(`Update available: ${descriptor.newVersion}`);
 * }
 * ```
 */
import { attempt, attemptSync } from '@logosdx/utils';

import { UpdateError } from '../errors/errors.js';
import { toUpdateError } from '../errors/normalize.js';
import type { UpdaterObserver } from '../observer.js';
import type { HttpTransport } from '../transport/http.js';
import type { HttpMethod } from '../transport/types.js';
import { parseDescriptor, resolveFieldKeys } from './descriptor.js';
import type {
    CheckUpdateCallback,
    DescriptorFieldKeys,
    UpdateCheckerOptions,
    UpdateDescriptor,
} from './types.js';
import { CHECK_METHODS } from './types.js';
import { hasUpdate } from './version.js';

type MetadataSource =
    | { kind: 'http'; url: string; transport: HttpTransport }
    | { kind: 'callback'; callback: CheckUpdateCallback };

// =============================================================================
// Request Validation
// =============================================================================

/**
 * Normalize and validate a request method.
 *
 * @throws UpdateError with code INVALID_METHOD
 */
export function resolveMethod(method: string | undefined): HttpMethod {

    const upper = (method ?? 'GET').toUpperCase();
    const match = CHECK_METHODS.find((candidate) => candidate === upper);

    if (!match) {

        throw new UpdateError('INVALID_METHOD', `Unsupported request method '${method}', use GET or POST`);

    }

    return match;

}

/**
 * Serialize a request body.
 *
 * POST takes a string (sent as-is) or a plain object (sent as JSON).
 * GET takes none.
 *
 * @throws UpdateError with code INVALID_BODY
 */
export function resolveBody(method: HttpMethod, body: unknown): string | undefined {

    if (body === undefined || body === null) {

        return undefined;

    }

    if (method === 'GET') {

        throw new UpdateError('INVALID_BODY', 'GET requests cannot carry a body');

    }

    if (typeof body === 'string') {

        return body;

    }

    if (typeof body === 'object' && !Array.isArray(body)) {

        const [json, err] = attemptSync(() => JSON.stringify(body));

        if (err) {

            throw new UpdateError('INVALID_BODY', `Request body is not serializable: ${err.message}`, { cause: err });

        }

        return json;

    }

    throw new UpdateError('INVALID_BODY', `Request body must be a string or an object, got ${typeof body}`);

}

// =============================================================================
// Checker
// =============================================================================

/**
 * Checks one metadata source for newer versions.
 */
export class UpdateChecker {

    #currentVersion: string;
    #source: MetadataSource;
    #method: HttpMethod;
    #headers: Record<string, string>;
    #body: string | undefined;
    #timeoutMs: number | undefined;
    #fieldKeys: DescriptorFieldKeys;
    #observer: UpdaterObserver | null;

    /**
     * @throws UpdateError MISSING_URL when no source is configured,
     * APPLICATION_ERROR when both are, INVALID_METHOD or INVALID_BODY
     * for a bad request shape
     */
    constructor(options: UpdateCheckerOptions) {

        this.#currentVersion = options.currentVersion;
        this.#source = resolveSource(options);
        this.#method = resolveMethod(options.method);
        this.#body = resolveBody(this.#method, options.body);
        this.#headers = { ...options.headers };
        this.#timeoutMs = options.timeoutMs;
        this.#fieldKeys = resolveFieldKeys(options.fieldKeys);
        this.#observer = options.observer ?? null;

        if (this.#body !== undefined && typeof options.body !== 'string') {

            this.#headers = { 'content-type': 'application/json', ...this.#headers };

        }

    }

    /**
     * Version compared against the metadata.
     */
    get currentVersion(): string {

        return this.#currentVersion;

    }

    /**
     * Replace the running version. Empty values are ignored.
     */
    set currentVersion(version: string) {

        if (version.trim() !== '') {

            this.#currentVersion = version;

        }

    }

    get fieldKeys(): Readonly<DescriptorFieldKeys> {

        return this.#fieldKeys;

    }

    /**
     * Fetch metadata and return the descriptor when it is newer.
     *
     * @returns The descriptor, or null when the running version is current
     * @throws UpdateError NETWORK_ERROR, TIMEOUT, SERVER_ERROR,
     * SERVICE_UNAVAILABLE, INVALID_RESPONSE or PARSE_ERROR; errors thrown as
     * `UpdateError` by a callback pass through unchanged
     */
    async checkForUpdate(): Promise<UpdateDescriptor | null> {

        const started = Date.now();

        this.#observer?.emit('check:start', {
            source: this.#source.kind,
            url: this.#source.kind === 'http' ? this.#source.url : null,
            currentVersion: this.#currentVersion,
        });

        const [raw, fetchErr] = await attempt(() => this.#fetchMetadata());

        if (fetchErr) {

            throw this.#failed(toUpdateError(fetchErr, 'PARSE_ERROR', 'Update check failed'));

        }

        const [descriptor, parseErr] = attemptSync(() => parseDescriptor(raw, this.#fieldKeys));

        if (parseErr) {

            throw this.#failed(toUpdateError(parseErr, 'PARSE_ERROR', 'Invalid update metadata'));

        }

        const available = hasUpdate(this.#currentVersion, descriptor.newVersion);

        this.#observer?.emit('check:complete', {
            currentVersion: this.#currentVersion,
            newVersion: descriptor.newVersion || null,
            available,
            durationMs: Date.now() - started,
        });

        return available ? descriptor : null;

    }

    async #fetchMetadata(): Promise<unknown> {

        const source = this.#source;

        if (source.kind === 'callback') {

            return source.callback();

        }

        return source.transport.fetchJson(source.url, {
            method: this.#method,
            headers: this.#headers,
            ...(this.#body !== undefined ? { body: this.#body } : {}),
            ...(this.#timeoutMs !== undefined ? { timeoutMs: this.#timeoutMs } : {}),
        });

    }

    #failed(error: UpdateError): UpdateError {

        this.#observer?.emit('check:failed', { code: error.code, error: error.message });

        return error;

    }

}

function resolveSource(options: UpdateCheckerOptions): MetadataSource {

    const url = options.updateUrl?.trim() ?? '';

    if (url !== '' && options.onCheckUpdate) {

        throw new UpdateError('APPLICATION_ERROR', 'Configure either updateUrl or onCheckUpdate, not both');

    }

    if (options.onCheckUpdate) {

        return { kind: 'callback', callback: options.onCheckUpdate };

    }

    if (url === '') {

        throw new UpdateError('MISSING_URL', 'An update URL or an onCheckUpdate callback is required');

    }

    if (!options.transport) {

        throw new UpdateError('APPLICATION_ERROR', 'Checking an update URL requires an HTTP transport');

    }

    return { kind: 'http', url, transport: options.transport };

}
