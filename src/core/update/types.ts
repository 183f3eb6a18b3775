/**
 * Update check types.
 *
 * Type definitions for update metadata and checker configuration.
 */
import type { HttpTransport } from '../transport/http.js';
import type { HttpMethod } from '../transport/types.js';
import type { UpdaterObserver } from '../observer.js';

/**
 * A parsed update offer.
 *
 * `newVersion` and `downloadUrl` are always present (empty when the
 * source had none). Everything else is present only when the source
 * carried a usable value.
 */
export interface UpdateDescriptor {
    readonly newVersion: string;
    readonly downloadUrl: string;
    readonly changelog: string;

    /** Whether the user may skip the update */
    readonly isForceUpdate: boolean;

    readonly publishDate?: Date;

    /** Artifact size in bytes */
    readonly fileSize?: number;

    /** Hex digest of the artifact */
    readonly checksum?: string;

    /** Source fields not mapped to a recognized key */
    readonly extra?: Readonly<Record<string, unknown>>;
}

/**
 * Where each descriptor field is read from in the raw metadata.
 *
 * Optional fields may be set to `null` to ignore them entirely.
 */
export interface DescriptorFieldKeys {
    version: string;
    downloadUrl: string;
    changelog: string | null;
    isForceUpdate: string | null;
    publishDate: string | null;
    fileSize: string | null;
    checksum: string | null;
}

/**
 * Default metadata keys.
 */
export const DEFAULT_FIELD_KEYS: Readonly<DescriptorFieldKeys> = Object.freeze({
    version: 'version',
    downloadUrl: 'downloadUrl',
    changelog: 'changelog',
    isForceUpdate: 'isForceUpdate',
    publishDate: 'publishDate',
    fileSize: 'fileSize',
    checksum: 'md5',
});

/**
 * Caller-supplied metadata source.
 *
 * Resolves to the raw metadata record, exactly as an endpoint would
 * return it.
 */
export type CheckUpdateCallback = () => Promise<Record<string, unknown>>;

/**
 * Update checker configuration.
 *
 * Exactly one of `updateUrl` or `onCheckUpdate` must be set.
 */
export interface UpdateCheckerOptions {
    /** Version of the running application */
    currentVersion: string;

    /** Metadata endpoint (requires `transport`) */
    updateUrl?: string;

    /** Custom metadata source used instead of HTTP */
    onCheckUpdate?: CheckUpdateCallback;

    /** Shared transport for HTTP checks */
    transport?: HttpTransport;

    /** Defaults to GET; accepts any casing */
    method?: string;

    headers?: Record<string, string>;

    /** POST body; objects are sent as JSON, strings verbatim */
    body?: unknown;

    /** Metadata request timeout */
    timeoutMs?: number;

    fieldKeys?: Partial<DescriptorFieldKeys>;

    observer?: UpdaterObserver;
}

/**
 * Methods the checker accepts.
 */
export const CHECK_METHODS: readonly HttpMethod[] = ['GET', 'POST'];
