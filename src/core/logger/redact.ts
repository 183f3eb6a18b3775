/**
 * Log redaction.
 *
 * Update traffic carries credentials in two places: request headers
 * (`Authorization`, API keys, cookies) and signed artifact URLs
 * (`?token=`, `X-Amz-Signature=`, `user:pass@`). Both are masked before
 * an entry reaches the formatter.
 *
 * @example
 * ```typescript
 * filterData({ headers: { Authorization: 'Bearer abc' } }, 'info')
 * // { headers: { Authorization: '<Authorization ********** (10) />' } }
 *
 * filterData({ url: 'https://cdn.example.com/app.zip?sig=abc' }, 'info')
 * // { url: 'https://cdn.example.com/app.zip?sig=***' }
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;
const URL_MASK = '***';
const HTTP_URL = /^https?:\/\//i;

// Keys are compared lowercased, without separators or the `updater` env prefix
const SENSITIVE_KEYS = new Set([
    'authorization',
    'proxyauthorization',
    'cookie',
    'setcookie',
    'apikey',
    'xapikey',
    'xauthtoken',
    'token',
    'accesstoken',
    'authtoken',
    'bearertoken',
    'secret',
    'clientsecret',
    'password',
    'credential',
]);

const SENSITIVE_QUERY_PARAMS = new Set([
    'token',
    'accesstoken',
    'apikey',
    'key',
    'sig',
    'signature',
    'xamzsignature',
    'xamzcredential',
    'xamzsecuritytoken',
    'xgoogsignature',
    'xgoogcredential',
]);

function normalizeKey(key: string): string {

    const flat = key.toLowerCase().replace(/[-_\s]/g, '');

    return flat.startsWith('updater') ? flat.slice('updater'.length) : flat;

}

/**
 * Whether a header, payload or env key holds a secret.
 *
 * @example
 * ```typescript
 * isSensitiveKey('Proxy-Authorization') // true
 * isSensitiveKey('UPDATER_TOKEN')       // true
 * isSensitiveKey('downloadUrl')         // false
 * ```
 */
export function isSensitiveKey(key: string): boolean {

    return SENSITIVE_KEYS.has(normalizeKey(key));

}

// ─────────────────────────────────────────────────────────────
// Masking
// ─────────────────────────────────────────────────────────────

function maskLabel(key: string): string {

    return key
        .split(/[-_\s]+/)
        .filter((word) => word.length > 0)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join('');

}

/**
 * Mask a secret as `<Label mask (length) />`.
 *
 * At most 12 mask characters are shown, then `...`. At verbose level the
 * first 4 characters stay readable.
 *
 * @example
 * ```typescript
 * maskValue('mysecretpassword', 'password', 'info')
 * // '<Password ************... (16) />'
 * ```
 */
export function maskValue(value: string, key: string, level: LogLevel): string {

    const shown = level === 'verbose' && value.length >= 4 ? value.slice(0, 4) : '';
    const stars = '*'.repeat(Math.max(0, Math.min(value.length, MASK_MAX_LENGTH) - shown.length));
    const overflow = value.length > MASK_MAX_LENGTH ? '...' : '';

    return `<${maskLabel(key)} ${shown}${stars}${overflow} (${value.length}) />`;

}

/**
 * Mask the password and signing parameters of a URL.
 *
 * Anything that does not parse as a URL, or carries no credentials, is
 * returned unchanged.
 */
export function maskUrl(value: string): string {

    const [url, err] = attemptSync(() => new URL(value));

    if (err || !url) {

        return value;

    }

    let masked = false;

    if (url.password) {

        url.password = URL_MASK;
        masked = true;

    }

    for (const name of [...url.searchParams.keys()]) {

        if (SENSITIVE_QUERY_PARAMS.has(normalizeKey(name))) {

            url.searchParams.set(name, URL_MASK);
            masked = true;

        }

    }

    return masked ? url.href : value;

}

// ─────────────────────────────────────────────────────────────
// Data Filtering
// ─────────────────────────────────────────────────────────────

function isPlainRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && !(value instanceof URL)
        && !(value instanceof Date)
        && !(value instanceof Error);

}

function filterValue(key: string, value: unknown, level: LogLevel): unknown {

    if (typeof value === 'string') {

        if (isSensitiveKey(key)) {

            return maskValue(value, key, level);

        }

        return HTTP_URL.test(value) ? maskUrl(value) : value;

    }

    if (Array.isArray(value)) {

        return value.map((item) => filterValue(key, item, level));

    }

    if (isPlainRecord(value)) {

        return filterData(value, level);

    }

    return value;

}

/**
 * Copy log data with secrets masked.
 *
 * Sensitive keys are masked at any depth, including every string of an
 * array under such a key (`set-cookie`). Other strings that are http(s)
 * URLs go through `maskUrl`. The input is never mutated.
 */
export function filterData(
    entry: Record<string, unknown>,
    level: LogLevel,
): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        filtered[key] = filterValue(key, value, level);

    }

    return filtered;

}
