/**
 * Update descriptor parsing and serialization.
 *
 * Metadata endpoints disagree on key names and value types, so every
 * recognized field is read through `DescriptorFieldKeys` and coerced
 * leniently. Keys nobody asked for are kept in `extra`.
 *
 * @example
 * ```typescript
 * const descriptor = parseDescriptor({
 *     version: '1.10.0',
 *     downloadUrl: 'https://cdn.example.com/app-1.10.0.zip',
 *     fileSize: '1000',
 *     channel: 'stable',
 * })
 * // { newVersion: '1.10.0', fileSize: 1000, extra: { channel: 'stable' }, ... }
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { UpdateError } from '../errors/errors.js';
import type { DescriptorFieldKeys, UpdateDescriptor } from './types.js';
import { DEFAULT_FIELD_KEYS } from './types.js';

// =============================================================================
// Field Keys
// =============================================================================

/**
 * Merge partial field keys over the defaults.
 *
 * `null` disables an optional field; `undefined` keeps the default.
 */
export function resolveFieldKeys(keys: Partial<DescriptorFieldKeys> = {}): DescriptorFieldKeys {

    return {
        version: keys.version ?? DEFAULT_FIELD_KEYS.version,
        downloadUrl: keys.downloadUrl ?? DEFAULT_FIELD_KEYS.downloadUrl,
        changelog: keys.changelog !== undefined ? keys.changelog : DEFAULT_FIELD_KEYS.changelog,
        isForceUpdate: keys.isForceUpdate !== undefined ? keys.isForceUpdate : DEFAULT_FIELD_KEYS.isForceUpdate,
        publishDate: keys.publishDate !== undefined ? keys.publishDate : DEFAULT_FIELD_KEYS.publishDate,
        fileSize: keys.fileSize !== undefined ? keys.fileSize : DEFAULT_FIELD_KEYS.fileSize,
        checksum: keys.checksum !== undefined ? keys.checksum : DEFAULT_FIELD_KEYS.checksum,
    };

}

function recognizedKeys(keys: DescriptorFieldKeys): Set<string> {

    const names = new Set<string>();

    for (const name of Object.values(keys)) {

        if (name !== null) {

            names.add(name);

        }

    }

    return names;

}

// =============================================================================
// Value Coercion
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value);

}

function readString(raw: Record<string, unknown>, key: string | null, field: string): string {

    if (key === null) {

        return '';

    }

    const value = raw[key];

    if (value === undefined || value === null) {

        return '';

    }

    if (typeof value === 'string') {

        return value;

    }

    throw new UpdateError('PARSE_ERROR', `Field '${key}' (${field}) must be a string, got ${typeof value}`);

}

function readVersion(raw: Record<string, unknown>, key: string): string {

    const value = raw[key];

    // Some endpoints publish versions as bare numbers (e.g. 2 or 1.5)
    if (typeof value === 'number' && Number.isFinite(value)) {

        return String(value);

    }

    return readString(raw, key, 'version').trim();

}

function readForceUpdate(raw: Record<string, unknown>, key: string | null): boolean {

    if (key === null) {

        return false;

    }

    const value = raw[key];

    if (value === undefined || value === null) {

        return false;

    }

    if (typeof value === 'boolean') {

        return value;

    }

    if (typeof value === 'string') {

        return value.trim().toLowerCase() === 'true';

    }

    throw new UpdateError('PARSE_ERROR', `Field '${key}' (isForceUpdate) must be a boolean, got ${typeof value}`);

}

function readPublishDate(raw: Record<string, unknown>, key: string | null): Date | undefined {

    if (key === null) {

        return undefined;

    }

    const value = raw[key];
    let date: Date | undefined;

    if (typeof value === 'string' && value.trim() !== '') {

        date = new Date(value);

    }
    else if (typeof value === 'number' && Number.isInteger(value)) {

        date = new Date(value);

    }

    if (!date || Number.isNaN(date.getTime())) {

        return undefined;

    }

    return date;

}

function readFileSize(raw: Record<string, unknown>, key: string | null): number | undefined {

    if (key === null) {

        return undefined;

    }

    const value = raw[key];

    if (typeof value === 'number') {

        return Number.isSafeInteger(value) && value >= 0 ? value : undefined;

    }

    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {

        const size = Number(value.trim());

        return Number.isSafeInteger(size) ? size : undefined;

    }

    return undefined;

}

function readChecksum(raw: Record<string, unknown>, key: string | null): string | undefined {

    if (key === null) {

        return undefined;

    }

    const value = raw[key];

    if (typeof value !== 'string' && typeof value !== 'number') {

        return undefined;

    }

    const checksum = String(value).trim();

    return checksum.length > 0 ? checksum : undefined;

}

// =============================================================================
// Parse
// =============================================================================

/**
 * Parse raw update metadata into a descriptor.
 *
 * Missing fields are not errors. A recognized field holding a value of
 * the wrong kind (an object where a string belongs) is a `PARSE_ERROR`.
 *
 * @throws UpdateError with code PARSE_ERROR
 *
 * @example
 * ```typescript
 * parseDescriptor({ ver: '2.0.0', url: 'https://x/app.zip' }, {
 *     version: 'ver',
 *     downloadUrl: 'url',
 *     checksum: null,
 * })
 * ```
 */
export function parseDescriptor(
    raw: unknown,
    keys: Partial<DescriptorFieldKeys> = {},
): UpdateDescriptor {

    if (!isRecord(raw)) {

        throw new UpdateError('PARSE_ERROR', 'Update metadata must be a JSON object');

    }

    const fieldKeys = resolveFieldKeys(keys);
    const recognized = recognizedKeys(fieldKeys);

    const publishDate = readPublishDate(raw, fieldKeys.publishDate);
    const fileSize = readFileSize(raw, fieldKeys.fileSize);
    const checksum = readChecksum(raw, fieldKeys.checksum);

    const extraEntries = Object.entries(raw).filter(([key]) => !recognized.has(key));
    const extra = extraEntries.length > 0 ? Object.freeze(Object.fromEntries(extraEntries)) : undefined;

    const descriptor: UpdateDescriptor = {
        newVersion: readVersion(raw, fieldKeys.version),
        downloadUrl: readString(raw, fieldKeys.downloadUrl, 'downloadUrl'),
        changelog: readString(raw, fieldKeys.changelog, 'changelog'),
        isForceUpdate: readForceUpdate(raw, fieldKeys.isForceUpdate),
        ...(publishDate ? { publishDate } : {}),
        ...(fileSize !== undefined ? { fileSize } : {}),
        ...(checksum ? { checksum } : {}),
        ...(extra ? { extra } : {}),
    };

    return Object.freeze(descriptor);

}

/**
 * Parse a JSON metadata document.
 *
 * @throws UpdateError with code PARSE_ERROR
 */
export function parseDescriptorJson(
    text: string,
    keys: Partial<DescriptorFieldKeys> = {},
): UpdateDescriptor {

    const [raw, err] = attemptSync((): unknown => JSON.parse(text));

    if (err) {

        throw new UpdateError('PARSE_ERROR', `Invalid update metadata JSON: ${err.message}`, { cause: err });

    }

    return parseDescriptor(raw, keys);

}

// =============================================================================
// Serialize
// =============================================================================

/**
 * Convert a descriptor back into a raw metadata record.
 *
 * Uses the same key mapping as parsing, so
 * `parseDescriptor(descriptorToRecord(d, keys), keys)` yields an equal
 * descriptor. Disabled fields are left out.
 *
 * @example
 * ```typescript
 * descriptorToRecord(descriptor)
 * // { version: '1.10.0', downloadUrl: '...', changelog: '', isForceUpdate: false }
 * ```
 */
export function descriptorToRecord(
    descriptor: UpdateDescriptor,
    keys: Partial<DescriptorFieldKeys> = {},
): Record<string, unknown> {

    const fieldKeys = resolveFieldKeys(keys);
    const record: Record<string, unknown> = { ...descriptor.extra };

    record[fieldKeys.version] = descriptor.newVersion;
    record[fieldKeys.downloadUrl] = descriptor.downloadUrl;

    if (fieldKeys.changelog !== null) {

        record[fieldKeys.changelog] = descriptor.changelog;

    }

    if (fieldKeys.isForceUpdate !== null) {

        record[fieldKeys.isForceUpdate] = descriptor.isForceUpdate;

    }

    if (fieldKeys.publishDate !== null && descriptor.publishDate) {

        record[fieldKeys.publishDate] = descriptor.publishDate.toISOString();

    }

    if (fieldKeys.fileSize !== null && descriptor.fileSize !== undefined) {

        record[fieldKeys.fileSize] = descriptor.fileSize;

    }

    if (fieldKeys.checksum !== null && descriptor.checksum) {

        record[fieldKeys.checksum] = descriptor.checksum;

    }

    return record;

}

/**
 * Serialize a descriptor as metadata JSON.
 */
export function descriptorToJson(
    descriptor: UpdateDescriptor,
    keys: Partial<DescriptorFieldKeys> = {},
): string {

    return JSON.stringify(descriptorToRecord(descriptor, keys));

}
