/**
 * Version comparison.
 *
 * Accepts loosely formatted version strings as they appear in update
 * metadata: an optional `v` prefix, any number of numeric segments, an
 * optional pre-release tag and optional build metadata.
 *
 * Handles:
 * - Stable updates (1.9.0 -> 1.10.0, numeric not lexical)
 * - Uneven segment counts (1.0 == 1.0.0, 1.0.0.1 > 1.0.0)
 * - Pre-release tags (1.0.0-beta < 1.0.0)
 *
 * @example
 * ```typescript
 * compareVersions('1.9.0', '1.10.0');   // -1
 * hasUpdate('1.0.0', 'v1.0.1+build.7'); // true
 * ```
 */

// =============================================================================
// Parsing
// =============================================================================

/**
 * A version string broken into comparable parts.
 */
export interface ParsedVersion {
    /** Numeric core segments; unparsable segments are 0 */
    segments: number[];

    /** Pre-release tag after the first '-' (possibly empty), or null for a release */
    prerelease: string | null;
}

const NUMERIC_SEGMENT = /^\d+$/;

/**
 * Parse a version string.
 *
 * Surrounding whitespace is ignored. Build metadata (from the first '+')
 * is dropped and never takes part in comparison. Any '-' marks a
 * pre-release, so `1.0.0-` carries an empty tag.
 *
 * @example
 * ```typescript
 * parseVersion('v2.1.0-rc.1+abc');  // { segments: [2, 1, 0], prerelease: 'rc.1' }
 * parseVersion('1..x');             // { segments: [1, 0, 0], prerelease: null }
 * parseVersion('');                 // { segments: [0], prerelease: null }
 * ```
 */
export function parseVersion(version: string): ParsedVersion {

    let rest = version.trim().replace(/^[vV]/, '');

    const plus = rest.indexOf('+');

    if (plus >= 0) {

        rest = rest.slice(0, plus);

    }

    const dash = rest.indexOf('-');
    const core = dash >= 0 ? rest.slice(0, dash) : rest;

    const segments = core
        .split('.')
        .map((segment) => NUMERIC_SEGMENT.test(segment) ? Number(segment) : 0);

    return {
        segments,
        prerelease: dash >= 0 ? rest.slice(dash + 1) : null,
    };

}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Compare two version strings.
 *
 * Numeric segments are compared position by position; a side that runs
 * out counts as 0. On a numeric tie, a release outranks any pre-release,
 * and two pre-release tags compare by plain string order (so `rc10`
 * sorts before `rc2`).
 *
 * @returns -1 if a < b, 0 if equal, 1 if a > b
 *
 * @example
 * ```typescript
 * compareVersions('1.0.0', '2.0.0');        // -1
 * compareVersions('1.0', '1.0.0');          // 0
 * compareVersions('1.0.0', '1.0.0-beta');   // 1
 * compareVersions('1.0.0-alpha', '1.0.0-beta'); // -1
 * ```
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {

    const left = parseVersion(a);
    const right = parseVersion(b);

    const length = Math.max(left.segments.length, right.segments.length);

    for (let i = 0; i < length; i++) {

        const x = left.segments[i] ?? 0;
        const y = right.segments[i] ?? 0;

        if (x !== y) {

            return x < y ? -1 : 1;

        }

    }

    if (left.prerelease === right.prerelease) {

        return 0;

    }

    if (left.prerelease === null) {

        return 1;

    }

    if (right.prerelease === null) {

        return -1;

    }

    return left.prerelease < right.prerelease ? -1 : 1;

}

/**
 * Check whether a candidate version is newer than the current one.
 *
 * @example
 * ```typescript
 * hasUpdate('1.9.0', '1.10.0');  // true
 * hasUpdate('1.0.0', '1.0.0');   // false
 * ```
 */
export function hasUpdate(current: string, candidate: string): boolean {

    return compareVersions(current, candidate) < 0;

}
