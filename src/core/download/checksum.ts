/**
 * Artifact checksum verification.
 *
 * Streams the file through `crypto.createHash` so large artifacts never
 * sit in memory.
 */
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import type { ChecksumAlgorithm } from './types.js';

/**
 * Compute the hex digest of a file.
 *
 * @example
 * ```typescript
 * const digest = await computeFileChecksum('/tmp/app.zip', 'sha256')
 * ```
 */
export async function computeFileChecksum(
    filepath: string,
    algorithm: ChecksumAlgorithm = 'md5',
): Promise<string> {

    const hash = createHash(algorithm);

    for await (const chunk of createReadStream(filepath)) {

        hash.update(chunk);

    }

    return hash.digest('hex');

}

/**
 * Compare two hex digests, ignoring case and surrounding whitespace.
 */
export function checksumsMatch(expected: string, actual: string): boolean {

    return expected.trim().toLowerCase() === actual.trim().toLowerCase();

}
