/**
 * Installer hand-off.
 *
 * Installing is platform specific and lives outside this package. The
 * controller only needs something that accepts a verified artifact.
 *
 * @example
 * ```typescript
 * const installer: Installer = {
 *     supports: (platform) => platform === 'win32',
 *     install: async (filePath) => {
 *         await runSilentSetup(filePath)
 *     },
 * }
 * ```
 */
import type { UpdateDescriptor } from '../update/types.js';

export interface Installer {
    /**
     * Whether this installer can run on the platform. Assumed true when
     * omitted.
     */
    supports?(platform: NodeJS.Platform): boolean;

    /**
     * Install the verified artifact at `filePath`.
     */
    install(filePath: string, descriptor: UpdateDescriptor): Promise<void>;
}
