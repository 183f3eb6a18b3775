/**
 * Update module.
 *
 * Version comparison, metadata parsing and update checks.
 *
 * @example
 * ```typescript
 * import { UpdateChecker, compareVersions } from 'inapp-updater';
 *
 * const checker = new UpdateChecker({ currentVersion: '1.0.0', onCheckUpdate });
 * const descriptor = await checker.checkForUpdate();
 * ```
 */
export { compareVersions, hasUpdate, parseVersion } from './version.js';
export type { ParsedVersion } from './version.js';
export {
    parseDescriptor,
    parseDescriptorJson,
    descriptorToRecord,
    descriptorToJson,
    resolveFieldKeys,
} from './descriptor.js';
export { UpdateChecker, resolveMethod, resolveBody } from './checker.js';
export { DEFAULT_FIELD_KEYS, CHECK_METHODS } from './types.js';
export type {
    UpdateDescriptor,
    DescriptorFieldKeys,
    CheckUpdateCallback,
    UpdateCheckerOptions,
} from './types.js';
