/**
 * Retry module.
 */
export { RetryStrategy, RETRY_PRESETS } from './strategy.js';
export type { RetryStrategyOptions, RetryPresetName } from './strategy.js';
