/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs.
 *
 * Features:
 * - Automatic CI detection (stdout)
 * - Redaction of secret headers and signed URLs
 * - Compact lines or JSON entries
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';

// Redaction
export {
    isSensitiveKey,
    maskValue,
    maskUrl,
    filterData,
} from './redact.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
