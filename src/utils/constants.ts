/**
 * Centralized constants for the interpreter and runner
 */

// === Default Configuration ===
/** Default alias call-stack capacity */
export const DEFAULT_MAX_CALL_DEPTH = 1000;
/** Default directory for run logs */
export const DEFAULT_LOG_DIR = 'logs';
/** Config file looked up in the working directory */
export const CONFIG_FILE_NAME = 'memscript.config.json5';

// === Display Limits ===
/** Truncation length for statement previews in traces */
export const TRUNCATE_STATEMENT = 60;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
/** Seconds per minute */
export const SECONDS_PER_MINUTE = 60;
/** Seconds per hour */
export const SECONDS_PER_HOUR = 3600;
