/**
 * @fileoverview Timeouts and limits for the session core.
 *
 * @module config/timing
 */

// ============================================================================
// External Commands
// ============================================================================

/** Timeout for short helper commands: ps, git (ms) */
export const EXEC_TIMEOUT_MS = 5000;

// ============================================================================
// Log Inspection
// ============================================================================

/** Bytes read from the end of a log file to find the exit sentinel */
export const LOG_TAIL_BYTES = 4096;

// ============================================================================
// Lifecycle Audit Log
// ============================================================================

/** Lifecycle log is trimmed once it grows past this many lines */
export const LIFECYCLE_LOG_MAX_LINES = 10_000;

/** Lines kept after a trim */
export const LIFECYCLE_LOG_TRIM_TO = 8_000;

/** Default number of entries returned by a lifecycle query */
export const LIFECYCLE_QUERY_LIMIT = 200;
