/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and user-facing strings for easier maintenance.
 */

/**
 * Rendering limits
 */
export const RENDER_CONSTANTS = {
  /**
   * Maximum characters of table text inside one Slack section block.
   * Slack rejects section text over 3000 characters; the margin leaves room
   * for the code fences and the truncation marker.
   */
  MAX_TABLE_CHARS: 2950,

  TRUNCATION_MARKER: "...",

  /** Channel id that receives Block Kit replies instead of plain text. */
  BLOCKS_CHANNEL: "slack",
} as const;

/**
 * Column type tags (as reported by the SQL statement manifest)
 */
export const COLUMN_TYPES = {
  DECIMAL_TYPES: ["DECIMAL", "DOUBLE", "FLOAT"],
  INTEGER_TYPES: ["INT", "BIGINT", "LONG"],
} as const;

/**
 * Genie API polling and retry configuration
 */
export const GENIE_CONSTANTS = {
  /** Default overall wait for a message to finish (matches the Databricks SDK waiter). */
  DEFAULT_WAIT_TIMEOUT_MS: 20 * 60 * 1000,

  /** Poll delay grows by this much per attempt... */
  POLL_STEP_MS: 1000,

  /** ...up to this cap. */
  MAX_POLL_DELAY_MS: 10_000,

  /** Random extra delay added to every poll. */
  POLL_JITTER_MS: 750,

  /** Attempts (including the first) for idempotent GET calls. */
  READ_MAX_ATTEMPTS: 3,

  READ_RETRY_BASE_MS: 500,

  /** Upper bound on extra result chunks fetched for one statement. */
  MAX_RESULT_CHUNKS: 20,

  COMPLETED_STATUS: "COMPLETED",
  FAILED_STATUSES: ["FAILED", "CANCELLED", "QUERY_RESULT_EXPIRED"],
} as const;

/**
 * Fixed user-facing messages
 */
export const USER_MESSAGES = {
  GENERIC_FAILURE: "An error occurred while processing your request.",
  DECODE_FAILURE: "Failed to decode response from the server.",
  NO_DATA: "No data available.",
  UNEXPECTED_FORMAT: "Unexpected data format received.",
  WELCOME: "Welcome to the Databricks Genie Bot!",
} as const;
