/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the codebase.
 *
 * Timeout categories:
 * - METHOD: Per-method extraction attempts (the cascade owns these)
 * - BROWSER: Navigation and settle waits inside an emulated browser
 * - PAUSE: Scheduler pauses between batches
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Structured-metadata method attempt
   * Plain HTTP GET plus JSON-LD / meta parsing
   */
  STRUCTURED_METHOD: 15000,

  /**
   * Heuristic DOM method attempt
   * HTTP GET with a browser header profile plus paragraph scoring
   */
  HEURISTIC_METHOD: 20000,

  /**
   * Browser emulation method attempt
   * Covers session launch, navigation and content read
   */
  BROWSER_METHOD: 60000,

  /**
   * Navigation timeout handed to the browser session
   */
  BROWSER_NAVIGATION: 45000,

  /**
   * Post-load settle delay
   * Brief wait after DOMContentLoaded for client-rendered article bodies
   */
  BROWSER_SETTLE: 1500,

  /**
   * Minimum pause between batches when the rotation was healthy
   */
  INTER_BATCH_MIN_PAUSE: 5000,
} as const;
