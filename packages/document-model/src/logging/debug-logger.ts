/**
 * @file Debug Logger
 *
 * The `debug` option accepted by models and change feeds: `true` logs to the
 * console with a timestamped prefix, a function receives every entry, and
 * `false` disables logging.
 *
 * @module document-model/logging/debug-logger
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Debug logger interface.
 */
export interface DebugLogger {
  /**
   * Log a debug message.
   * @param message - The message to log
   * @param data - Optional data to include
   */
  (message: string, data?: Record<string, unknown>): void
}

/**
 * Value of a `debug` option.
 */
export type DebugOption = boolean | DebugLogger

// =============================================================================
// Factory
// =============================================================================

const noop: DebugLogger = () => {}

/**
 * Create a debug logger for a named scope.
 */
export function createDebugLogger(scope: string, debug: DebugOption | undefined): DebugLogger {
  if (!debug) {
    return noop
  }

  if (typeof debug === 'function') {
    return (message, data) => debug(`[${scope}] ${message}`, data)
  }

  return (message: string, data?: Record<string, unknown>) => {
    const timestamp = new Date().toISOString()
    const prefix = `[document-model ${scope} ${timestamp}]`
    if (data) {
      console.log(prefix, message, data)
    } else {
      console.log(prefix, message)
    }
  }
}
