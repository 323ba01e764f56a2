/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * By default only 'info' level logs are shown. Set RELAYCTL_DEBUG=1 or pass
 * --debug to enable 'debug' level logs.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Disable debug logging enabled through {@link enableDebugLogging}.
 *
 * The RELAYCTL_DEBUG environment variable still applies.
 */
export function disableDebugLogging(): void {
  debugEnabled = false;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['RELAYCTL_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (user-facing milestones, errors)
 * - 'debug': Only shown in debug mode (IPC traces, timings, retries)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'relayctl' | 'supervisor' | 'transport' | 'client' | 'health';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * All output goes to stderr so command output on stdout stays machine-readable.
 *
 * @example
 * ```typescript
 * const log = createLogger('supervisor');
 *
 * log.info('Node started');           // always shown
 * log.debug('Waiting 100ms to settle'); // only with --debug
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`[${context}] ${message}`);
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}
