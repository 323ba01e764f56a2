/**
 * Logging utilities for relayctl.
 *
 * Context-prefixed stderr logging with debug mode support.
 */

export {
  createLogger,
  disableDebugLogging,
  enableDebugLogging,
  isDebugEnabled,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logger.js';
