/**
 * Common error messages and patterns.
 *
 * Centralized location for reusable error messages with consistent formatting.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Context for "node not running" messages.
 */
export interface NodeErrorContext {
  /** Socket the command tried to reach */
  socketPath?: string;
  /** Underlying transport error message */
  lastError?: string;
}

/**
 * Generate "node not running" error message with suggestions.
 *
 * @example
 * ```typescript
 * console.error(nodeNotRunningError({ socketPath: '/var/run/relay.ipc' }));
 * ```
 */
export function nodeNotRunningError(context?: NodeErrorContext): string {
  return joinLines(
    'Error: Node not running',
    context?.socketPath && `Socket: ${context.socketPath}`,
    context?.lastError && `Last error: ${context.lastError}`,
    '',
    'Start the node:',
    '  relayctl start <config> --socket <path> --wait'
  );
}

/**
 * Generate "no socket configured" error message.
 */
export function missingSocketError(envVar: string): string {
  return `No node socket given. Pass --socket <path> or set ${envVar}.`;
}

/**
 * Generate generic error message.
 */
export function genericError(message: string): string {
  return `Error: ${message}`;
}
