/**
 * Error handling for relayctl CLI.
 *
 * Provides structured error classes for CLI commands.
 */

// CLI-level errors (user-facing command errors)
export { CommandError, type ErrorMetadata } from './CommandError.js';
