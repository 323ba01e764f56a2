/**
 * Structured JSON output for CLI commands.
 *
 * Every --json response carries the package version and a success flag so
 * scripts can check one field before reading the rest.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error response.
   *
   * @param options - Optional fields (exitCode, suggestion, additional data)
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  /**
   * Build a JSON success response around command data.
   */
  static buildJsonSuccess(data: object): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}
