/**
 * Shared formatting utilities for UI output.
 */

/**
 * Join lines, dropping `undefined`, `null` and `false` entries so optional
 * lines can be written inline with `&&`.
 *
 * @example
 * ```typescript
 * joinLines('Error: Node not running', cleaned && '(stale socket removed)', '', 'Start it with:')
 * ```
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

/**
 * Human-readable byte count.
 *
 * @example
 * ```typescript
 * formatBytes(512)     // → '512 B'
 * formatBytes(2048)    // → '2.0 KB'
 * formatBytes(3145728) // → '3.0 MB'
 * ```
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
