import { readFileSync } from 'fs';

const PACKAGE_JSON = new URL('../../package.json', import.meta.url);

/**
 * Version from package.json, or `0.0.0` when it cannot be read (bundled builds).
 */
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    // absent when bundled
    return '0.0.0';
  }
}

export const VERSION: string = readVersion();
