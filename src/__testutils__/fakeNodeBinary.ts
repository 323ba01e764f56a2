/**
 * fakeNodeBinary - shell scripts standing in for the node executable
 *
 * The script receives the config path as $1, like the real node.
 *
 * ⚠️ Call cleanup() in afterEach() to remove the temp directory.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface FakeNodeBinary {
  /** Absolute path of the executable script */
  path: string;
  cleanup: () => void;
}

/**
 * Write an executable `/bin/sh` script with the given body.
 *
 * @example
 * ```typescript
 * const bin = writeFakeNodeBinary('echo "loading $1" >&2\nexec sleep 30');
 * const child = await launchNode('/etc/node.conf', { binary: bin.path });
 * ```
 */
export function writeFakeNodeBinary(body: string): FakeNodeBinary {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relayctl-bin-'));
  const file = path.join(dir, 'fake-node');
  fs.writeFileSync(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return {
    path: file,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
