import { realpathSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

function realPath(filePath: string): string {
  try {
    return realpathSync(filePath);
  } catch {
    return path.resolve(filePath);
  }
}

/**
 * True when the module at `moduleUrl` is the script node was started with,
 * including through an npm bin symlink.
 */
export function isDirectInvocation(moduleUrl: string): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  return realPath(fileURLToPath(moduleUrl)) === realPath(invoked);
}
