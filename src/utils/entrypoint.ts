import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * True when the module at `moduleUrl` is the script node was started with.
 * Bin links resolve to the same file.
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
