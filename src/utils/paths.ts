import os from 'os';
import path from 'path';

/**
 * Expand a leading `~` to the user's home directory and resolve to an
 * absolute path
 */
export function expandDirectory(directory: string): string {
  if (directory === '~') {
    return os.homedir();
  }
  if (directory.startsWith('~/') || directory.startsWith(`~${path.sep}`)) {
    return path.resolve(os.homedir(), directory.slice(2));
  }
  return path.resolve(directory);
}
