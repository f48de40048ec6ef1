/**
 * Path helpers with ~ expansion.
 */

import os from 'os';
import path from 'path';

export function expandHome(input: string): string {
  const homeDir = os.homedir();

  if (input === '~') {
    return homeDir;
  }
  if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, input.slice(2));
  }

  return input;
}

/**
 * Resolve a configured path: expand ~, then make it absolute
 */
export function resolveUserPath(configured: string): string {
  return path.resolve(expandHome(configured));
}
