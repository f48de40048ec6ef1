/**
 * Candidate discovery in the source directory
 */

import fs from 'fs/promises';
import path from 'path';
import { SourceFile, type SourceFileOptions } from '../core/fingerprint.js';
import { getErrorMessage } from './errors.js';

/**
 * List the regular files directly inside a directory, in enumeration order.
 * Symlinks count when they point at a regular file. Subdirectories are not entered.
 */
export async function listSourceFiles(
  dir: string,
  options: SourceFileOptions = {}
): Promise<SourceFile[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: SourceFile[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isFile()) {
      files.push(new SourceFile(fullPath, options));
      continue;
    }

    if (entry.isSymbolicLink()) {
      try {
        const target = await fs.stat(fullPath);
        if (target.isFile()) {
          files.push(new SourceFile(fullPath, options));
        }
      } catch (error) {
        options.logger?.info(`Skipping ${fullPath}: cannot follow link (${getErrorMessage(error)})`);
      }
    }
  }

  return files;
}

/**
 * Check that a path exists and is a directory
 */
export async function isDirectory(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
