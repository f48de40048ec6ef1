/**
 * Shared test fixtures: temp folders, in-memory logger, fake collaborators
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Converter, Logger, MetadataReader } from '../../src/types/index.js';

export async function makeTempDir(prefix = 'photo-vault-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a file and set its modification time
 */
export async function writeFileAt(filePath: string, content: string, mtime?: Date): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  if (mtime) {
    await fs.utimes(filePath, mtime, mtime);
  }
}

export interface MemoryLogger extends Logger {
  lines: string[];
}

export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO:${message}`),
    warn: (message) => lines.push(`WARNING:${message}`),
    error: (message) => lines.push(`ERROR:${message}`),
    exception: (error, context) =>
      lines.push(`ERROR:${context ?? ''}${error instanceof Error ? ` ${error.message}` : ''}`),
  };
}

/**
 * Metadata reader answering from a name → tags table
 */
export class FakeMetadataReader implements MetadataReader {
  calls: string[] = [];

  constructor(private readonly tagsByName: Record<string, Record<string, unknown>> = {}) {}

  async readTags(filePath: string): Promise<Record<string, unknown>> {
    this.calls.push(filePath);
    return this.tagsByName[path.basename(filePath)] ?? {};
  }
}

/**
 * Converter that writes a marker instead of running an external tool
 */
export class FakeConverter implements Converter {
  calls: Array<{ source: string; destination: string }> = [];
  failFor = new Set<string>();

  async convert(sourcePath: string, destinationPath: string): Promise<void> {
    this.calls.push({ source: sourcePath, destination: destinationPath });
    if (this.failFor.has(path.basename(sourcePath))) {
      throw new Error(`Command failed with exit code 1: magick ${sourcePath} ${destinationPath}`);
    }
    await fs.writeFile(destinationPath, `converted:${path.basename(sourcePath)}`);
  }
}
