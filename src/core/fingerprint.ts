/**
 * Source file fingerprint
 *
 * Identity of a candidate file: its name plus a digest of its content.
 * Modification time and digest are computed on first use and cached for
 * the lifetime of the SourceFile.
 */

import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { randomBytes } from 'crypto';
import type { Logger } from '../types/index.js';
import { getErrorMessage } from '../utils/errors.js';
import { md5File, type DigestFunction } from '../utils/hash.js';

export interface SourceFileOptions {
  /** Digest implementation (default: streaming MD5) */
  digest?: DigestFunction;

  /** Directory for the fallback copy (default: os.tmpdir()) */
  tempDir?: string;

  /** Receives a warning when the fallback copy is used */
  logger?: Logger;
}

export class SourceFile {
  readonly path: string;
  private readonly digest: DigestFunction;
  private readonly tempDir: string;
  private readonly logger?: Logger;
  private mtime?: number;
  private md5?: string;

  constructor(filePath: string, options: SourceFileOptions = {}) {
    this.path = filePath;
    this.digest = options.digest ?? md5File;
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.logger = options.logger;
  }

  get name(): string {
    return path.basename(this.path);
  }

  get extension(): string {
    return path.extname(this.path);
  }

  get stem(): string {
    return path.basename(this.path, this.extension);
  }

  /**
   * Modification time in seconds since the epoch
   */
  async modificationTime(): Promise<number> {
    if (this.mtime === undefined) {
      const stats = await fs.stat(this.path);
      this.mtime = stats.mtimeMs / 1000;
    }
    return this.mtime;
  }

  /**
   * Hex digest of the full file content.
   *
   * Cloud placeholders can fail a direct read until the provider materializes
   * them; in that case the file is copied to a temp file and hashed from there.
   */
  async contentDigest(): Promise<string> {
    if (this.md5 === undefined) {
      try {
        this.md5 = await this.digest(this.path);
      } catch (error) {
        this.logger?.warn(
          `Cannot read ${this.path} directly (${getErrorMessage(error)}), hashing a temporary copy`
        );
        this.md5 = await this.digestViaTempCopy();
      }
    }
    return this.md5;
  }

  private async digestViaTempCopy(): Promise<string> {
    const tempPath = path.join(
      this.tempDir,
      `photo-vault-${randomBytes(8).toString('hex')}${this.extension}`
    );

    try {
      await fs.copyFile(this.path, tempPath);
      return await this.digest(tempPath);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  toString(): string {
    const mtime = this.mtime ?? '?';
    const md5 = this.md5 ?? '?';
    return `SourceFile(path=${this.path}, mtime=${mtime}, md5=${md5})`;
  }
}
