/**
 * Placement Policy
 *
 * Maps a source file to its place in the archive:
 *
 *   <target>/<year><suffix>/<year>-<MM><suffix>/<stem><extension>
 *
 * and puts it there, converting formats listed in CONVERTED_EXTENSIONS.
 */

import fs from 'fs/promises';
import path from 'path';
import { CAPTURE_DATE_TAG, CONVERTED_EXTENSIONS } from '../config/constants.js';
import type {
  CaptureDate,
  Converter,
  Logger,
  MetadataReader,
  ResolvedCaptureDate,
} from '../types/index.js';
import type { SourceFile } from './fingerprint.js';
import { dateFromMtime, parseExifDate } from './metadata.js';

export interface PlacementPolicyOptions {
  targetDir: string;

  /** Appended verbatim to the year and year-month directory names */
  dirSuffix?: string;

  metadataReader: MetadataReader;
  converter: Converter;
  logger: Logger;
}

export class PlacementPolicy {
  readonly targetDir: string;
  readonly dirSuffix: string;
  private metadataReader: MetadataReader;
  private converter: Converter;
  private logger: Logger;

  constructor(options: PlacementPolicyOptions) {
    this.targetDir = options.targetDir;
    this.dirSuffix = options.dirSuffix ?? '';
    this.metadataReader = options.metadataReader;
    this.converter = options.converter;
    this.logger = options.logger;
  }

  needsConversion(file: SourceFile): boolean {
    return file.extension.toLowerCase() in CONVERTED_EXTENSIONS;
  }

  /**
   * Extension the archived copy gets
   */
  targetExtension(file: SourceFile): string {
    return CONVERTED_EXTENSIONS[file.extension.toLowerCase()] ?? file.extension;
  }

  destinationFor(file: SourceFile, date: CaptureDate): string {
    const year = String(date.year);
    const month = String(date.month).padStart(2, '0');

    return path.join(
      this.targetDir,
      `${year}${this.dirSuffix}`,
      `${year}-${month}${this.dirSuffix}`,
      `${file.stem}${this.targetExtension(file)}`
    );
  }

  /**
   * Capture date from embedded metadata, else from the file's modification time.
   * Metadata problems are logged and never fail the file.
   */
  async resolveCaptureDate(file: SourceFile): Promise<ResolvedCaptureDate> {
    try {
      const tags = await this.metadataReader.readTags(file.path);
      const value = tags[CAPTURE_DATE_TAG];
      if (value === undefined || value === null) {
        this.logger.info(`Unable to find ${CAPTURE_DATE_TAG} in ${file}`);
      } else {
        return { ...parseExifDate(value), source: 'metadata' };
      }
    } catch (error) {
      this.logger.exception(error, `Failed to read ${CAPTURE_DATE_TAG} from ${file}`);
    }

    return { ...dateFromMtime(await file.modificationTime()), source: 'mtime' };
  }

  /**
   * Destination path, without touching the archive
   */
  async plan(file: SourceFile): Promise<string> {
    const date = await this.resolveCaptureDate(file);
    return this.destinationFor(file, date);
  }

  /**
   * Copy (or convert) the file into the archive and return its destination
   */
  async place(file: SourceFile): Promise<string> {
    const destination = await this.plan(file);
    await fs.mkdir(path.dirname(destination), { recursive: true });

    if (this.needsConversion(file)) {
      await this.converter.convert(file.path, destination);
    } else {
      await copyPreservingTimes(file.path, destination);
    }

    return destination;
  }
}

/**
 * Copy a file and carry over its access and modification times
 */
export async function copyPreservingTimes(source: string, destination: string): Promise<void> {
  await fs.copyFile(source, destination);
  const stats = await fs.stat(source);
  await fs.utimes(destination, stats.atime, stats.mtime);
}
