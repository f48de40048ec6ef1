/**
 * Capture date metadata
 */

import * as exifr from 'exifr';
import { CAPTURE_DATE_TAG } from '../config/constants.js';
import type { CaptureDate, MetadataReader } from '../types/index.js';

/**
 * Reads EXIF tags with exifr. Values are returned raw (no Date revival),
 * so DateTimeOriginal comes back as "YYYY:MM:DD HH:MM:SS".
 */
export class ExifMetadataReader implements MetadataReader {
  private readonly tags: string[];

  constructor(tags: string[] = [CAPTURE_DATE_TAG]) {
    this.tags = tags;
  }

  async readTags(filePath: string): Promise<Record<string, unknown>> {
    let output: unknown;
    try {
      output = await exifr.parse(filePath, {
        pick: this.tags,
        reviveValues: false,
      });
    } catch (error) {
      // Videos and other formats exifr does not parse carry no tags
      if (isUnknownFormatError(error)) {
        return {};
      }
      throw error;
    }

    if (typeof output !== 'object' || output === null) {
      return {};
    }
    return Object.fromEntries(Object.entries(output));
  }
}

function isUnknownFormatError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith('Unknown file format');
}

const EXIF_DATE_PATTERN = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse an EXIF date value into year and month.
 * Throws on anything that is not a well-formed EXIF date string or a valid Date.
 */
export function parseExifDate(value: unknown): CaptureDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new Error('Invalid capture date: Invalid Date');
    }
    return { year: value.getFullYear(), month: value.getMonth() + 1 };
  }

  if (typeof value !== 'string') {
    throw new Error(`Invalid capture date: expected a string, got ${typeof value}`);
  }

  const match = EXIF_DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid capture date: "${value}"`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > 31) {
    throw new Error(`Invalid capture date: "${value}"`);
  }

  return { year, month };
}

/**
 * Year and month of a modification time (seconds since the epoch), in local time
 */
export function dateFromMtime(mtime: number): CaptureDate {
  const date = new Date(mtime * 1000);
  return { year: date.getFullYear(), month: date.getMonth() + 1 };
}
