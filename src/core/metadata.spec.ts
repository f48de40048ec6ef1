/**
 * Tests for capture date metadata
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as exifr from 'exifr';
import path from 'path';
import { ExifMetadataReader, dateFromMtime, parseExifDate } from './metadata.js';
import { PlacementPolicy } from './placement.js';
import { SourceFile } from './fingerprint.js';
import {
  FakeConverter,
  createMemoryLogger,
  makeTempDir,
  removeDir,
  writeFileAt,
} from '../../tests/helpers/fixtures.js';

vi.mock('exifr', () => ({
  parse: vi.fn(),
}));

describe('parseExifDate', () => {
  it('should read year and month from an EXIF date string', () => {
    expect(parseExifDate('2022:03:15 10:20:30')).toEqual({ year: 2022, month: 3 });
  });

  it('should accept surrounding whitespace', () => {
    expect(parseExifDate(' 2019:12:31 23:59:59 ')).toEqual({ year: 2019, month: 12 });
  });

  it('should accept a Date value', () => {
    expect(parseExifDate(new Date(2020, 4, 17, 8))).toEqual({ year: 2020, month: 5 });
  });

  it.each([
    ['0000:00:00 00:00:00'],
    ['2022-03-15 10:20:30'],
    ['2022:13:01 00:00:00'],
    [''],
  ])('should reject %j', (value) => {
    expect(() => parseExifDate(value)).toThrow('Invalid capture date');
  });

  it('should reject non-string values', () => {
    expect(() => parseExifDate(20220315)).toThrow('expected a string, got number');
  });

  it('should reject an invalid Date', () => {
    expect(() => parseExifDate(new Date('not a date'))).toThrow('Invalid capture date');
  });
});

describe('dateFromMtime', () => {
  it('should use local time', () => {
    const mtime = new Date(2021, 6, 1, 0, 30).getTime() / 1000;

    expect(dateFromMtime(mtime)).toEqual({ year: 2021, month: 7 });
  });
});

describe('ExifMetadataReader', () => {
  beforeEach(() => {
    vi.mocked(exifr.parse).mockReset();
  });

  it('should ask exifr for the capture date tag without reviving values', async () => {
    vi.mocked(exifr.parse).mockResolvedValue({ DateTimeOriginal: '2022:03:15 10:20:30' });

    const tags = await new ExifMetadataReader().readTags('/cloud/IMG_0001.heic');

    expect(tags).toEqual({ DateTimeOriginal: '2022:03:15 10:20:30' });
    expect(exifr.parse).toHaveBeenCalledWith('/cloud/IMG_0001.heic', {
      pick: ['DateTimeOriginal'],
      reviveValues: false,
    });
  });

  it('should return no tags when the file has no EXIF block', async () => {
    vi.mocked(exifr.parse).mockResolvedValue(undefined);

    expect(await new ExifMetadataReader().readTags('/cloud/IMG_0002.png')).toEqual({});
  });

  it('should return no tags for a format exifr does not parse', async () => {
    vi.mocked(exifr.parse).mockRejectedValue(new Error('Unknown file format'));

    expect(await new ExifMetadataReader().readTags('/cloud/VID_0001.mp4')).toEqual({});
  });

  it('should let other reader errors through', async () => {
    vi.mocked(exifr.parse).mockRejectedValue(new Error('Segment unreachable'));

    await expect(new ExifMetadataReader().readTags('/cloud/IMG_0003.jpg')).rejects.toThrow(
      'Segment unreachable'
    );
  });

  it('should let a video fall back to its modification time with an INFO line', async () => {
    vi.mocked(exifr.parse).mockRejectedValue(new Error('Unknown file format'));
    const dir = await makeTempDir();
    try {
      const filePath = path.join(dir, 'VID_0001.mp4');
      await writeFileAt(filePath, 'ftypmp42', new Date(2021, 6, 1, 12));
      const logger = createMemoryLogger();
      const policy = new PlacementPolicy({
        targetDir: dir,
        metadataReader: new ExifMetadataReader(),
        converter: new FakeConverter(),
        logger,
      });

      const date = await policy.resolveCaptureDate(new SourceFile(filePath));

      expect(date).toEqual({ year: 2021, month: 7, source: 'mtime' });
      expect(logger.lines).toEqual([
        `INFO:Unable to find DateTimeOriginal in SourceFile(path=${filePath}, mtime=?, md5=?)`,
      ]);
    } finally {
      await removeDir(dir);
    }
  });
});
