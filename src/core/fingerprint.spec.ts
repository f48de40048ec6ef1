/**
 * Tests for SourceFile fingerprints
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { SourceFile } from './fingerprint.js';
import { md5File } from '../utils/hash.js';
import { createMemoryLogger, makeTempDir, removeDir, writeFileAt } from '../../tests/helpers/fixtures.js';

describe('SourceFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('name parts', () => {
    it('should split name, stem and extension', () => {
      const file = new SourceFile('/photos/IMG_0001.HEIC');

      expect(file.name).toBe('IMG_0001.HEIC');
      expect(file.stem).toBe('IMG_0001');
      expect(file.extension).toBe('.HEIC');
    });

    it('should treat a dotfile as having no extension', () => {
      const file = new SourceFile('/photos/.nomedia');

      expect(file.stem).toBe('.nomedia');
      expect(file.extension).toBe('');
    });
  });

  describe('contentDigest', () => {
    it('should return the hex MD5 of the file content', async () => {
      const filePath = path.join(dir, 'a.jpg');
      await writeFileAt(filePath, 'hello');

      const file = new SourceFile(filePath);

      expect(await file.contentDigest()).toBe('5d41402abc4b2a76b9719d911017c592');
    });

    it('should give identical content the same digest regardless of name and mtime', async () => {
      const first = path.join(dir, 'one', 'IMG_1.jpg');
      const second = path.join(dir, 'two', 'other-name.png');
      await writeFileAt(first, 'same bytes', new Date(2020, 0, 1));
      await writeFileAt(second, 'same bytes', new Date(2023, 5, 9));

      const a = await new SourceFile(first).contentDigest();
      const b = await new SourceFile(second).contentDigest();

      expect(a).toBe(b);
    });

    it('should compute the digest only once', async () => {
      const filePath = path.join(dir, 'a.jpg');
      await writeFileAt(filePath, 'hello');
      const digest = vi.fn(md5File);

      const file = new SourceFile(filePath, { digest });
      await file.contentDigest();
      await file.contentDigest();

      expect(digest).toHaveBeenCalledTimes(1);
    });

    it('should hash a temp copy when the file cannot be read directly', async () => {
      const filePath = path.join(dir, 'cloud.jpg');
      await writeFileAt(filePath, 'hello');
      const tempDir = path.join(dir, 'tmp');
      await fs.mkdir(tempDir);

      const digest = vi.fn(async (target: string) => {
        if (target === filePath) {
          throw new Error('EDEADLK: resource deadlock would occur');
        }
        return md5File(target);
      });

      const logger = createMemoryLogger();
      const file = new SourceFile(filePath, { digest, tempDir, logger });

      expect(await file.contentDigest()).toBe('5d41402abc4b2a76b9719d911017c592');
      expect(logger.lines).toEqual([
        `WARNING:Cannot read ${filePath} directly (EDEADLK: resource deadlock would occur), ` +
          'hashing a temporary copy',
      ]);
      expect(digest).toHaveBeenCalledTimes(2);
      expect(path.dirname(digest.mock.calls[1][0])).toBe(tempDir);
      expect(await fs.readdir(tempDir)).toEqual([]);
    });

    it('should remove the temp copy when hashing it fails too', async () => {
      const filePath = path.join(dir, 'cloud.jpg');
      await writeFileAt(filePath, 'hello');
      const tempDir = path.join(dir, 'tmp');
      await fs.mkdir(tempDir);

      const digest = vi.fn(async () => {
        throw new Error('read failed');
      });

      const file = new SourceFile(filePath, { digest, tempDir });

      await expect(file.contentDigest()).rejects.toThrow('read failed');
      expect(await fs.readdir(tempDir)).toEqual([]);
    });

    it('should fail when the file does not exist', async () => {
      const file = new SourceFile(path.join(dir, 'missing.jpg'), { tempDir: dir });

      await expect(file.contentDigest()).rejects.toThrow(/ENOENT/);
    });
  });

  describe('modificationTime', () => {
    it('should return the mtime in seconds', async () => {
      const filePath = path.join(dir, 'a.jpg');
      const mtime = new Date(2021, 6, 1, 12, 0, 0);
      await writeFileAt(filePath, 'x', mtime);

      const file = new SourceFile(filePath);

      expect(await file.modificationTime()).toBe(mtime.getTime() / 1000);
    });

    it('should keep the first value after the file changes', async () => {
      const filePath = path.join(dir, 'a.jpg');
      await writeFileAt(filePath, 'x', new Date(2021, 6, 1));
      const file = new SourceFile(filePath);

      const first = await file.modificationTime();
      await fs.utimes(filePath, new Date(2024, 0, 1), new Date(2024, 0, 1));

      expect(await file.modificationTime()).toBe(first);
    });
  });

  describe('toString', () => {
    it('should show only what has been computed', async () => {
      const filePath = path.join(dir, 'a.jpg');
      await writeFileAt(filePath, 'hello');
      const file = new SourceFile(filePath);

      expect(String(file)).toBe(`SourceFile(path=${filePath}, mtime=?, md5=?)`);

      await file.contentDigest();

      expect(String(file)).toBe(
        `SourceFile(path=${filePath}, mtime=?, md5=5d41402abc4b2a76b9719d911017c592)`
      );
    });
  });
});
