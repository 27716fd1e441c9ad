import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { closeSync, mkdtempSync, readFileSync, rmSync, writeFileSync, writeSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  safeExistsSync,
  safeIsDirectorySync,
  safeMkdirpSync,
  safeOpenForWriteSync,
  safeReadTextSync,
  safeReaddirSync,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'safe-fs-test-'));
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve and validate absolute paths', () => {
      expect(validatePath('/tmp/test.txt')).toBe('/tmp/test.txt');
    });

    it('should resolve relative paths to absolute', () => {
      expect(path.isAbsolute(validatePath('./test.txt'))).toBe(true);
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/test\0file.txt')).toThrow('null bytes');
    });

    it('should always return absolute paths for non-empty input', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => {
            expect(path.isAbsolute(validatePath(input))).toBe(true);
          }
        )
      );
    });
  });

  describe('sync helpers', () => {
    it('should create nested directories and report them', () => {
      const nested = join(tempDir, 'a', 'b', 'c');
      safeMkdirpSync(nested);

      expect(safeExistsSync(nested)).toBe(true);
      expect(safeIsDirectorySync(nested)).toBe(true);
      expect(safeIsDirectorySync(join(tempDir, 'missing'))).toBe(false);
    });

    it('should open files for writing with missing parents and truncate them', () => {
      const file = join(tempDir, 'out', 'deep', 'file.txt');
      writeFileSync(join(tempDir, 'seed.txt'), 'seed');

      let fd = safeOpenForWriteSync(file);
      writeSync(fd, 'first contents');
      closeSync(fd);
      fd = safeOpenForWriteSync(file);
      writeSync(fd, 'new');
      closeSync(fd);

      expect(readFileSync(file, 'utf-8')).toBe('new');
      expect(safeReadTextSync(join(tempDir, 'seed.txt'))).toBe('seed');
    });

    it('should list directory entries', () => {
      const dir = join(tempDir, 'listing');
      safeMkdirpSync(dir);
      writeFileSync(join(dir, 'one.idl'), '');
      writeFileSync(join(dir, 'two.idl'), '');

      expect(safeReaddirSync(dir).sort()).toEqual(['one.idl', 'two.idl']);
    });
  });
});
