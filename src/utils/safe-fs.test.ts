import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  atomicWriteFileSync,
  isNotFoundError,
  pathExists,
  PathValidationError,
  readTextFileIfExists,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'safe-fs-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('returns absolute paths unchanged', () => {
      expect(validatePath('/tmp/app.toml')).toBe('/tmp/app.toml');
    });

    it('resolves relative paths against the working directory', () => {
      expect(validatePath('app.toml')).toBe(path.resolve('app.toml'));
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects paths with null bytes', () => {
      expect(() => validatePath('/tmp/app\0.toml')).toThrow('Path cannot contain null bytes');
    });

    it('accepts any non-empty string without null bytes (property-based)', () => {
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

  describe('isNotFoundError', () => {
    it('recognizes ENOENT errors only', () => {
      const notFound = Object.assign(new Error('gone'), { code: 'ENOENT' });
      const denied = Object.assign(new Error('denied'), { code: 'EACCES' });

      expect(isNotFoundError(notFound)).toBe(true);
      expect(isNotFoundError(denied)).toBe(false);
      expect(isNotFoundError('ENOENT')).toBe(false);
    });
  });

  describe('readTextFileIfExists', () => {
    it('returns the file contents', async () => {
      const file = path.join(tempDir, 'read.txt');
      await writeFile(file, 'port = 5432\n', 'utf-8');

      expect(readTextFileIfExists(file)).toBe('port = 5432\n');
    });

    it('returns undefined for a missing file', () => {
      expect(readTextFileIfExists(path.join(tempDir, 'missing.txt'))).toBeUndefined();
    });

    it('rethrows errors other than a missing file', () => {
      const dir = path.join(tempDir, 'a-directory');
      mkdirSync(dir);

      expect(() => readTextFileIfExists(dir)).toThrow();
    });
  });

  describe('pathExists', () => {
    it('reports whether a path exists', async () => {
      const file = path.join(tempDir, 'exists.txt');
      expect(pathExists(file)).toBe(false);

      await writeFile(file, 'x', 'utf-8');
      expect(pathExists(file)).toBe(true);
    });
  });

  describe('atomicWriteFileSync', () => {
    it('creates parent directories and writes the content', async () => {
      const file = path.join(tempDir, 'nested', 'deeper', 'app.json');

      atomicWriteFileSync(file, '{}\n');

      expect(await readFile(file, 'utf-8')).toBe('{}\n');
    });

    it('replaces existing content and leaves no temporary files', async () => {
      const dir = path.join(tempDir, 'replace');
      const file = path.join(dir, 'app.toml');

      atomicWriteFileSync(file, 'a = 1\n');
      atomicWriteFileSync(file, 'a = 2\n');

      expect(await readFile(file, 'utf-8')).toBe('a = 2\n');
      expect(await readdir(dir)).toEqual(['app.toml']);
    });

    it('removes the temporary file when the rename fails', async () => {
      const dir = path.join(tempDir, 'rename-fails');
      const target = path.join(dir, 'occupied');
      mkdirSync(path.join(target, 'child'), { recursive: true });

      expect(() => atomicWriteFileSync(target, 'content')).toThrow();
      expect(await readdir(dir)).toEqual(['occupied']);
    });
  });
});
