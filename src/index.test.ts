import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  VERSION,
  ClassconfError,
  ClassNotRegisteredError,
  ConfigParser,
  configclass,
  fromDocument,
  isConfigClass,
  Logger,
  toDocument,
} from './index.js';

class GreetingConfig {
  greeting = 'hello';
  repeat = 1;
}
configclass(GreetingConfig, { name: 'greeting' });

describe('classconf', () => {
  describe('VERSION', () => {
    it('should be defined and follow semver format', () => {
      expect(VERSION).toBeDefined();
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'classconf-index-test-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('exposes declaration, parsing and errors from one entry point', () => {
      expect(isConfigClass(GreetingConfig)).toBe(true);
      expect(new ClassNotRegisteredError('GreetingConfig')).toBeInstanceOf(ClassconfError);
    });

    it('creates and reads a config file end to end', () => {
      const file = join(tempDir, 'greeting.json');
      const logger = new Logger({ component: 'index-test', minLevel: 'error' });

      const parser = new ConfigParser(file, [GreetingConfig], { createNoexist: true, logger });

      expect(parser.get(GreetingConfig)).toEqual(new GreetingConfig());
      expect(parser.isLoaded).toBe(true);
    });
  });

  describe('property-based tests', () => {
    it('toDocument and fromDocument agree for any field values', () => {
      fc.assert(
        fc.property(fc.string(), fc.integer(), (greeting, repeat) => {
          const original = Object.assign(new GreetingConfig(), { greeting, repeat });
          return fromDocument(toDocument(original), GreetingConfig).repeat === repeat;
        }),
        { numRuns: 100 }
      );
    });
  });
});
