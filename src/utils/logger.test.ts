import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    return JSON.parse(getOutput(index).trim()) as Record<string, unknown>;
  }

  describe('unserializable data', () => {
    it('falls back to an entry without data for circular references', () => {
      const logger = new Logger({ component: 'ConfigParser' });

      const circular: Record<string, unknown> = { path: 'app.toml' };
      circular.self = circular;

      expect(() => {
        logger.info('config_loaded', circular);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('ConfigParser');
      expect(parsed.event).toBe('config_loaded');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('falls back for BigInt values', () => {
      const logger = new Logger({ component: 'ConfigParser' });

      logger.warn('odd_value', { value: BigInt(42) });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('writes exactly one JSON line per entry', () => {
      const logger = new Logger({ component: 'ConfigParser' });

      const circular: Record<string, unknown> = {};
      circular.ref = circular;
      logger.error('broken', circular);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
    });

    it('never throws for arbitrary data (property-based)', () => {
      const logger = new Logger({ component: 'Fuzz' });

      fc.assert(
        fc.property(fc.anything({ withBigInt: true }), (value) => {
          capturedOutput = [];

          logger.info('fuzz', { value });

          expect(capturedOutput.length).toBe(1);
          const parsed = parseOutput(0);
          expect(parsed.event).toBe('fuzz');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });

  describe('levels', () => {
    it('writes info entries with their data', () => {
      const logger = new Logger({ component: 'generateConfig' });

      logger.info('config_generated', { path: '/tmp/app.toml', records: 2 });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('generateConfig');
      expect(parsed.event).toBe('config_generated');
      expect(parsed.data).toEqual({ path: '/tmp/app.toml', records: 2 });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('omits the data key when no data is given', () => {
      const logger = new Logger({ component: 'ConfigParser' });

      logger.info('config_loaded');

      expect(Object.keys(parseOutput(0))).toEqual(['timestamp', 'level', 'component', 'event']);
    });

    it('drops debug entries unless debug mode is on', () => {
      const quiet = new Logger({ component: 'ConfigParser' });
      const verbose = new Logger({ component: 'ConfigParser', debugMode: true });

      quiet.debug('record_resolved');
      expect(capturedOutput.length).toBe(0);

      verbose.debug('record_resolved', { type: 'DatabaseConfig' });
      expect(capturedOutput.length).toBe(1);
      expect(parseOutput(0).level).toBe('debug');
    });

    it('drops entries below the minimum level', () => {
      const logger = new Logger({ component: 'ConfigParser', debugMode: true, minLevel: 'warn' });

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(capturedOutput.map((line) => JSON.parse(line) as Record<string, unknown>).map((e) => e.event)).toEqual([
        'c',
        'd',
      ]);
    });

    it('reports which levels are enabled', () => {
      const logger = new Logger({ component: 'ConfigParser', minLevel: 'info' });

      expect(logger.isEnabled('debug')).toBe(false);
      expect(logger.isEnabled('info')).toBe(true);
      expect(logger.isEnabled('error')).toBe(true);

      const debugLogger = new Logger({ component: 'ConfigParser', debugMode: true });
      expect(debugLogger.isEnabled('debug')).toBe(true);
    });
  });
});
