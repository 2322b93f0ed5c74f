import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, SilentLogger } from './logger.js';

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

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('entry format', () => {
    it('writes one JSON line with timestamp, level, component and event', () => {
      const logger = new Logger({ component: 'NotificationSynchronizer' });

      logger.info('remote_create_succeeded', { remoteId: 31 });

      expect(capturedOutput).toHaveLength(1);
      expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
      const parsed = parseOutput(0);
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('NotificationSynchronizer');
      expect(parsed.event).toBe('remote_create_succeeded');
      expect(parsed.data).toEqual({ remoteId: 31 });
    });

    it('omits data when none is given', () => {
      const logger = new Logger({ component: 'Workflow' });

      logger.warn('token_expired');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('logs each level with its own name', () => {
      const logger = new Logger({ component: 'HttpTransport', debugMode: true });

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(capturedOutput.map((_, i) => parseOutput(i).level)).toEqual([
        'debug',
        'info',
        'warn',
        'error',
      ]);
    });

    it('drops debug entries unless debug mode is on', () => {
      const logger = new Logger({ component: 'HttpTransport' });

      logger.debug('request_sent', { svc: 'core/logout' });

      expect(capturedOutput).toHaveLength(0);
    });

    it('creates children that keep the debug mode', () => {
      const parent = new Logger({ component: 'Root', debugMode: true });

      parent.child('Workflow').debug('step_entered');

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('Workflow');
      expect(parsed.level).toBe('debug');
    });
  });

  describe('unserializable data', () => {
    it('replaces circular data with a serialization error', () => {
      const logger = new Logger({ component: 'Repository' });
      const circular: Record<string, unknown> = { name: 'loop' };
      circular.self = circular;

      expect(() => {
        logger.error('save_failed', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('save_failed');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed).not.toHaveProperty('data');
    });

    it('replaces BigInt data with a serialization error', () => {
      const logger = new Logger({ component: 'Repository' });

      logger.info('bigint', { value: BigInt(12) });

      expect(parseOutput(0).originalData).toBe('[unserializable]');
    });

    it('always writes a parseable line (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (data) => {
          capturedOutput = [];
          logger.info('fuzz', data);
          expect(capturedOutput).toHaveLength(1);
          expect(parseOutput(0).event).toBe('fuzz');
        })
      );
    });
  });

  describe('SilentLogger', () => {
    it('writes nothing at any level', () => {
      const logger = new SilentLogger();

      logger.debug();
      logger.info();
      logger.warn();
      logger.error();

      expect(capturedOutput).toHaveLength(0);
    });

    it('creates silent children', () => {
      const child = new SilentLogger().child('Workflow');

      child.error('commit_failed', { customerId: 7 });

      expect(child).toBeInstanceOf(SilentLogger);
      expect(capturedOutput).toHaveLength(0);
    });
  });
});
