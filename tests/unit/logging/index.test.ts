/**
 * Tests for the structured logging API.
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import {
  createLogger,
  getLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  resetLogger,
} from '../../../src/logging/index.js';

describe('Logging API', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('root logger', () => {
    test('uses the configured level', () => {
      expect(getLogger().level).toBe('silent');
    });

    test('is created once', () => {
      expect(getLogger()).toBe(getLogger());
    });

    test('resetLogger creates a new root logger', () => {
      const first = getLogger();
      resetLogger();
      expect(getLogger()).not.toBe(first);
    });
  });

  describe('level functions', () => {
    test('should accept message only', () => {
      expect(() => logError('Test error')).not.toThrow();
      expect(() => logWarn('Test warning')).not.toThrow();
      expect(() => logInfo('Test info')).not.toThrow();
      expect(() => logDebug('Test debug')).not.toThrow();
      expect(() => logTrace('Test trace')).not.toThrow();
    });

    test('passes defined fields as the merge object', () => {
      const spy = vi.spyOn(getLogger(), 'warn');
      const fields: LogFields = { component: 'test', retry_count: 3, skipped: undefined };

      logWarn('Retrying', fields);

      expect(spy).toHaveBeenCalledWith({ component: 'test', retry_count: 3 }, 'Retrying');
    });
  });

  describe('createLogger', () => {
    test('merges default fields with call fields', () => {
      const spy = vi.spyOn(getLogger(), 'info');
      const log = createLogger({ component: 'tree-resolver', hierarchy: 'devices' });

      log.info('Model resolved', { tag: 'Pixel', hierarchy: 'phones' });

      expect(spy).toHaveBeenCalledWith(
        { component: 'tree-resolver', hierarchy: 'phones', tag: 'Pixel' },
        'Model resolved'
      );
    });

    test('logs default fields alone', () => {
      const spy = vi.spyOn(getLogger(), 'error');
      const log = createLogger({ component: 'node-registry' });

      log.error('Failed');

      expect(spy).toHaveBeenCalledWith({ component: 'node-registry' }, 'Failed');
    });
  });
});
