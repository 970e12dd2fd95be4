/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
  const originalLevel = chalk.level;

  beforeEach(() => {
    vi.clearAllMocks();
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = originalLevel;
    logger.setLevel('info');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] test message');
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should send warnings to console.warn', () => {
      const log = new Logger();

      log.warn('careful');

      expect(consoleSpy.warn).toHaveBeenCalledWith('[WARN] careful');
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('bad');
      log.success('good');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('output', () => {
    it('should print data after the message', () => {
      const log = new Logger();

      log.info('loaded', { count: 2 });

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '[INFO] loaded');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, JSON.stringify({ count: 2 }, null, 2));
    });

    it('should mark success lines without the prefix', () => {
      const log = new Logger().child('cli');

      log.success('done');

      expect(consoleSpy.log).toHaveBeenCalledWith('✓ done');
    });

    it('should send errors and their data to console.error', () => {
      const log = new Logger();

      log.error('failed', { id: 3 });

      expect(consoleSpy.error).toHaveBeenNthCalledWith(1, '[ERROR] failed');
      expect(consoleSpy.error).toHaveBeenNthCalledWith(2, JSON.stringify({ id: 3 }, null, 2));
    });
  });

  describe('child', () => {
    it('should prefix messages', () => {
      const log = new Logger().child('tree');

      log.info('built');

      expect(consoleSpy.log).toHaveBeenCalledWith('[INFO] [tree] built');
    });

    it('should nest prefixes', () => {
      const log = new Logger().child('kb').child('store');

      log.info('opened');

      expect(consoleSpy.log).toHaveBeenCalledWith('[INFO] [kb:store] opened');
    });

    it('should share the level with its parent', () => {
      const parent = new Logger();
      const child = parent.child('sync');

      parent.setLevel('debug');
      child.debug('visible');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] [sync] visible');
    });

    it('should change the parent level when the child sets it', () => {
      const parent = new Logger();
      parent.child('kb').setLevel('warn');

      parent.info('hidden');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });
});
