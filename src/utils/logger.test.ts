/**
 * Tests for logger utility (src/utils/logger.ts)
 *
 * Tests the following functionality:
 * - Logger initialization and configuration
 * - Development vs production vs test environments
 * - Child logger creation with context
 * - Log level management
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import {
  initLogger,
  resetLogger,
  createLogger,
  getRootLogger,
  setLogLevel,
  isLevelEnabled,
  flushLogger,
  type LogLevel,
} from './logger.js';

// Mock fs module
vi.mock('fs', () => ({
  default: {
    existsSync: vi.fn(),
    mkdirSync: vi.fn(),
  },
}));

const mockedFs = vi.mocked(fs);

describe('Logger', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = process.env;
    process.env = { ...originalEnv };
    process.env.NODE_ENV = 'production';
    delete process.env.LOG_LEVEL;
    resetLogger();
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetLogger();
  });

  describe('initLogger', () => {
    it('should default to info in production', async () => {
      const logger = await initLogger({ fileLogging: false });

      expect(logger.level).toBe('info');
    });

    it('should default to debug in development', async () => {
      process.env.NODE_ENV = 'development';

      const logger = await initLogger({ prettyPrint: false });

      expect(logger.level).toBe('debug');
    });

    it('should be silent under test', async () => {
      process.env.NODE_ENV = 'test';

      const logger = await initLogger();

      expect(logger.level).toBe('silent');
    });

    it('should respect custom log level from config', async () => {
      const logger = await initLogger({ level: 'warn', fileLogging: false });

      expect(logger.level).toBe('warn');
    });

    it('should respect LOG_LEVEL environment variable', async () => {
      process.env.LOG_LEVEL = 'ERROR';

      const logger = await initLogger({ fileLogging: false });

      expect(logger.level).toBe('error');
    });

    it('should ignore an unknown LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'verbose';

      const logger = await initLogger({ fileLogging: false });

      expect(logger.level).toBe('info');
    });

    it('should replace the root logger on subsequent calls', async () => {
      const logger1 = await initLogger({ fileLogging: false });
      const logger2 = await initLogger({ level: 'error', fileLogging: false });

      expect(logger2).not.toBe(logger1);
      expect(getRootLogger()).toBe(logger2);
      expect(logger2.level).toBe('error');
    });

    it('should apply config over a root created before initialization', async () => {
      process.env.NODE_ENV = 'test';
      createLogger('EarlyModule');

      await initLogger({ level: 'warn' });

      expect(getRootLogger().level).toBe('warn');
      expect(createLogger('LateModule').level).toBe('warn');
    });

    it('should add metadata to every entry', async () => {
      const logger = await initLogger({ fileLogging: false, metadata: { service: 'telemetry' } });

      expect(logger.bindings()).toMatchObject({ service: 'telemetry' });
    });

    it('should skip file logging in test environment', async () => {
      process.env.NODE_ENV = 'test';

      await initLogger({ fileLogging: true });

      expect(mockedFs.existsSync).not.toHaveBeenCalled();
      expect(mockedFs.mkdirSync).not.toHaveBeenCalled();
    });
  });

  describe('createLogger', () => {
    it('should bind context and metadata', async () => {
      await initLogger({ fileLogging: false });

      const logger = createLogger('BatchReporter', { reporter: 'influx_batch_reporter' });

      expect(logger.bindings()).toMatchObject({
        context: 'BatchReporter',
        reporter: 'influx_batch_reporter',
      });
    });

    it('should inherit the root level', async () => {
      await initLogger({ level: 'warn', fileLogging: false });

      const child = createLogger('ChildModule');

      expect(child.level).toBe('warn');
    });

    it('should initialize root logger if not exists', () => {
      const logger = createLogger('TestModule');

      expect(logger).toBeDefined();
      expect(getRootLogger().level).toBe('info');
    });

    it('should create separate child loggers', () => {
      expect(createLogger('Module1')).not.toBe(createLogger('Module2'));
    });
  });

  describe('getRootLogger', () => {
    it('should return the initialized logger', async () => {
      const logger = await initLogger({ fileLogging: false });

      expect(getRootLogger()).toBe(logger);
    });

    it('should return same instance on multiple calls', () => {
      expect(getRootLogger()).toBe(getRootLogger());
    });

    it('should build a fresh instance after reset', () => {
      const first = getRootLogger();
      resetLogger();

      expect(getRootLogger()).not.toBe(first);
    });
  });

  describe('setLogLevel', () => {
    it('should update log level of root logger', async () => {
      await initLogger({ level: 'info', fileLogging: false });

      setLogLevel('debug');

      expect(getRootLogger().level).toBe('debug');
    });

    it('should handle all valid log levels', async () => {
      const levels: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

      await initLogger({ fileLogging: false });

      for (const level of levels) {
        setLogLevel(level);
        expect(getRootLogger().level).toBe(level);
      }
    });

    it('should not throw if root logger not initialized', () => {
      expect(() => setLogLevel('debug')).not.toThrow();
    });
  });

  describe('isLevelEnabled', () => {
    it('should compare against the root level', async () => {
      await initLogger({ level: 'warn', fileLogging: false });

      expect(isLevelEnabled('error')).toBe(true);
      expect(isLevelEnabled('warn')).toBe(true);
      expect(isLevelEnabled('info')).toBe(false);
    });
  });

  describe('flushLogger', () => {
    it('should resolve once the root logger has flushed', async () => {
      const logger = await initLogger({ fileLogging: false });
      const flushSpy = vi.spyOn(logger, 'flush');

      await expect(flushLogger()).resolves.toBeUndefined();
      expect(flushSpy).toHaveBeenCalledTimes(1);
    });

    it('should resolve when root logger does not exist', async () => {
      await expect(flushLogger()).resolves.toBeUndefined();
    });
  });
});
