/**
 * Tests for Logger class
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
} from '../../lib/src/logging/logger.js';
import { LogLevel, LogFormat, type LoggerConfigInput } from '../../lib/src/logging/types.js';

function capture(config: LoggerConfigInput = {}): { logger: Logger; lines: string[]; levels: LogLevel[] } {
  const lines: string[] = [];
  const levels: LogLevel[] = [];
  const logger = new Logger({
    timestamps: false,
    format: LogFormat.TEXT,
    ...config,
    output: (line, level) => {
      lines.push(line);
      levels.push(level);
    },
  });
  return { logger, lines, levels };
}

describe('Logger', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    resetGlobalLogger();
  });

  describe('text format', () => {
    it('writes level, source, message and context', () => {
      const { logger, lines } = capture({ source: 'InteractionStore' });

      logger.info('Saved interaction', { userId: 'user-1' });

      expect(lines).toEqual(['INFO  [InteractionStore] Saved interaction {"userId":"user-1"}']);
    });

    it('omits an empty context', () => {
      const { logger, lines } = capture();

      logger.warn('No passages', {});

      expect(lines).toEqual(['WARN  No passages']);
    });

    it('appends the error name, code and message', () => {
      const { logger, lines, levels } = capture();
      const error = Object.assign(new Error('connection refused'), { code: 'ECONNREFUSED' });
      error.stack = '';

      logger.error('Insert failed', error);

      expect(lines).toEqual(['ERROR Insert failed \n  Error: Error (ECONNREFUSED): connection refused']);
      expect(levels).toEqual([LogLevel.ERROR]);
    });

    it('accepts a context without an error', () => {
      const { logger, lines } = capture();

      logger.error('Stage failed', { stage: 'generation' });

      expect(lines).toEqual(['ERROR Stage failed {"stage":"generation"}']);
    });
  });

  describe('json format', () => {
    it('writes one object per line with context fields inlined', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:20:30.000Z'));
      const { logger, lines } = capture({ format: LogFormat.JSON, source: 'api:chat' });

      logger.info('Chat turn finished', { requestId: 'chat-1', totalMs: 42 });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '')).toEqual({
        timestamp: '2026-01-15T10:20:30.000Z',
        level: 'INFO',
        source: 'api:chat',
        message: 'Chat turn finished',
        requestId: 'chat-1',
        totalMs: 42,
      });
    });
  });

  describe('compact format', () => {
    it('writes time, level initial and message', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:20:30.000Z'));
      const { logger, lines } = capture({ format: LogFormat.COMPACT });

      logger.debug('ignored at info level');
      logger.warn('Persistence degraded', { reason: 'timeout' });

      expect(lines).toEqual(['10:20:30 W Persistence degraded']);
    });
  });

  describe('levels', () => {
    it('drops entries below the minimum level', () => {
      const { logger, lines } = capture({ level: LogLevel.WARN });

      logger.info('hidden');
      logger.debug('hidden');
      logger.warn('shown');
      logger.error('shown too');

      expect(lines).toEqual(['WARN  shown', 'ERROR shown too']);
    });

    it('changes level at run time', () => {
      const { logger, lines } = capture();

      logger.setLevel(LogLevel.TRACE);
      logger.trace('step');

      expect(logger.getLevel()).toBe(LogLevel.TRACE);
      expect(lines).toEqual(['TRACE step']);
    });
  });

  describe('child', () => {
    it('nests the source under the parent', () => {
      const { logger, lines } = capture({ source: 'ServiceContainer' });

      logger.child('GenerationClient').info('ready');

      expect(lines).toEqual(['INFO  [ServiceContainer:GenerationClient] ready']);
    });

    it('inherits the current level', () => {
      const { logger, lines } = capture();
      logger.setLevel(LogLevel.ERROR);

      const child = logger.child('Child');
      child.warn('hidden');

      expect(child.getLevel()).toBe(LogLevel.ERROR);
      expect(lines).toEqual([]);
    });
  });

  describe('console output', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('routes errors, warnings and the rest to their console methods', () => {
      const logger = new Logger({ timestamps: false, format: LogFormat.TEXT });

      logger.error('e');
      logger.warn('w');
      logger.info('i');

      expect(console.error).toHaveBeenCalledWith('ERROR e');
      expect(console.warn).toHaveBeenCalledWith('WARN  w');
      expect(console.log).toHaveBeenCalledWith('INFO  i');
    });

    it('stays silent when console output is disabled', () => {
      const logger = new Logger({ console: false });

      logger.error('e');

      expect(console.error).not.toHaveBeenCalled();
    });
  });

  describe('global logger', () => {
    it('returns the same instance until reset', () => {
      const first = getGlobalLogger();

      expect(getGlobalLogger()).toBe(first);

      resetGlobalLogger();
      expect(getGlobalLogger()).not.toBe(first);
    });

    it('can be replaced', () => {
      const custom = createLogger('Custom', { console: false });

      setGlobalLogger(custom);

      expect(getGlobalLogger()).toBe(custom);
      expect(custom.getConfig().source).toBe('Custom');
    });
  });
});
