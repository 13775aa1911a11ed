/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveLogLevel } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';
import { MemorySink } from '../sinks/memory.js';

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent by default when not initialized', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = getLogger('test');

    logger.info('test message');
    logger.error('error message');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('should log to sink when initialized', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('transport').info('socket ready');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.level).toBe('info');
    expect(sink.entries[0]?.category).toBe('transport');
    expect(sink.entries[0]?.msg).toBe('socket ready');
  });

  it('should pick up configuration changes on cached loggers', () => {
    const logger = getLogger('cached');
    const sink = new MemorySink();

    initLogger({ level: 'debug', sinks: [sink] });
    logger.debug('after init');

    expect(sink.entries.map((e) => e.msg)).toEqual(['after init']);
  });

  it('should respect log levels', () => {
    const sink = new MemorySink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink.entries.map((e) => e.level)).toEqual(['warn', 'error']);
    expect(sink.byLevel('error')).toHaveLength(1);
  });

  it('should attach serialized context', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').info({ host: 'http://unix', timeoutMs: 300000 }, 'client built');

    expect(sink.entries[0]?.msg).toBe('client built');
    expect(sink.entries[0]?.context).toEqual({ host: 'http://unix', timeoutMs: 300000 });
  });

  it('should flush every configured sink', () => {
    const flushed: string[] = [];
    const sinkNamed = (name: string): Sink => ({
      write: (_entry: LogEntry) => {},
      flush: () => flushed.push(name),
    });
    initLogger({ sinks: [sinkNamed('first'), sinkNamed('second')] });

    flushLoggers();

    expect(flushed).toEqual(['first', 'second']);
  });

  it('should serialize Error objects, bigints and circular references', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const obj: Record<string, unknown> = { name: 'loop' };
    obj['self'] = obj;
    getLogger('test').error({ error: new Error('boom'), size: BigInt(42), obj }, 'failed');

    const context = sink.entries[0]?.context;
    expect(context?.['error']).toMatchObject({ name: 'Error', message: 'boom' });
    expect(context?.['size']).toBe('42');
    expect(context?.['obj']).toEqual({ name: 'loop', self: '[Circular]' });
  });
});

describe('ConsoleSink', () => {
  it('should format log entries as time, level, category and message', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink({ color: false });
    const timestamp = new Date(2024, 0, 1, 9, 5, 7);

    sink.write({ level: 'info', category: 'http', timestamp, msg: 'ready' });

    expect(consoleSpy).toHaveBeenCalledWith('[09:05:07] INFO  [http] ready');
    consoleSpy.mockRestore();
  });

  it('should route error/warn to console.error/warn', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sink = new ConsoleSink();

    sink.write({ level: 'error', category: 'test', timestamp: new Date(), msg: 'error message' });
    sink.write({ level: 'warn', category: 'test', timestamp: new Date(), msg: 'warn message' });

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('error message'));
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('warn message'));
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should format context as key=value pairs', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink();

    sink.write({
      level: 'debug',
      category: 'test',
      timestamp: new Date(2024, 0, 1, 0, 0, 0),
      msg: 'built',
      context: { skipped: 2, scheme: 'https' },
    });

    expect(consoleSpy).toHaveBeenCalledWith('[00:00:00] DEBUG [test] built {skipped=2, scheme="https"}');
    consoleSpy.mockRestore();
  });
});

describe('resolveLogLevel', () => {
  it('should use LOG_LEVEL when set', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warn', NODE_ENV: 'production' })).toBe('warn');
  });

  it('should default by NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({ LOG_LEVEL: '', NODE_ENV: 'test' })).toBe('info');
  });

  it('should reject unknown levels', () => {
    expect(() => resolveLogLevel({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
