import { describe, it, expect, vi } from 'vitest';
import {
  Logger,
  createLogger,
  defaultLogger,
  silentLogger,
  parseLogLevel,
  LogLevel,
} from './logger';
import type { LogEntry, LogOutput } from './logger';

// ─── Helpers ────────────────────────────────────────────────────────────────────

function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe('LogLevel', () => {
  it('levels are ordered from least to most severe', () => {
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.WARN);
    expect(LogLevel.WARN).toBeLessThan(LogLevel.ERROR);
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.SILENT);
  });
});

describe('parseLogLevel', () => {
  it('parses every level name case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('INFO')).toBe(LogLevel.INFO);
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });
});

describe('Logger: default creation', () => {
  it('defaults to INFO level', () => {
    expect(new Logger().getLevel()).toBe(LogLevel.INFO);
  });

  it('defaults to JSON lines on stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger();
    logger.info('hello');
    expect(spy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(spy.mock.calls[0]?.[0] as string) as LogEntry;
    expect(parsed.message).toBe('hello');
    expect(parsed.level).toBe('INFO');
    spy.mockRestore();
  });
});

describe('Logger: level filtering', () => {
  it('suppresses DEBUG and INFO when level is WARN', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('no');
    logger.info('no');
    logger.warn('yes');
    logger.error('yes');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('SILENT suppresses all output', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.debug('no');
    logger.info('no');
    logger.warn('no');
    logger.error('no');
    expect(entries).toHaveLength(0);
  });

  it('isEnabled mirrors the filter', () => {
    const { logger } = captureLogger(LogLevel.WARN);
    expect(logger.isEnabled(LogLevel.INFO)).toBe(false);
    expect(logger.isEnabled(LogLevel.WARN)).toBe(true);
    expect(logger.isEnabled(LogLevel.SILENT)).toBe(false);
  });

  it('setLevel changes the threshold at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    logger.info('before');
    logger.setLevel(LogLevel.ERROR);
    logger.info('suppressed');
    logger.error('after');
    expect(entries.map((e) => e.message)).toEqual(['before', 'after']);
    expect(logger.getLevel()).toBe(LogLevel.ERROR);
  });
});

describe('Logger: child loggers', () => {
  it('prefixes the component with the parent component', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'simulation');
    logger.child('node.2').info('ready');
    expect(entries[0]?.component).toBe('simulation.node.2');
  });

  it('uses the bare component when the parent has none', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    logger.child('node.1').info('ready');
    expect(entries[0]?.component).toBe('node.1');
  });

  it('inherits the parent level', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    const child = logger.child('net');
    child.info('no');
    child.warn('yes');
    expect(entries).toHaveLength(1);
  });

  it('attaches bound fields to every entry', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    const child = logger.child('node.4', { nodeId: 4 });
    child.info('prepare sent', { to: 1 });
    expect(entries[0]?.nodeId).toBe(4);
    expect(entries[0]?.to).toBe(1);
  });

  it('merges bound fields across generations', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    const child = logger.child('a', { round: 0 }).child('b', { nodeId: 2 });
    child.debug('x');
    expect(entries[0]?.round).toBe(0);
    expect(entries[0]?.nodeId).toBe(2);
    expect(entries[0]?.component).toBe('a.b');
  });

  it('does not let fields override the reserved keys', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    logger.info('real', { message: 'fake', level: 'FAKE' });
    expect(entries[0]?.message).toBe('real');
    expect(entries[0]?.level).toBe('INFO');
  });
});

describe('LogEntry structure', () => {
  it('has only the standard keys when no fields are given', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    logger.info('bare message');
    expect(Object.keys(entries[0] ?? {}).sort()).toEqual(['level', 'message', 'timestamp']);
  });

  it('timestamp is a valid ISO 8601 string', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG);
    logger.info('ts check');
    const ts = entries[0]?.timestamp ?? '';
    expect(new Date(ts).toISOString()).toBe(ts);
  });
});

describe('factory and shared instances', () => {
  it('createLogger passes options through', () => {
    const output = vi.fn();
    const logger = createLogger({ level: LogLevel.ERROR, output });
    logger.warn('skip');
    logger.error('keep');
    expect(output).toHaveBeenCalledOnce();
  });

  it('defaultLogger is at INFO', () => {
    expect(defaultLogger.getLevel()).toBe(LogLevel.INFO);
  });

  it('silentLogger emits nothing', () => {
    expect(silentLogger.isEnabled(LogLevel.ERROR)).toBe(false);
  });
});
