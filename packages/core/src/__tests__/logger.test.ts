/**
 * Tests for the logger
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Logger, LogLevel, createLogger, parseLogLevel, setLogLevel } from '../logger.js';

function capture(): { lines: Array<[LogLevel, string]>; writer: (level: LogLevel, line: string) => void } {
  const lines: Array<[LogLevel, string]> = [];
  return {
    lines,
    writer: (level, line) => {
      lines.push([level, line]);
    },
  };
}

describe('Logger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.INFO);
  });

  it('should drop messages below its level', () => {
    const { lines, writer } = capture();
    const log = new Logger({ level: LogLevel.WARN, writer, colorize: false });

    log.info('ignored');
    log.warn('kept');

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe(LogLevel.WARN);
    expect(lines[0]?.[1]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN: kept$/);
  });

  it('should append prefix and JSON context', () => {
    const { lines, writer } = capture();
    const log = createLogger('scheduler', { level: LogLevel.DEBUG, writer, colorize: false });

    log.debug('tick', { due: 2 });

    expect(lines[0]?.[1]).toMatch(/ \[scheduler\] DEBUG: tick \{"due":2\}$/);
  });

  it('should include the error stack', () => {
    const { lines, writer } = capture();
    const log = new Logger({ level: LogLevel.ERROR, writer, colorize: false });
    const error = new Error('store unavailable');

    log.error('Failed to persist', error);

    expect(lines[0]?.[1]).toContain('ERROR: Failed to persist\nError: store unavailable');
  });

  it('should nest child prefixes and share the writer', () => {
    const { lines, writer } = capture();
    const log = createLogger('monitor', { level: LogLevel.INFO, writer, colorize: false });

    log.child('redeploy').info('started');

    expect(lines[0]?.[1]).toMatch(/ \[monitor:redeploy\] INFO: started$/);
  });

  it('should follow the global level when none is set', () => {
    const { lines, writer } = capture();
    const log = new Logger({ writer, colorize: false });

    setLogLevel(LogLevel.ERROR);
    log.warn('hidden');
    setLogLevel(LogLevel.DEBUG);
    log.debug('shown');

    expect(lines.map(([, line]) => line.endsWith('DEBUG: shown'))).toEqual([true]);
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});
