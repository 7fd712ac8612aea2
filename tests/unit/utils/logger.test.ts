/**
 * @arch hexgraph.test.unit
 */
/**
 * Tests for logger utility.
 */
import { describe, it, expect } from 'vitest';
import { Logger, resolveLogLevel, isLogLevel } from '../../../src/utils/logger.js';

function capture(): { lines: string[]; write(chunk: string): void } {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string) {
      lines.push(chunk);
    },
  };
}

describe('Logger', () => {
  it('should filter by level', () => {
    const sink = capture();
    const log = new Logger({ level: 'warn', sink });

    log.debug('debug message');
    log.info('info message');
    log.warn('warn message');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain('[WARN] warn message');
  });

  it('should stay quiet when silent', () => {
    const sink = capture();
    const log = new Logger({ level: 'silent', sink });

    log.error('error message');
    log.success('done');

    expect(sink.lines).toEqual([]);
  });

  it('should nest child prefixes and share the sink', () => {
    const sink = capture();
    const child = new Logger({ level: 'debug', prefix: 'cli', sink }).child('manifests');

    child.debug('found 2');

    expect(sink.lines[0]).toContain('[DEBUG] [cli:manifests] found 2');
  });

  it('should write data after the message', () => {
    const sink = capture();
    new Logger({ sink }).info('loaded', { count: 2 });

    expect(sink.lines).toHaveLength(2);
    expect(sink.lines[1]).toContain('"count": 2');
  });

  it('should write success and failure lines at info level', () => {
    const sink = capture();
    const log = new Logger({ sink });

    log.success('built');
    log.fail('broken');

    expect(sink.lines[0]).toContain('✓ built');
    expect(sink.lines[1]).toContain('✗ broken');
  });

  it('should change level at runtime', () => {
    const log = new Logger();
    log.setLevel('error');

    expect(log.getLevel()).toBe('error');
    expect(log.isEnabled('warn')).toBe(false);
    expect(log.isEnabled('error')).toBe(true);
  });
});

describe('resolveLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('should fall back for unknown or missing values', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose', 'warn')).toBe('warn');
    expect(isLogLevel('verbose')).toBe(false);
  });
});
