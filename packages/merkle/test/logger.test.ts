import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DebugLogger, createLogger, isDebugEnabled } from '../src/logger.js';

describe('DebugLogger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function makeLogger(json: boolean, enabled = true): DebugLogger {
    return new DebugLogger({ module: 'test', enabled, json, write: (line) => lines.push(line) });
  }

  it('should write a readable line with metadata', () => {
    const log = makeLogger(false);
    log.debug('tree built', { leafCount: 4 });
    log.debug('plain');

    expect(lines).toEqual([
      '[2026-01-02T03:04:05.000Z] DEBUG hashcommit:test: tree built {"leafCount":4}',
      '[2026-01-02T03:04:05.000Z] DEBUG hashcommit:test: plain',
    ]);
  });

  it('should write one JSON object per line in json mode', () => {
    makeLogger(true).debug('root recomputed', { depth: 4 });

    expect(lines).toEqual([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"debug","service":"hashcommit:test","message":"root recomputed","depth":4}',
    ]);
  });

  it('should stay silent when disabled', () => {
    makeLogger(false, false).debug('hidden');
    expect(lines).toEqual([]);
  });

  it('should default to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new DebugLogger({ module: 'test', enabled: true, json: false });

    log.debug('shown');

    expect(error).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] DEBUG hashcommit:test: shown');
  });
});

describe('createLogger', () => {
  it('should scope by module and read the environment', () => {
    const log = createLogger('merkle-tree', { LOG_LEVEL: 'DEBUG', NODE_ENV: 'test' });

    expect(log.service).toBe('hashcommit:merkle-tree');
    expect(log.enabled).toBe(true);
  });

  it('should enable only the debug level', () => {
    expect(isDebugEnabled({ LOG_LEVEL: 'debug' })).toBe(true);
    expect(isDebugEnabled({ LOG_LEVEL: 'info' })).toBe(false);
    expect(isDebugEnabled({})).toBe(false);
  });
});
