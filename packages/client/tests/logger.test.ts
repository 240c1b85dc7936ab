import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatLogLine, logger } from '../src/utils/logger.js';

describe('formatLogLine', () => {
  it('writes one JSON line with ts, level, event and meta', () => {
    const line = formatLogLine('info', 'helix.request', { route: 'GET[x]' }, new Date('2024-01-01T00:00:00.000Z'));
    expect(line).toBe('{"ts":"2024-01-01T00:00:00.000Z","level":"info","event":"helix.request","route":"GET[x]"}\n');
  });

  it('falls back when meta cannot be serialized', () => {
    const meta: Record<string, unknown> = {};
    meta.self = meta;
    expect(formatLogLine('warn', 'x', meta)).toBe('{"error":"LOG_SERIALIZATION_FAILED"}\n');
  });
});

describe('logger', () => {
  const previousLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    vi.restoreAllMocks();
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
  });

  it('drops events below LOG_LEVEL', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    process.env.LOG_LEVEL = 'warn';
    logger.debug('helix.session.init');
    logger.info('helix.request');
    expect(stdout).not.toHaveBeenCalled();

    logger.warn('helix.http.timeout', { timeoutMs: 1000 });
    expect(stdout).toHaveBeenCalledTimes(1);
  });

  it('sends errors to stderr', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    process.env.LOG_LEVEL = 'debug';
    logger.error('helix.failed');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stdout).not.toHaveBeenCalled();
  });
});
