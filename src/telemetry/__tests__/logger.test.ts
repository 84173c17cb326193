import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning, resolveLogLevel } from '../logger.js';

const originalLevel = process.env.PROVENANCE_LOG_LEVEL;

beforeEach(() => {
  process.env.PROVENANCE_LOG_LEVEL = 'debug';
});

afterEach(() => {
  vi.restoreAllMocks();
  if (originalLevel === undefined) {
    delete process.env.PROVENANCE_LOG_LEVEL;
  } else {
    process.env.PROVENANCE_LOG_LEVEL = originalLevel;
  }
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs prefixed message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('[provenance] hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { commitId: 'abc123' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('[provenance] hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    process.env.PROVENANCE_LOG_LEVEL = 'warn';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('quiet');
    logDebug('quieter');

    expect(spy).not.toHaveBeenCalled();
  });

  it('silences everything at silent', () => {
    process.env.PROVENANCE_LOG_LEVEL = 'silent';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('boom');

    expect(spy).not.toHaveBeenCalled();
  });

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel(' WARN ')).toBe('warn');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});
