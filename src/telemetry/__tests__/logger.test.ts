import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, logDebug, logError, logInfo, logWarning } from '../logger.js';

const originalLevel = process.env.DNA_SYNTH_LOG_LEVEL;

beforeEach(() => {
  process.env.DNA_SYNTH_LOG_LEVEL = 'debug';
});

afterEach(() => {
  if (originalLevel === undefined) {
    delete process.env.DNA_SYNTH_LOG_LEVEL;
  } else {
    process.env.DNA_SYNTH_LOG_LEVEL = originalLevel;
  }
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs prefixed message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith(`[${level}] hello`);
    });

    it(`logs prefixed message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith(`[${level}] hello`);
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { runId: 'run-123' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith(`[${level}] hello`, context);
    });
  }

  it('drops messages below the configured threshold', () => {
    process.env.DNA_SYNTH_LOG_LEVEL = 'warn';
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('ignored');
    logDebug('ignored');
    logWarning('kept');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[warn] kept');
  });

  it('emits nothing when silent', () => {
    process.env.DNA_SYNTH_LOG_LEVEL = 'silent';
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('ignored');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it.each(['verbose', 'constructor', 'toString', '__proto__'])('falls back to info for the unrecognised level %s', (level) => {
    process.env.DNA_SYNTH_LOG_LEVEL = level;

    expect(getLogLevel()).toBe('info');
  });
});
