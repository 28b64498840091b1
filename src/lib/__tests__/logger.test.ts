import { afterEach, describe, it, expect, vi } from 'vitest';
import { FormatError } from '../errors';
import { LogLevel, createLogger, formatLogEntry, getCurrentLogLevel, sanitise } from '../logger';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('getCurrentLogLevel', () => {
  it('prefers LOG_LEVEL', () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('LOG_LEVEL', ' Info ');
    expect(getCurrentLogLevel()).toBe(LogLevel.INFO);
  });

  it('falls back to NODE_ENV for unknown or blank levels', () => {
    vi.stubEnv('LOG_LEVEL', 'constructor');
    vi.stubEnv('NODE_ENV', 'production');
    expect(getCurrentLogLevel()).toBe(LogLevel.WARN);

    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('NODE_ENV', 'test');
    expect(getCurrentLogLevel()).toBe(LogLevel.ERROR);

    vi.stubEnv('NODE_ENV', 'development');
    expect(getCurrentLogLevel()).toBe(LogLevel.DEBUG);
  });
});

describe('formatLogEntry', () => {
  it('prefixes a timestamp, level and context', () => {
    expect(formatLogEntry(LogLevel.INFO, 'hello', 'loader')).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO \[loader\] hello$/
    );
    expect(formatLogEntry(LogLevel.ERROR, 'boom')).toMatch(/Z ERROR boom$/);
  });
});

describe('sanitise', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      sanitise({
        password: 'test-secret',
        file: 'exam.csv',
        nested: { apiKey: 'placeholder', count: 3 },
        list: [{ token: 'test-token' }],
      })
    ).toEqual({
      password: '[REDACTED]',
      file: 'exam.csv',
      nested: { apiKey: '[REDACTED]', count: 3 },
      list: [{ token: '[REDACTED]' }],
    });
  });

  it('passes primitives through', () => {
    expect(sanitise('plain')).toBe('plain');
    expect(sanitise(null)).toBeNull();
  });
});

function captureStderr() {
  return vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('createLogger', () => {
  it('drops messages below the current level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const spy = captureStderr();
    const log = createLogger('test');

    log.debug('quiet');
    log.info('quiet');
    log.warn('loud');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/ WARN \[test\] loud$/));
  });

  it('reports engine errors by kind', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const spy = captureStderr();

    createLogger('test').error('Load failed', new FormatError('File must be in CSV format, not \'.txt\'.'), {
      file: 'a.txt',
    });

    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/ ERROR \[test\] Load failed$/), {
      file: 'a.txt',
      kind: 'format',
      error: "File must be in CSV format, not '.txt'.",
    });
  });

  it('includes the stack for unexpected errors', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const spy = captureStderr();
    const err = new Error('disk on fire');

    createLogger('test').error('Crashed', err);

    expect(spy).toHaveBeenCalledWith(expect.any(String), { error: 'disk on fire', stack: err.stack });
  });
});
