import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, redact, normalizeLevel, genId, timeOperation } from '../api/_lib/logger';

const config = { silent: false, pretty: false, level: 'info', service: 'svc', env: 'test', version: '1' } as const;

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
  it('writes one JSON line with redacted data', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    new ConsoleLogger(config).info('hello', { password: 'test-secret', n: 1 });

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toEqual({
      timestamp: expect.any(String),
      level: 'INFO',
      service: 'svc',
      env: 'test',
      version: '1',
      message: 'hello',
      password: '[REDACTED]',
      n: 1,
    });
  });

  it('skips entries below its level and honours setLevel', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger(config);
    logger.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    logger.setLevel('debug');
    expect(logger.getLevel()).toBe('debug');
    logger.debug('shown');
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    new ConsoleLogger({ ...config, silent: true }).error('quiet');
    expect(error).not.toHaveBeenCalled();
  });

  it('prints bindings in pretty mode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new ConsoleLogger({ ...config, pretty: true }).child({ module: 'trend' }).warn('careful', { a: 1 });
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[[^\]]+\] WARN \[module=trend\]: careful \{"a":1\}$/);
  });
});

describe('logger helpers', () => {
  it('redacts nested keys and marks cycles', () => {
    const value: Record<string, unknown> = { user: { token: 'test-secret', name: 'sam' } };
    value.self = value;
    expect(redact(value)).toEqual({ user: { token: '[REDACTED]', name: 'sam' }, self: '[Circular]' });
    expect(redact({ sessionId: 'x' }, ['sessionId'])).toEqual({ sessionId: '[REDACTED]' });
  });

  it('normalizes levels', () => {
    expect(normalizeLevel('WARN')).toBe('warn');
    expect(normalizeLevel('loud')).toBe('info');
    expect(normalizeLevel()).toBe('info');
  });

  it('generates prefixed ids', () => {
    expect(genId('session')).toMatch(/^session_[0-9a-z]+_[0-9a-z]*$/);
    expect(genId('session')).not.toBe(genId('session'));
  });

  it('times operations and rethrows failures', async () => {
    const logger = new ConsoleLogger({ ...config, silent: true });
    await expect(timeOperation(logger, 'ok', async () => 7)).resolves.toBe(7);
    await expect(timeOperation(logger, 'bad', async () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
  });
});
