import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, serializeError } from '../src/index.js';

function lastEntry(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const callArg = spy.mock.calls.at(-1)?.[0];
  if (typeof callArg !== 'string') throw new Error('no log line written');
  return JSON.parse(callArg);
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('emits structured json', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger({ service: 'loadwire', client: 'client-1' });

    logger.info('hello', { method: 'GET', url: 'http://127.0.0.1/' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(lastEntry(logSpy)).toMatchObject({
      level: 'info',
      message: 'hello',
      service: 'loadwire',
      client: 'client-1',
      method: 'GET',
      url: 'http://127.0.0.1/'
    });
  });

  it('drops entries below the configured level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger({}, { level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(lastEntry(logSpy)).toMatchObject({ level: 'warn', message: 'kept' });
  });

  it('writes nothing when silent', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger({}, { silent: true }).error('boom');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('extends the base context for child loggers', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger({ service: 'loadwire' }).child({ component: 'dispatcher' });

    logger.warn('staged slot not empty');

    expect(lastEntry(logSpy)).toMatchObject({ service: 'loadwire', component: 'dispatcher' });
  });

  it('serializes errors with their code', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), { code: 'ECONNREFUSED' });

    createLogger().warn('request failed', { error });

    expect(lastEntry(logSpy).error).toEqual({
      name: 'Error',
      message: 'connect ECONNREFUSED 127.0.0.1:1',
      code: 'ECONNREFUSED'
    });
  });

  it('renders non-error values as strings', () => {
    expect(serializeError('plain')).toBe('plain');
    expect(serializeError(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
  });
});
