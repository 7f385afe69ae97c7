import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, safeSerialize } from '../../src/utils/logger';
import { describeError, ScraperError } from '../../src/utils/errors';
import { fileTimestamp } from '../../src/utils/time';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('Logger', () => {
  it('writes one JSON line per entry', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('info', 'batch').info('Scraping URL 1/2', { url: 'https://example.test' });

    const line: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      name: 'batch',
      msg: 'Scraping URL 1/2',
      meta: { url: 'https://example.test' },
    });
  });

  it('drops entries below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = new Logger('warn');
    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to info for a LOG_LEVEL that is not a level', () => {
    vi.stubEnv('LOG_LEVEL', 'constructor');
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const log = new Logger();
    log.debug('hidden');
    log.info('shown');
    log.error('boom');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('lets a child override the name and keep the level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger('error', 'root').child({ name: 'output' }).error('failed');

    expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({ level: 'error', name: 'output' });
  });
});

describe('safeSerialize', () => {
  it('turns errors, sets and maps into plain values', () => {
    expect(safeSerialize(new Error('boom'))).toMatchObject({ name: 'Error', message: 'boom' });
    expect(safeSerialize({ s: new Set([1, 2]), m: new Map([['k', 'v']]), n: 10n })).toEqual({
      s: [1, 2],
      m: { k: 'v' },
      n: '10',
    });
  });

  it('falls back to a string for circular values', () => {
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    expect(safeSerialize(loop)).toEqual({ value: '[object Object]' });
  });
});

describe('errors', () => {
  it('keeps the type and details on a ScraperError', () => {
    const error = new ScraperError('acquisition', 'API responded with status 500', { status: 500 });
    expect(error.name).toBe('ScraperError');
    expect(error.type).toBe('acquisition');
    expect(describeError(error)).toBe('API responded with status 500');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('fileTimestamp', () => {
  it('formats local time for file names', () => {
    expect(fileTimestamp(new Date(2026, 10, 9, 8, 7, 6))).toBe('20261109_080706');
  });
});
