import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiMethod, hasApiUrl } from '../../../src/core/acquisition/ApiMethod';
import { DebugArtifacts } from '../../../src/core/acquisition/debugArtifacts';
import { PlainHttpMethod } from '../../../src/core/acquisition/PlainHttpMethod';
import { RenderedBrowserMethod, type BrowserPage } from '../../../src/core/acquisition/RenderedBrowserMethod';
import type { LocatorHandle } from '../../../src/core/fields/document';
import { FieldExtractor } from '../../../src/core/fields/extractor';
import { ScraperError } from '../../../src/utils/errors';
import type { FieldConfig } from '../../../src/types';
import { stubClient } from '../../helpers/http';

const FIELDS: FieldConfig = {
  name: { css_selectors: ['h1.assessment-name'], xpath: [], text_patterns: [], attributes: [] },
  level: { css_selectors: [], xpath: ['//*[@id="level"]'], text_patterns: ['Level:\\s*(\\w+)'], attributes: [] },
};

const PAGE_HTML = '<html><body><h1 class="assessment-name">Verbal Reasoning</h1><p>Level: Graduate</p></body></html>';

describe('PlainHttpMethod', () => {
  it('extracts fields from the static markup of a 200 response', async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: PAGE_HTML }));
    const method = new PlainHttpMethod(() => client, new FieldExtractor());

    const result = await method.attempt('https://example.test/report', FIELDS);

    expect(result).toEqual({ ok: true, data: { name: 'Verbal Reasoning', level: 'Graduate' } });
    expect(requests[0].url).toBe('https://example.test/report');
    expect(requests[0].method).toBe('get');
  });

  it('fails on any status other than 200', async () => {
    const { client } = stubClient(() => ({ status: 403, data: 'Forbidden' }));
    const method = new PlainHttpMethod(() => client, new FieldExtractor());

    expect(await method.attempt('https://example.test/report', FIELDS)).toEqual({
      ok: false,
      reason: 'Requests got status 403',
    });
  });
});

describe('ApiMethod', () => {
  it('recognises only endpoints with a url', () => {
    expect(hasApiUrl(undefined)).toBe(false);
    expect(hasApiUrl({ method: 'GET' })).toBe(false);
    expect(hasApiUrl({ url: '' })).toBe(false);
    expect(hasApiUrl({ url: 'https://api.example.test/scores' })).toBe(true);
  });

  it('sends a GET without a body and returns the object as-is', async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: { score: 42, tags: ['a'] } }));
    const method = new ApiMethod(() => client, {
      url: 'https://api.example.test/scores',
      headers: { 'X-Api-Key': 'test-key' },
      params: { id: 7 },
      body: { ignored: true },
    });

    const result = await method.attempt();

    expect(result).toEqual({ ok: true, data: { score: 42, tags: ['a'] } });
    expect(requests[0].method).toBe('get');
    expect(requests[0].params).toEqual({ id: 7 });
    expect(requests[0].data).toBeUndefined();
    expect(requests[0].headers.get('x-api-key')).toBe('test-key');
  });

  it('sends the configured body for other methods', async () => {
    const { client, requests } = stubClient(() => ({ status: 201, data: { ok: 'yes' } }));
    const method = new ApiMethod(() => client, {
      url: 'https://api.example.test/search',
      method: 'post',
      body: { query: 'reasoning' },
    });

    expect(await method.attempt()).toEqual({ ok: true, data: { ok: 'yes' } });
    expect(requests[0].method).toBe('post');
    expect(requests[0].data).toBe('{"query":"reasoning"}');
  });

  it('throws an acquisition error for a non-2xx status', async () => {
    const { client } = stubClient(() => ({ status: 500, data: { error: 'boom' } }));
    const method = new ApiMethod(() => client, { url: 'https://api.example.test/scores' });

    const error = await method.attempt().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScraperError);
    expect(error).toMatchObject({ type: 'acquisition', details: { status: 500 } });
  });

  it('rejects bodies that are not a non-empty JSON object', async () => {
    const empty = stubClient(() => ({ status: 200, data: {} }));
    const list = stubClient(() => ({ status: 200, data: [1, 2] }));

    expect(await new ApiMethod(() => empty.client, { url: 'https://api.example.test/a' }).attempt()).toEqual({
      ok: false,
      reason: 'API response is empty',
    });
    expect(await new ApiMethod(() => list.client, { url: 'https://api.example.test/b' }).attempt()).toEqual({
      ok: false,
      reason: 'API response is not a JSON object',
    });
  });
});

function locatorFor(text: string | null): LocatorHandle {
  const handle: LocatorHandle = {
    first: () => handle,
    count: async () => (text === null ? 0 : 1),
    innerText: async () => text ?? '',
  };
  return handle;
}

function fakePage(html: string, live: Record<string, string> = {}) {
  return {
    goto: vi.fn(async () => null),
    waitForSelector: vi.fn(async (selector: string) => {
      if (selector === '.never') throw new Error('Timeout 15000ms exceeded');
      return null;
    }),
    waitForTimeout: vi.fn(async () => undefined),
    screenshot: vi.fn(async () => Buffer.from('')),
    content: vi.fn(async () => html),
    locator: vi.fn((expression: string) => locatorFor(live[expression] ?? null)),
  } satisfies BrowserPage;
}

describe('RenderedBrowserMethod', () => {
  const quiet = new DebugArtifacts({ screenshots: false, saveHtml: false });
  const settings = { sleep_after_load: 2, wait_seconds: 5, page_load_timeout: 20 };

  it('loads the page, waits the fixed delay and extracts with the live locator', async () => {
    const page = fakePage(PAGE_HTML, { '//*[@id="level"]': ' Expert ' });
    const method = new RenderedBrowserMethod(async () => page, settings, quiet, new FieldExtractor());

    const result = await method.attempt('https://example.test/report', FIELDS);

    expect(result).toEqual({ ok: true, data: { name: 'Verbal Reasoning', level: 'Expert' } });
    expect(page.goto).toHaveBeenCalledWith('https://example.test/report', { waitUntil: 'load', timeout: 20000 });
    expect(page.waitForTimeout).toHaveBeenCalledWith(2000);
    expect(page.waitForSelector).not.toHaveBeenCalled();
  });

  it('waits for each selector and ignores the ones that never appear', async () => {
    const page = fakePage(PAGE_HTML);
    const method = new RenderedBrowserMethod(async () => page, settings, quiet, new FieldExtractor());

    const result = await method.attempt('https://example.test/report', FIELDS, ['.never', '.results']);

    expect(result).toEqual({ ok: true, data: { name: 'Verbal Reasoning', level: 'Graduate' } });
    expect(page.waitForSelector).toHaveBeenCalledTimes(2);
    expect(page.waitForSelector).toHaveBeenLastCalledWith('.results', { state: 'attached', timeout: 5000 });
    expect(page.waitForTimeout).not.toHaveBeenCalled();
  });

  it('propagates navigation failures', async () => {
    const page = fakePage(PAGE_HTML);
    page.goto.mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));
    const method = new RenderedBrowserMethod(async () => page, settings, quiet, new FieldExtractor());

    await expect(method.attempt('https://example.test/report', FIELDS)).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
  });

  describe('debug artifacts', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'field-scraper-debug-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('takes a full-page screenshot and dumps the markup', async () => {
      const artifacts = new DebugArtifacts(
        { screenshots: true, saveHtml: true, screenshotDir: join(dir, 'shots'), htmlDir: dir },
        () => 1_700_000_000_500
      );
      const page = fakePage(PAGE_HTML);
      const method = new RenderedBrowserMethod(async () => page, settings, artifacts, new FieldExtractor());

      await method.attempt('https://example.test/report', FIELDS);

      expect(page.screenshot).toHaveBeenCalledWith({
        path: join(dir, 'shots', 'page_1700000000.png'),
        fullPage: true,
        type: 'png',
      });
      expect(readFileSync(join(dir, 'debug_html_1700000000.html'), 'utf8')).toBe(PAGE_HTML);
    });

    it('does not fail the attempt when the screenshot fails', async () => {
      const artifacts = new DebugArtifacts({ screenshots: true, saveHtml: false, screenshotDir: dir });
      const page = fakePage(PAGE_HTML);
      page.screenshot.mockRejectedValueOnce(new Error('Target closed'));
      const method = new RenderedBrowserMethod(async () => page, settings, artifacts, new FieldExtractor());

      const result = await method.attempt('https://example.test/report', FIELDS);

      expect(result.ok).toBe(true);
    });
  });
});
