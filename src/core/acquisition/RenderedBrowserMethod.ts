import { resolveBrowserSettings } from '../../config/defaults';
import type { AttemptResult, BrowserSettings, FieldConfig } from '../../types';
import logger from '../../utils/logger';
import { ParsedDocument, PageLocator, type LocatorSource } from '../fields/document';
import type { FieldExtractor } from '../fields/extractor';
import type { DebugArtifacts, ScreenshotTarget } from './debugArtifacts';
import type { AcquisitionMethod } from './types';

/** The part of a Playwright page this method drives. */
export interface BrowserPage extends LocatorSource, ScreenshotTarget {
  goto(url: string, options: { waitUntil: 'load'; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { state: 'attached'; timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
}

export class RenderedBrowserMethod implements AcquisitionMethod {
  readonly name = 'browser';
  readonly bypassesQualityGate = false;
  private readonly settings: Required<BrowserSettings>;
  private readonly log = logger.child({ name: 'browser' });

  constructor(
    private readonly pageProvider: () => Promise<BrowserPage>,
    settings: BrowserSettings,
    private readonly artifacts: DebugArtifacts,
    private readonly extractor: FieldExtractor
  ) {
    this.settings = resolveBrowserSettings(settings);
  }

  async attempt(url: string, fields: FieldConfig, waitSelectors?: string[]): Promise<AttemptResult> {
    const page = await this.pageProvider();
    await page.goto(url, { waitUntil: 'load', timeout: this.settings.page_load_timeout * 1000 });

    if (waitSelectors && waitSelectors.length > 0) {
      await this.waitForEach(page, waitSelectors);
    } else {
      await page.waitForTimeout(this.settings.sleep_after_load * 1000);
    }

    await this.artifacts.screenshot(page);
    const html = await page.content();
    await this.artifacts.html(html);

    const document = ParsedDocument.fromHtml(html, new PageLocator(page));
    return { ok: true, data: await this.extractor.extract(document, fields) };
  }

  // a selector that never shows up is skipped; the rest still get their wait
  private async waitForEach(page: BrowserPage, selectors: string[]): Promise<void> {
    const timeout = this.settings.wait_seconds * 1000;
    for (const selector of selectors) {
      try {
        await page.waitForSelector(selector, { state: 'attached', timeout });
      } catch (error) {
        this.log.debug('Wait selector not found', { selector, timeout, error });
      }
    }
  }
}
