import axios, { type AxiosInstance } from 'axios';
import type { Browser, Page } from 'playwright-core';
import { DESKTOP_USER_AGENT, HTTP_TIMEOUT_MS, resolveBrowserSettings } from '../../config/defaults';
import type { RuntimeConfig } from '../../types';
import logger from '../../utils/logger';
import { BrowserManager, browserConfigFrom } from '../browser/browserManager';

export interface BrowserLauncher {
  launch(): Promise<Pick<Browser, 'newPage' | 'close'>>;
}

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { 'User-Agent': DESKTOP_USER_AGENT },
    timeout: HTTP_TIMEOUT_MS,
    // callers inspect the status themselves
    validateStatus: () => true,
  });
}

/**
 * Owns the browser and HTTP client for one run. Both are created on first
 * use, shared by every URL, and released by `close()`.
 */
export class ScrapeSession {
  private browser: Pick<Browser, 'newPage' | 'close'> | null = null;
  private activePage: Page | null = null;
  private client: AxiosInstance | null = null;
  private readonly log = logger.child({ name: 'session' });

  constructor(
    private readonly config: RuntimeConfig,
    private readonly launcher: BrowserLauncher = new BrowserManager(browserConfigFrom(config.selenium)),
    private readonly clientFactory: () => AxiosInstance = createHttpClient
  ) {}

  async page(): Promise<Page> {
    if (this.activePage) return this.activePage;

    if (!this.browser) {
      this.log.info('Launching browser');
      this.browser = await this.launcher.launch();
    }
    const page = await this.browser.newPage({ viewport: null });
    page.setDefaultNavigationTimeout(resolveBrowserSettings(this.config.selenium).page_load_timeout * 1000);
    this.activePage = page;
    return page;
  }

  httpClient(): AxiosInstance {
    if (!this.client) this.client = this.clientFactory();
    return this.client;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.activePage = null;
    this.client = null;

    if (!browser) return;
    try {
      await browser.close();
    } catch (error) {
      this.log.warn('Browser close failed', { error });
    }
  }
}
