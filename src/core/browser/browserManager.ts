import { chromium, firefox, webkit, type Browser, type LaunchOptions, type BrowserType } from 'playwright-core';
import type { BrowserKind, BrowserSettings } from '../../types';
import { resolveBrowserSettings } from '../../config/defaults';


export type BrowserConfig = {
  kind?: BrowserKind; // default: chromium
  headless?: boolean; // default: true
  timeout?: number; // launch timeout, ms; default: 30000
  executablePath?: string; // optional custom binary
};

// Chromium flags that keep the automation banner and webdriver hints off
const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--start-maximized',
];


export function browserConfigFrom(settings: BrowserSettings): BrowserConfig {
  const resolved = resolveBrowserSettings(settings);
  return {
    kind: resolved.browser,
    headless: resolved.headless,
    timeout: resolved.page_load_timeout * 1000,
    ...(process.env.BROWSER_EXECUTABLE_PATH ? { executablePath: process.env.BROWSER_EXECUTABLE_PATH } : {}),
  };
}


export class BrowserManager {
  constructor(private cfg: BrowserConfig = {}) {}

  launchOptions(): LaunchOptions {
    const kind = this.cfg.kind ?? 'chromium';
    return {
      headless: this.cfg.headless ?? true,
      timeout: this.cfg.timeout ?? 30000,
      ...(kind === 'chromium' ? { args: CHROMIUM_ARGS, ignoreDefaultArgs: ['--enable-automation'] } : {}),
      ...(this.cfg.executablePath !== undefined ? { executablePath: this.cfg.executablePath } : {}),
    };
  }

  async launch(): Promise<Browser> {
    const kind = this.cfg.kind ?? 'chromium';
    const type: BrowserType = kind === 'firefox' ? firefox : kind === 'webkit' ? webkit : chromium;
    return type.launch(this.launchOptions());
  }
}
