import type { BrowserSettings, RuntimeConfig } from '../types';

export const BROWSER_DEFAULTS: Required<BrowserSettings> = {
  headless: false,
  save_screenshots: true,
  sleep_after_load: 3,
  wait_seconds: 15,
  page_load_timeout: 30,
  browser: 'chromium',
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  success_threshold: 0.5,
  politeness_delay_seconds: 2,
  selenium: { ...BROWSER_DEFAULTS },
  debug: { save_html: false },
  output_dir: '.',
};

export const HTTP_TIMEOUT_MS = 30_000;

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/**
 * Fills in the browser settings a shallow config merge may have dropped,
 * e.g. a file that sets only `selenium.headless`.
 */
export function resolveBrowserSettings(settings: BrowserSettings): Required<BrowserSettings> {
  return {
    headless: settings.headless ?? BROWSER_DEFAULTS.headless,
    save_screenshots: settings.save_screenshots ?? BROWSER_DEFAULTS.save_screenshots,
    sleep_after_load: settings.sleep_after_load ?? BROWSER_DEFAULTS.sleep_after_load,
    wait_seconds: settings.wait_seconds ?? BROWSER_DEFAULTS.wait_seconds,
    page_load_timeout: settings.page_load_timeout ?? BROWSER_DEFAULTS.page_load_timeout,
    browser: settings.browser ?? BROWSER_DEFAULTS.browser,
  };
}
