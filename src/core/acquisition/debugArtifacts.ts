import { promises as fs } from 'fs';
import * as path from 'path';
import logger from '../../utils/logger';

export interface ScreenshotTarget {
  screenshot(options: { path: string; fullPage: boolean; type: 'png' }): Promise<unknown>;
}

export interface DebugArtifactOptions {
  screenshots: boolean;
  saveHtml: boolean;
  screenshotDir?: string;  // default: ./screenshots
  htmlDir?: string;        // default: cwd
}

/**
 * Screenshot and raw-markup dumps taken after a rendered page load. Failures
 * are logged and never reach the caller.
 */
export class DebugArtifacts {
  private readonly log = logger.child({ name: 'debug' });

  constructor(
    private readonly options: DebugArtifactOptions,
    private readonly now: () => number = Date.now
  ) {}

  private stamp(): number {
    return Math.floor(this.now() / 1000);
  }

  async screenshot(page: ScreenshotTarget): Promise<string | null> {
    if (!this.options.screenshots) return null;
    const dir = this.options.screenshotDir ?? path.join(process.cwd(), 'screenshots');
    const file = path.join(dir, `page_${this.stamp()}.png`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await page.screenshot({ path: file, fullPage: true, type: 'png' });
      this.log.debug('Screenshot saved', { file });
      return file;
    } catch (err) {
      this.log.warn('Screenshot failed', { file, err });
      return null;
    }
  }

  async html(markup: string): Promise<string | null> {
    if (!this.options.saveHtml) return null;
    const dir = this.options.htmlDir ?? process.cwd();
    const file = path.join(dir, `debug_html_${this.stamp()}.html`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(file, markup, 'utf8');
      this.log.debug('Page HTML saved', { file });
      return file;
    } catch (err) {
      this.log.warn('HTML dump failed', { file, err });
      return null;
    }
  }
}
