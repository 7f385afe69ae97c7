import type { AcquisitionOutcome, FieldConfig, ScrapedRecord } from '../../types';
import logger from '../../utils/logger';
import { sleep } from '../../utils/time';

export interface RecordSource {
  acquire(url: string, fields: FieldConfig, waitSelectors?: string[]): Promise<AcquisitionOutcome>;
}

export interface BatchOptions {
  politenessDelaySeconds: number;
  waitSelectors?: string[];
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Walks the URL list one at a time. A URL whose acquisition throws is logged
 * and skipped: no record and no politeness delay for it.
 */
export class BatchDriver {
  private readonly accumulated: ScrapedRecord[] = [];
  private readonly log = logger.child({ name: 'batch' });

  constructor(
    private readonly source: RecordSource,
    private readonly options: BatchOptions
  ) {}

  get records(): readonly ScrapedRecord[] {
    return this.accumulated;
  }

  async run(urls: string[], fields: FieldConfig): Promise<readonly ScrapedRecord[]> {
    const wait = this.options.sleep ?? sleep;
    const now = this.options.now ?? (() => new Date());

    for (const [index, url] of urls.entries()) {
      this.log.info(`Scraping URL ${index + 1}/${urls.length}`, { url });

      let record: ScrapedRecord;
      try {
        const outcome = await this.source.acquire(url, fields, this.options.waitSelectors);
        record = Object.freeze({ ...outcome.data, source_url: url, scraped_at: now().toISOString() });
      } catch (error) {
        this.log.error('Failed to scrape URL', { url, error });
        continue;
      }

      this.accumulated.push(record);
      await wait(this.options.politenessDelaySeconds * 1000);
    }

    return this.accumulated;
  }
}
