import { loadFieldConfig, loadRuntimeConfig } from '../config/loader';
import { createAcquisitionChain } from '../core/acquisition/chain';
import { BatchDriver } from '../core/automation/batchDriver';
import { ScrapeSession } from '../core/session/ScrapeSession';
import { OutputWriter } from '../output/writer';
import type { RuntimeConfig } from '../types';
import { collectUrls, parseArgs, USAGE } from './args';

export interface RunDependencies {
  createSession?: (config: RuntimeConfig) => ScrapeSession;
}

/**
 * Scrapes every URL given on the command line and saves whatever was
 * collected, even when some or all URLs failed. Resolves to the files written.
 */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<string[]> {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return [];
  }

  const urls = collectUrls(options);
  if (!urls.length) {
    console.log('Provide a --url or --url-file with at least one URL.');
    console.log(USAGE);
    return [];
  }

  const config = loadRuntimeConfig(options.config);
  const fields = loadFieldConfig(options.fields);
  const session = deps.createSession?.(config) ?? new ScrapeSession(config);

  try {
    const driver = new BatchDriver(createAcquisitionChain(session, config), {
      politenessDelaySeconds: config.politeness_delay_seconds,
      waitSelectors: config.wait_css_selectors,
    });
    let written: string[] = [];
    try {
      await driver.run(urls, fields);
    } finally {
      // partial results are still worth keeping
      written = await new OutputWriter({ directory: config.output_dir, base: options.out }).saveAll(driver.records);
    }
    return written;
  } finally {
    await session.close();
  }
}
