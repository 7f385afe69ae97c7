#!/usr/bin/env node
import { run } from './cli/run';
import logger from './utils/logger';

export { run } from './cli/run';
export { AcquisitionChain, createAcquisitionChain } from './core/acquisition/chain';
export { BatchDriver } from './core/automation/batchDriver';
export { FieldExtractor } from './core/fields/extractor';
export { ParsedDocument } from './core/fields/document';
export { applyTransform } from './core/fields/transform';
export { isExtractionSuccessful } from './core/fields/qualityGate';
export { ScrapeSession } from './core/session/ScrapeSession';
export { OutputWriter } from './output/writer';
export { loadFieldConfig, loadRuntimeConfig } from './config/loader';
export * from './types';

async function main() {
  await run(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Scrape run failed', { error });
    process.exitCode = 1;
  });
}
