import type { AcquisitionOutcome, AttemptResult, ExtractedRecord, FieldConfig, RuntimeConfig } from '../../types';
import { resolveBrowserSettings } from '../../config/defaults';
import { describeError } from '../../utils/errors';
import logger from '../../utils/logger';
import { FieldExtractor } from '../fields/extractor';
import { isExtractionSuccessful } from '../fields/qualityGate';
import type { ScrapeSession } from '../session/ScrapeSession';
import { ApiMethod, hasApiUrl } from './ApiMethod';
import { DebugArtifacts } from './debugArtifacts';
import { PlainHttpMethod } from './PlainHttpMethod';
import { RenderedBrowserMethod } from './RenderedBrowserMethod';
import type { AcquisitionMethod } from './types';

export type QualityGate = (data: ExtractedRecord) => boolean;

/**
 * Tries each method in order and stops at the first accepted result. Never
 * throws: when nothing is accepted, the data of the last method that got
 * that far is returned (possibly `{}`).
 */
export class AcquisitionChain {
  private readonly log = logger.child({ name: 'acquisition' });

  constructor(
    private readonly methods: AcquisitionMethod[],
    private readonly gate: QualityGate
  ) {}

  async acquire(url: string, fields: FieldConfig, waitSelectors?: string[]): Promise<AcquisitionOutcome> {
    let best: ExtractedRecord = {};

    for (const method of this.methods) {
      let result: AttemptResult;
      try {
        result = await method.attempt(url, fields, waitSelectors);
      } catch (error) {
        this.log.warn(`${method.name} method failed`, { url, error: describeError(error) });
        continue;
      }

      if (!result.ok) {
        this.log.warn(`${method.name} method failed`, { url, reason: result.reason });
        continue;
      }

      best = result.data;
      if (method.bypassesQualityGate || this.gate(result.data)) {
        this.log.info(`✓ ${method.name} method successful`, { url });
        return { data: result.data, accepted: true, method: method.name };
      }
      this.log.info(`${method.name} result below quality threshold`, { url });
    }

    this.log.warn('No method passed the quality gate; keeping best effort', { url });
    return { data: best, accepted: false, method: null };
  }
}

export function createAcquisitionChain(
  session: ScrapeSession,
  config: RuntimeConfig,
  extractor: FieldExtractor = new FieldExtractor()
): AcquisitionChain {
  const artifacts = new DebugArtifacts({
    screenshots: resolveBrowserSettings(config.selenium).save_screenshots,
    saveHtml: config.debug.save_html ?? false,
  });

  const methods: AcquisitionMethod[] = [
    new RenderedBrowserMethod(() => session.page(), config.selenium, artifacts, extractor),
    new PlainHttpMethod(() => session.httpClient(), extractor),
  ];
  if (hasApiUrl(config.api_endpoint)) {
    methods.push(new ApiMethod(() => session.httpClient(), config.api_endpoint));
  }

  const gate: QualityGate = data =>
    isExtractionSuccessful(data, config.success_threshold, config.field_weights);
  return new AcquisitionChain(methods, gate);
}
