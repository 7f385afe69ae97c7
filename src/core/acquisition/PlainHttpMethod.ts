import type { AxiosInstance } from 'axios';
import type { AttemptResult, FieldConfig } from '../../types';
import { ParsedDocument } from '../fields/document';
import type { FieldExtractor } from '../fields/extractor';
import type { AcquisitionMethod } from './types';

export class PlainHttpMethod implements AcquisitionMethod {
  readonly name = 'http';
  readonly bypassesQualityGate = false;

  constructor(
    private readonly client: () => AxiosInstance,
    private readonly extractor: FieldExtractor
  ) {}

  async attempt(url: string, fields: FieldConfig): Promise<AttemptResult> {
    const response = await this.client().get<unknown>(url, { responseType: 'text' });
    if (response.status !== 200) {
      return { ok: false, reason: `Requests got status ${response.status}` };
    }

    const html = typeof response.data === 'string' ? response.data : String(response.data);
    // static markup only: no live locator on this channel
    const document = ParsedDocument.fromHtml(html);
    return { ok: true, data: await this.extractor.extract(document, fields) };
  }
}
