import type { AxiosInstance } from 'axios';
import { jsonObjectSchema } from '../../schemas/validator';
import type { ApiEndpointConfig, AttemptResult } from '../../types';
import { ScraperError } from '../../utils/errors';
import type { AcquisitionMethod } from './types';

export type ResolvedApiEndpoint = ApiEndpointConfig & { url: string };

export function hasApiUrl(endpoint: ApiEndpointConfig | undefined): endpoint is ResolvedApiEndpoint {
  return typeof endpoint?.url === 'string' && endpoint.url.length > 0;
}

/**
 * Calls a JSON endpoint that already returns field-shaped data. The page URL
 * plays no part in the request.
 */
export class ApiMethod implements AcquisitionMethod {
  readonly name = 'api';
  readonly bypassesQualityGate = true;

  constructor(
    private readonly client: () => AxiosInstance,
    private readonly endpoint: ResolvedApiEndpoint
  ) {}

  async attempt(): Promise<AttemptResult> {
    const method = (this.endpoint.method ?? 'GET').toUpperCase();
    const response = await this.client().request<unknown>({
      url: this.endpoint.url,
      method,
      headers: this.endpoint.headers ?? {},
      params: this.endpoint.params ?? {},
      data: method === 'GET' ? undefined : this.endpoint.body ?? {},
      responseType: 'json',
    });

    if (response.status < 200 || response.status >= 300) {
      throw new ScraperError('acquisition', `API responded with status ${response.status}`, {
        url: this.endpoint.url,
        status: response.status,
      });
    }

    const parsed = jsonObjectSchema.safeParse(response.data);
    if (!parsed.success) return { ok: false, reason: 'API response is not a JSON object' };
    if (Object.keys(parsed.data).length === 0) return { ok: false, reason: 'API response is empty' };
    return { ok: true, data: parsed.data };
  }
}
