export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ExtractedRecord = Record<string, JsonValue>;

export type ScrapedRecord = Readonly<ExtractedRecord & {
  source_url: string;
  scraped_at: string;
}>;

export type AcquisitionMethodName = 'browser' | 'http' | 'api';

export type AttemptResult =
  | { ok: true; data: ExtractedRecord }
  | { ok: false; reason: string };

export interface AcquisitionOutcome {
  data: ExtractedRecord;
  accepted: boolean;
  method: AcquisitionMethodName | null;
}
