import type { AcquisitionMethodName, AttemptResult, FieldConfig } from '../../types';

export interface AcquisitionMethod {
  readonly name: AcquisitionMethodName;
  /** Results are taken as-is instead of going through the quality gate. */
  readonly bypassesQualityGate: boolean;
  attempt(url: string, fields: FieldConfig, waitSelectors?: string[]): Promise<AttemptResult>;
}
