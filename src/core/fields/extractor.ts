import { NOT_FOUND, type FieldConfig, type FieldSpec, type FieldValue, type FieldValues } from '../../types';
import type { ParsedDocument } from './document';
import { defaultStrategies } from './strategies';
import { applyTransform } from './transform';
import type { BaseFieldStrategy } from './types';

export class FieldExtractor {
  private readonly strategies: BaseFieldStrategy[];

  constructor(strategies: BaseFieldStrategy[] = defaultStrategies()) {
    this.strategies = [...strategies].sort((a, b) => b.priority - a.priority);
  }

  async extract(document: ParsedDocument, fields: FieldConfig): Promise<FieldValues> {
    const values: FieldValues = {};
    for (const [name, spec] of Object.entries(fields)) {
      values[name] = await this.resolveField(document, name, spec);
    }
    return values;
  }

  async resolveField(document: ParsedDocument, name: string, spec: FieldSpec): Promise<FieldValue> {
    for (const strategy of this.strategies) {
      if (!strategy.canHandle(document, spec)) continue;

      const raw = await strategy.resolve(document, spec, name);
      if (!raw) continue;

      const value = spec.transform ? applyTransform(raw, spec.transform) : raw;
      // a transform that empties the string leaves nothing to report
      return value === '' ? NOT_FOUND : value;
    }
    return NOT_FOUND;
  }
}
