import type { FieldSpec } from '../../../types';
import type { ParsedDocument } from '../document';
import { BaseFieldStrategy } from '../types';

export class AttributeStrategy extends BaseFieldStrategy {
  constructor() {
    super('Attribute', 25);
  }

  canHandle(_document: ParsedDocument, spec: FieldSpec): boolean {
    return spec.attributes.length > 0;
  }

  async resolve(document: ParsedDocument, spec: FieldSpec, field: string): Promise<string | null> {
    for (const rule of spec.attributes) {
      const entry = `${rule.selector}@${rule.attribute}`;
      try {
        const value = document.$(rule.selector).first().attr(rule.attribute);
        if (value) {
          this.logSuccess(field, entry);
          return value;
        }
      } catch (err) {
        this.logFailure(field, entry, err);
      }
    }
    return null;
  }
}
