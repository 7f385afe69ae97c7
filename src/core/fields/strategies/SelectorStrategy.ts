import type { FieldSpec } from '../../../types';
import type { ParsedDocument } from '../document';
import { BaseFieldStrategy } from '../types';

export class SelectorStrategy extends BaseFieldStrategy {
  constructor() {
    super('Selector', 100); // Highest priority
  }

  canHandle(_document: ParsedDocument, spec: FieldSpec): boolean {
    return spec.css_selectors.length > 0;
  }

  async resolve(document: ParsedDocument, spec: FieldSpec, field: string): Promise<string | null> {
    for (const selector of spec.css_selectors) {
      try {
        const text = document.elementText(selector).trim();
        if (text) {
          this.logSuccess(field, selector);
          return text;
        }
      } catch (err) {
        this.logFailure(field, selector, err);
      }
    }
    return null;
  }
}
