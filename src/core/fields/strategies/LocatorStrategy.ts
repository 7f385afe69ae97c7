import type { FieldSpec } from '../../../types';
import type { ParsedDocument } from '../document';
import { BaseFieldStrategy } from '../types';

/** Browser-native expressions (XPath included), evaluated on the live page. */
export class LocatorStrategy extends BaseFieldStrategy {
  constructor() {
    super('Locator', 75);
  }

  canHandle(document: ParsedDocument, spec: FieldSpec): boolean {
    return document.liveLocatorCapable && spec.xpath.length > 0;
  }

  async resolve(document: ParsedDocument, spec: FieldSpec, field: string): Promise<string | null> {
    const live = document.live;
    if (!live) return null;

    for (const expression of spec.xpath) {
      try {
        const text = (await live.textOf(expression))?.trim();
        if (text) {
          this.logSuccess(field, expression);
          return text;
        }
      } catch (err) {
        this.logFailure(field, expression, err);
      }
    }
    return null;
  }
}
