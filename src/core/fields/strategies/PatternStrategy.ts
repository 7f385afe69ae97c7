import type { FieldSpec } from '../../../types';
import type { ParsedDocument } from '../document';
import { BaseFieldStrategy } from '../types';

export class PatternStrategy extends BaseFieldStrategy {
  constructor() {
    super('Pattern', 50);
  }

  canHandle(_document: ParsedDocument, spec: FieldSpec): boolean {
    return spec.text_patterns.length > 0;
  }

  async resolve(document: ParsedDocument, spec: FieldSpec, field: string): Promise<string | null> {
    const text = document.visibleText();

    for (const pattern of spec.text_patterns) {
      try {
        // case-insensitive, `.` spans lines
        const match = new RegExp(pattern, 'is').exec(text);
        const captured = match?.[1]?.trim();
        if (captured) {
          this.logSuccess(field, pattern);
          return captured;
        }
      } catch (err) {
        this.logFailure(field, pattern, err);
      }
    }
    return null;
  }
}
