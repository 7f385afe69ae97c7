export const NOT_FOUND = 'Not Found';

export type RegexTransform = { type: 'regex'; pattern: string; replacement?: string };
export type StripCharsTransform = { type: 'strip_chars'; chars?: string };
export type ConvertToNumberTransform = { type: 'convert_to_number' };

export type Transform = RegexTransform | StripCharsTransform | ConvertToNumberTransform;

export interface AttributeRule {
  selector: string;
  attribute: string;
}

export interface FieldSpec {
  css_selectors: string[];
  xpath: string[];            // live-locator expressions, browser only
  text_patterns: string[];    // one capture group each
  attributes: AttributeRule[];
  transform?: Transform;
}

export type FieldConfig = Record<string, FieldSpec>;

export type FieldValue = string | number;
export type FieldValues = Record<string, FieldValue>;
