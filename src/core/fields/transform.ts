import type { FieldValue, Transform } from '../../types';

// first signed decimal in the string, e.g. "87.5" in "Score: 87.5%"
const NUMBER_PATTERN = /[-+]?[0-9]*\.?[0-9]+/;

function replaceAll(value: string, pattern: string, replacement: string): string {
  try {
    return value.replace(new RegExp(pattern, 'g'), replacement);
  } catch {
    // invalid pattern leaves the value as extracted
    return value;
  }
}

function stripChars(value: string, chars?: string): string {
  if (chars === undefined) return value.trim();

  // code points, so surrogate pairs strip as one character
  const set = new Set(chars);
  const points = Array.from(value);
  let start = 0;
  let end = points.length;
  while (start < end && set.has(points[start])) start++;
  while (end > start && set.has(points[end - 1])) end--;
  return points.slice(start, end).join('');
}

function toNumber(value: string): FieldValue {
  const match = NUMBER_PATTERN.exec(value);
  if (!match) return value;
  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : value;
}

/** Never throws: anything that cannot be applied returns `value` unchanged. */
export function applyTransform(value: string, transform: Transform): FieldValue {
  switch (transform.type) {
    case 'regex':
      return replaceAll(value, transform.pattern, transform.replacement ?? '');
    case 'strip_chars':
      return stripChars(value, transform.chars);
    case 'convert_to_number':
      return toNumber(value);
    default:
      return value;
  }
}
