import { NOT_FOUND } from '../../types';

export function isFound(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '' && value !== NOT_FOUND;
}

/**
 * Completeness check: the share of fields that resolved must reach
 * `threshold`. Fields count equally unless `weights` says otherwise.
 */
export function isExtractionSuccessful(
  data: Record<string, unknown>,
  threshold: number,
  weights?: Record<string, number>
): boolean {
  const names = Object.keys(data);
  if (names.length === 0) return false;

  let total = 0;
  let found = 0;
  for (const name of names) {
    const weight = weights?.[name] ?? 1;
    total += weight;
    if (isFound(data[name])) found += weight;
  }
  if (total === 0) return false;
  return found / total >= threshold;
}
