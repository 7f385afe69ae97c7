import type { FieldSpec } from '../../types';
import logger from '../../utils/logger';
import type { ParsedDocument } from './document';

/**
 * One technique for locating a field's value. `resolve` returns null when
 * nothing matched; a lookup that throws counts as no match for that entry.
 */
export abstract class BaseFieldStrategy {
  protected readonly log = logger.child({ name: 'fields' });

  constructor(
    readonly name: string,
    readonly priority: number
  ) {}

  abstract canHandle(document: ParsedDocument, spec: FieldSpec): boolean;

  abstract resolve(document: ParsedDocument, spec: FieldSpec, field: string): Promise<string | null>;

  protected logSuccess(field: string, entry: string) {
    this.log.debug(`${this.name} matched`, { field, entry });
  }

  protected logFailure(field: string, entry: string, error: unknown) {
    this.log.debug(`${this.name} lookup failed`, { field, entry, error });
  }
}
