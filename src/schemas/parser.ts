import { readFileSync } from 'fs';
import * as yaml from 'js-yaml';
import { ScraperError } from '../utils/errors';
import logger from '../utils/logger';

export type ConfigFormat = 'json' | 'yaml';

const log = logger.child({ name: 'config' });

export function formatFor(filePath: string): ConfigFormat {
  return filePath.endsWith('.yaml') || filePath.endsWith('.yml') ? 'yaml' : 'json';
}

export class SchemaParser {
  /** Reads a JSON or YAML file. Unreadable or unparsable files yield `{}`. */
  static parse(filePath: string): unknown {
    try {
      const content = readFileSync(filePath, 'utf-8');
      return SchemaParser.parseFromString(content, formatFor(filePath));
    } catch (error) {
      log.error('Error loading config', { filePath, error });
      return {};
    }
  }

  static parseFromString(content: string, format: ConfigFormat): unknown {
    const value: unknown = format === 'yaml' ? yaml.load(content) : JSON.parse(content);

    // empty documents count as an empty mapping
    if (value === null || value === undefined) return {};
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new ScraperError('config', `Expected a mapping at the top level, got ${Array.isArray(value) ? 'array' : typeof value}`);
    }
    return value;
  }
}
