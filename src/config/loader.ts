import { z } from 'zod';
import { SchemaParser } from '../schemas/parser';
import { fieldSpecSchema, runtimeConfigFileSchema } from '../schemas/validator';
import type { FieldConfig, RuntimeConfig, RuntimeConfigFile } from '../types';
import logger from '../utils/logger';
import { DEFAULT_RUNTIME_CONFIG } from './defaults';
import sampleFields from './sample-fields.json';

const log = logger.child({ name: 'config' });

/** Shallow merge: a top-level key set in the file replaces the default wholesale. */
export function mergeRuntimeConfig(file: RuntimeConfigFile): RuntimeConfig {
  const defaults = DEFAULT_RUNTIME_CONFIG;
  return {
    success_threshold: file.success_threshold ?? defaults.success_threshold,
    politeness_delay_seconds: file.politeness_delay_seconds ?? defaults.politeness_delay_seconds,
    selenium: file.selenium ?? defaults.selenium,
    debug: file.debug ?? defaults.debug,
    api_endpoint: file.api_endpoint ?? defaults.api_endpoint,
    wait_css_selectors: file.wait_css_selectors ?? defaults.wait_css_selectors,
    field_weights: file.field_weights ?? defaults.field_weights,
    output_dir: file.output_dir ?? defaults.output_dir,
  };
}

export function parseRuntimeConfig(raw: unknown): RuntimeConfig {
  const parsed = runtimeConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.error('Runtime config must be a mapping; using defaults', { issues: parsed.error.issues });
    return mergeRuntimeConfig({});
  }
  return mergeRuntimeConfig(parsed.data);
}

export function loadRuntimeConfig(filePath?: string): RuntimeConfig {
  if (!filePath) return mergeRuntimeConfig({});
  return parseRuntimeConfig(SchemaParser.parse(filePath));
}

export function parseFieldConfig(raw: unknown): FieldConfig {
  const entries = z.record(z.unknown()).safeParse(raw);
  if (!entries.success) {
    log.error('Field config must map field names to field specs', { issues: entries.error.issues });
    return {};
  }

  const fields: FieldConfig = {};
  for (const [name, spec] of Object.entries(entries.data)) {
    const parsed = fieldSpecSchema.safeParse(spec);
    if (parsed.success) {
      fields[name] = parsed.data;
    } else {
      log.warn('Dropping invalid field spec', { field: name, issues: parsed.error.issues });
    }
  }
  return fields;
}

/** Without a path, the built-in assessment-report field set is used. */
export function loadFieldConfig(filePath?: string): FieldConfig {
  return parseFieldConfig(filePath ? SchemaParser.parse(filePath) : sampleFields);
}
