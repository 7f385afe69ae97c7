import { z } from 'zod';
import type { FieldSpec, JsonValue, RuntimeConfigFile, Transform } from '../types';
import logger from '../utils/logger';

const log = logger.child({ name: 'config' });

/**
 * Makes a key optional and turns an invalid value into `undefined` with a
 * warning, so one bad entry never discards the rest of the file.
 */
function lenient<T extends z.ZodTypeAny>(key: string, schema: T) {
  return schema.optional().catch(ctx => {
    log.warn('Ignoring invalid config value', { key, input: ctx.input, issues: ctx.error.issues });
    return undefined;
  });
}

export const transformSchema: z.ZodType<Transform, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('regex'), pattern: z.string(), replacement: z.string().optional() }),
  z.object({ type: z.literal('strip_chars'), chars: z.string().optional() }),
  z.object({ type: z.literal('convert_to_number') }),
]);

export const fieldSpecSchema: z.ZodType<FieldSpec, z.ZodTypeDef, unknown> = z.object({
  css_selectors: z.array(z.string()).default([]),
  xpath: z.array(z.string()).default([]),
  text_patterns: z.array(z.string()).default([]),
  attributes: z.array(z.object({ selector: z.string(), attribute: z.string() })).default([]),
  transform: lenient('transform', transformSchema),
});

const browserSettingsSchema = z.object({
  headless: z.boolean(),
  save_screenshots: z.boolean(),
  sleep_after_load: z.number().nonnegative(),
  wait_seconds: z.number().nonnegative(),
  page_load_timeout: z.number().positive(),
  browser: z.enum(['chromium', 'firefox', 'webkit']),
}).partial();

const apiEndpointSchema = z.object({
  url: z.string().url(),
  method: z.string(),
  headers: z.record(z.string()),
  params: z.record(z.unknown()),
  body: z.unknown(),
}).partial();

export const runtimeConfigFileSchema: z.ZodType<RuntimeConfigFile, z.ZodTypeDef, unknown> = z.object({
  success_threshold: lenient('success_threshold', z.number().min(0).max(1)),
  politeness_delay_seconds: lenient('politeness_delay_seconds', z.number().nonnegative()),
  selenium: lenient('selenium', browserSettingsSchema),
  debug: lenient('debug', z.object({ save_html: z.boolean() }).partial()),
  api_endpoint: lenient('api_endpoint', apiEndpointSchema),
  wait_css_selectors: lenient('wait_css_selectors', z.array(z.string())),
  field_weights: lenient('field_weights', z.record(z.number().nonnegative())),
  output_dir: lenient('output_dir', z.string().min(1)),
});

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema = z.record(jsonValueSchema);
