/**
 * Config file schema.
 */
import { z } from 'zod';
import { TemplateDefinitionSchema } from '../registry/schema.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Defaults applied to every created project. */
export const DefaultsSchema = z.object({
  author_name: z.string().min(1).optional(),
  author_email: z.string().min(1).optional(),
  /** Parent directory for new projects when none is given */
  directory: z.string().min(1).optional(),
  /** Create a first commit after resetting history */
  initial_commit: z.boolean().default(false),
  /** Values for `custom` placeholders, shared by all templates */
  variables: z.record(z.string(), z.string()).default({}),
});

/** Template source and cache settings. */
export const TemplatesSettingsSchema = z.object({
  /** Cache root override */
  cache_directory: z.string().min(1).optional(),
  /** Refresh cached templates older than update_interval_days when used */
  auto_update: z.boolean().default(false),
  update_interval_days: z.number().int().min(1).default(7),
  /** User-defined templates, merged over the built-ins */
  custom: z.array(TemplateDefinitionSchema).default([]),
});

export const ConfigSchema = z.object({
  defaults: withDefaults(DefaultsSchema),
  templates: withDefaults(TemplatesSettingsSchema),
});

/** A config file; an empty file counts as all defaults. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Defaults = z.infer<typeof DefaultsSchema>;
export type TemplatesSettings = z.infer<typeof TemplatesSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
