/**
 * Zod schemas for template definitions declared in the config file.
 */
import { z } from 'zod';
import type { TemplateDefinition, ValueKind } from './types.js';

/** Value kinds written as a bare name. */
export const SimpleValueKindSchema = z.enum([
  'project_name',
  'project_path',
  'author_name',
  'author_email',
  'current_date',
]);

/**
 * A value kind: `project_name`, ... or `{ custom: <name> }`.
 */
export const ValueKindSchema = z.union([
  SimpleValueKindSchema.transform((kind): ValueKind => ({ kind })),
  z
    .object({ custom: z.string().min(1) })
    .transform(({ custom }): ValueKind => ({ kind: 'custom', name: custom })),
]);

export const ReplacementSchema = z.object({
  placeholder: z.string(),
  value: ValueKindSchema,
});

export const FileCustomizationSchema = z.object({
  path: z.string(),
  replacements: z.array(ReplacementSchema).default([]),
});

/**
 * A custom template entry as written in YAML.
 * Semantic checks (paths, duplicate placeholders) happen at registration.
 */
export const TemplateDefinitionSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    description: z.string().default(''),
    repository: z.string(),
    variables: z.record(z.string(), z.string()).default({}),
    files_to_customize: z.array(FileCustomizationSchema).default([]),
  })
  .transform(
    (raw): TemplateDefinition => ({
      identifier: raw.id,
      displayName: raw.name ?? raw.id,
      description: raw.description,
      sourceLocation: raw.repository,
      variables: raw.variables,
      customizations: raw.files_to_customize.map((file) => ({
        relativePath: file.path,
        replacements: file.replacements.map((r) => ({
          placeholder: r.placeholder,
          value: r.value,
        })),
      })),
    })
  );

export type TemplateDefinitionInput = z.input<typeof TemplateDefinitionSchema>;
