/**
 * Template registry type definitions.
 */

/** Languages that ship with a built-in template. Order is the listing order. */
export const BUILTIN_LANGUAGES = ['rust', 'go'] as const;

export type BuiltinLanguage = (typeof BUILTIN_LANGUAGES)[number];

/**
 * A requested template identifier: either one of the closed built-in
 * languages or an arbitrary user-defined name.
 */
export type TemplateId =
  | { kind: 'builtin'; language: BuiltinLanguage }
  | { kind: 'custom'; name: string };

/**
 * The semantic category a placeholder resolves to.
 * Resolved when a project is created, never at registration.
 */
export type ValueKind =
  | { kind: 'project_name' }
  | { kind: 'project_path' }
  | { kind: 'author_name' }
  | { kind: 'author_email' }
  | { kind: 'current_date' }
  | { kind: 'custom'; name: string };

/** Value kinds that need no name. */
export type SimpleValueKind = Exclude<ValueKind, { kind: 'custom' }>['kind'];

/** A literal token and the value it is replaced with. */
export interface Replacement {
  placeholder: string;
  value: ValueKind;
}

/**
 * A file, relative to the project root, that receives substitution.
 */
export interface FileCustomization {
  relativePath: string;
  replacements: Replacement[];
}

/**
 * Template definition as declared (built-in table or config file).
 */
export interface TemplateDefinition {
  identifier: string;
  displayName: string;
  description: string;
  sourceLocation: string;
  customizations: FileCustomization[];
  /** Defaults for `custom` value kinds */
  variables: Record<string, string>;
}

/**
 * A registered template.
 */
export interface Template extends TemplateDefinition {
  origin: 'builtin' | 'custom';
  /** True when a custom template replaced the built-in with the same identifier */
  overridesBuiltin: boolean;
}

/**
 * Render a value kind for messages and listings.
 */
export function describeValueKind(value: ValueKind): string {
  return value.kind === 'custom' ? `custom(${value.name})` : value.kind;
}
