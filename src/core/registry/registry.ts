/**
 * TemplateRegistry - the merged set of built-in and custom templates
 * for one invocation.
 *
 * Precedence: a custom template whose identifier equals a built-in one
 * replaces it entirely (no field merge). The replacement is recorded and
 * flagged on the template so listings and reports can show it.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { isContainedRelativePath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { BUILTIN_TEMPLATES } from './builtins.js';
import {
  BUILTIN_LANGUAGES,
  type BuiltinLanguage,
  type Template,
  type TemplateDefinition,
  type TemplateId,
} from './types.js';

const log = logger.child('registry');

/** Identifiers name cache directories, so they stay filesystem-safe. */
const IDENTIFIER_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

const BUILTIN_ALIASES = new Map<string, BuiltinLanguage>([
  ['rust', 'rust'],
  ['rs', 'rust'],
  ['go', 'go'],
  ['golang', 'go'],
]);

/**
 * Parse a requested identifier into the built-in/custom variant.
 * Built-in names are matched case-insensitively and through aliases.
 */
export function parseTemplateId(value: string): TemplateId {
  const trimmed = value.trim();
  const language = BUILTIN_ALIASES.get(trimmed.toLowerCase());
  if (language) {
    return { kind: 'builtin', language };
  }
  return { kind: 'custom', name: trimmed };
}

/**
 * The registry key for a parsed identifier.
 */
export function formatTemplateId(id: TemplateId): string {
  return id.kind === 'builtin' ? id.language : id.name;
}

function invalid(identifier: string, message: string, details: Record<string, unknown> = {}): RegistryError {
  return new RegistryError(
    ErrorCodes.INVALID_TEMPLATE,
    `Invalid template '${identifier}': ${message}`,
    { identifier, ...details }
  );
}

/**
 * Check a template definition before it is registered.
 *
 * @throws RegistryError (INVALID_TEMPLATE) on the first problem found
 */
export function validateTemplateDefinition(definition: TemplateDefinition): void {
  const { identifier } = definition;

  if (!IDENTIFIER_PATTERN.test(identifier)) {
    throw invalid(identifier, 'identifier must be lowercase letters, digits, ".", "_" or "-"');
  }

  if (definition.sourceLocation.trim().length === 0) {
    throw invalid(identifier, 'source location must not be empty');
  }

  for (const customization of definition.customizations) {
    const { relativePath } = customization;
    if (!isContainedRelativePath(relativePath)) {
      throw invalid(identifier, `customization path '${relativePath}' escapes the project root`, {
        path: relativePath,
      });
    }

    const seen = new Set<string>();
    for (const replacement of customization.replacements) {
      if (replacement.placeholder.length === 0) {
        throw invalid(identifier, `empty placeholder in '${relativePath}'`, { path: relativePath });
      }
      if (seen.has(replacement.placeholder)) {
        throw invalid(
          identifier,
          `placeholder '${replacement.placeholder}' declared twice for '${relativePath}'`,
          { path: relativePath, placeholder: replacement.placeholder }
        );
      }
      seen.add(replacement.placeholder);

      if (replacement.value.kind === 'custom' && replacement.value.name.trim().length === 0) {
        throw invalid(identifier, `custom value without a name in '${relativePath}'`, {
          path: relativePath,
        });
      }
    }
  }
}

/**
 * Merged template set. Rebuilt from config on every invocation.
 */
export class TemplateRegistry {
  private readonly templates = new Map<string, Template>();
  private readonly order: string[] = [];
  private readonly overridden: string[] = [];

  private constructor() {}

  /**
   * Merge the built-in templates with custom definitions.
   *
   * @throws RegistryError when a definition is invalid or declared twice
   */
  static build(customTemplates: TemplateDefinition[] = []): TemplateRegistry {
    const registry = new TemplateRegistry();

    for (const language of BUILTIN_LANGUAGES) {
      const definition = BUILTIN_TEMPLATES[language];
      validateTemplateDefinition(definition);
      registry.add({ ...definition, origin: 'builtin', overridesBuiltin: false });
    }

    const customIds = new Set<string>();
    for (const definition of customTemplates) {
      validateTemplateDefinition(definition);

      if (customIds.has(definition.identifier)) {
        throw new RegistryError(
          ErrorCodes.DUPLICATE_TEMPLATE,
          `Template '${definition.identifier}' is defined more than once in the config`,
          { identifier: definition.identifier }
        );
      }
      customIds.add(definition.identifier);

      const replacesBuiltin = registry.templates.has(definition.identifier);
      if (replacesBuiltin) {
        registry.overridden.push(definition.identifier);
        log.warn(`Custom template '${definition.identifier}' overrides the built-in template`);
      }
      registry.add({ ...definition, origin: 'custom', overridesBuiltin: replacesBuiltin });
    }

    return registry;
  }

  private add(template: Template): void {
    if (!this.templates.has(template.identifier)) {
      this.order.push(template.identifier);
    }
    this.templates.set(template.identifier, template);
  }

  /**
   * Look up a template, or null when unknown.
   * Exact identifiers win over built-in aliases.
   */
  find(identifier: string): Template | null {
    const exact = this.templates.get(identifier.trim());
    if (exact) return exact;
    return this.templates.get(formatTemplateId(parseTemplateId(identifier))) ?? null;
  }

  /**
   * Resolve an identifier to its template.
   *
   * @throws RegistryError (TEMPLATE_NOT_FOUND) listing the known identifiers
   */
  resolve(identifier: string): Template {
    const template = this.find(identifier);
    if (!template) {
      throw new RegistryError(
        ErrorCodes.TEMPLATE_NOT_FOUND,
        `Template '${identifier}' not found. Available: ${this.order.join(', ')}`,
        { identifier, available: [...this.order] }
      );
    }
    return template;
  }

  /**
   * All templates: built-ins in fixed order (an overriding custom template
   * keeps the built-in's slot), then custom templates in config order.
   */
  list(): Template[] {
    return this.order.map((id) => this.templates.get(id)).filter((t): t is Template => t !== undefined);
  }

  /**
   * Identifiers of built-ins replaced by custom templates.
   */
  overrides(): string[] {
    return [...this.overridden];
  }
}
