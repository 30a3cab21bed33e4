/**
 * Template registry exports barrel file.
 */
export {
  TemplateRegistry,
  parseTemplateId,
  formatTemplateId,
  validateTemplateDefinition,
} from './registry.js';
export { BUILTIN_TEMPLATES } from './builtins.js';
export {
  TemplateDefinitionSchema,
  ValueKindSchema,
  type TemplateDefinitionInput,
} from './schema.js';
export { BUILTIN_LANGUAGES, describeValueKind } from './types.js';
export type {
  BuiltinLanguage,
  TemplateId,
  ValueKind,
  SimpleValueKind,
  Replacement,
  FileCustomization,
  TemplateDefinition,
  Template,
} from './types.js';
