/**
 * Substitution exports barrel file.
 */
export { SubstitutionEngine } from './engine.js';
export { resolveValues, lookupValue, formatDate, type ValueResolutionInput } from './values.js';
export type { ResolvedValues, SubstitutionReport, SubstitutedFile } from './types.js';
