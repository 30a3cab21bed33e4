/**
 * Substitution type definitions.
 */

/**
 * Concrete values for every value kind, computed once per project.
 * Author fields are null when no identity could be resolved.
 */
export interface ResolvedValues {
  projectName: string;
  /** Absolute path of the final project directory */
  projectPath: string;
  authorName: string | null;
  authorEmail: string | null;
  /** YYYY-MM-DD */
  currentDate: string;
  /** Values for `custom` kinds, by name */
  custom: Record<string, string>;
}

/** A file whose content changed. */
export interface SubstitutedFile {
  /** Path relative to the project root */
  path: string;
  /** Placeholder occurrences replaced */
  replacements: number;
}

/**
 * Outcome of substituting one project tree.
 */
export interface SubstitutionReport {
  modified: SubstitutedFile[];
  /** Declared files that exist but whose content did not change */
  unchanged: string[];
  /** Declared files absent from the project */
  skipped: string[];
}
