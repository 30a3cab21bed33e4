/**
 * Project pipeline type definitions.
 */
import type { SubstitutionReport } from '../substitution/types.js';

/** Author identity resolved by the caller (config defaults or git config). */
export interface AuthorIdentity {
  name: string | null;
  email: string | null;
}

/**
 * Options for creating a project.
 */
export interface CreateProjectOptions {
  /** Replace an existing target directory (the caller obtained confirmation) */
  forceOverwrite?: boolean;
  /** Values for `custom` placeholders; override config and template defaults */
  extraValues?: Record<string, string>;
  author?: AuthorIdentity;
  /** Overrides the configured initial-commit setting */
  initialCommit?: boolean;
}

/**
 * Result of a successful createProject.
 */
export interface CreationReport {
  identifier: string;
  projectName: string;
  targetDirectory: string;
  /** Cached template the project was copied from */
  templatePath: string;
  /** True when the template is a custom one replacing a built-in */
  overridesBuiltin: boolean;
  substitution: SubstitutionReport;
  initialCommit: boolean;
}

/** Outcome of refreshing one cached template. */
export type RefreshResult =
  | { identifier: string; ok: true; path: string }
  | { identifier: string; ok: false; error: Error };

/**
 * Settings taken from config for every project.
 */
export interface ProjectDefaults {
  variables: Record<string, string>;
  initialCommit: boolean;
}
