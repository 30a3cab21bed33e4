/**
 * Resolution of value kinds to concrete strings.
 */
import type { ValueKind } from '../registry/types.js';
import type { ResolvedValues } from './types.js';

export interface ValueResolutionInput {
  projectName: string;
  projectPath: string;
  authorName?: string | null;
  authorEmail?: string | null;
  /** Invocation clock */
  date?: Date;
  /** Lowest precedence: defaults declared by the template */
  templateVariables?: Record<string, string>;
  /** Values from the config file */
  configVariables?: Record<string, string>;
  /** Highest precedence: values supplied for this invocation */
  extraValues?: Record<string, string>;
}

/**
 * Format a date as YYYY-MM-DD in local time.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Build the value map for one project.
 */
export function resolveValues(input: ValueResolutionInput): ResolvedValues {
  return {
    projectName: input.projectName,
    projectPath: input.projectPath,
    authorName: input.authorName ?? null,
    authorEmail: input.authorEmail ?? null,
    currentDate: formatDate(input.date ?? new Date()),
    custom: {
      ...input.templateVariables,
      ...input.configVariables,
      ...input.extraValues,
    },
  };
}

/**
 * The value for a kind, or undefined when none is available.
 */
export function lookupValue(values: ResolvedValues, kind: ValueKind): string | undefined {
  switch (kind.kind) {
    case 'project_name':
      return values.projectName;
    case 'project_path':
      return values.projectPath;
    case 'author_name':
      return values.authorName ?? undefined;
    case 'author_email':
      return values.authorEmail ?? undefined;
    case 'current_date':
      return values.currentDate;
    case 'custom':
      return Object.hasOwn(values.custom, kind.name) ? values.custom[kind.name] : undefined;
  }
}
