/**
 * SubstitutionEngine - replaces declared placeholder tokens in a
 * materialized project.
 *
 * Replacement is literal, case-sensitive and covers every occurrence.
 * Customizations for the same file run in declaration order, each seeing
 * the output of the previous one. Every file is computed before any is
 * written, so a failure leaves the tree as it was. Declared files are
 * never symlinks and resolve inside the project directory.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SubstitutionError, ErrorCodes } from '../../utils/errors.js';
import { isContainedRelativePath, pathExists, readFileBuffer } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { describeValueKind, type Replacement, type Template } from '../registry/types.js';
import { lookupValue } from './values.js';
import type { ResolvedValues, SubstitutionReport } from './types.js';

const log = logger.child('substitute');

interface PendingWrite {
  absolutePath: string;
  content: string;
}

export class SubstitutionEngine {
  /**
   * Apply a template's customizations under `targetDirectory`.
   *
   * @throws SubstitutionError (UNDEFINED_VARIABLE) when a declared kind has no value
   * @throws SubstitutionError (NON_TEXT_TARGET) when a declared file is not UTF-8 text
   * @throws SubstitutionError (PATH_OUTSIDE_PROJECT) when a declared file resolves
   *   outside `targetDirectory`
   */
  async substitute(
    targetDirectory: string,
    template: Template,
    values: ResolvedValues
  ): Promise<SubstitutionReport> {
    const report: SubstitutionReport = { modified: [], unchanged: [], skipped: [] };
    const writes: PendingWrite[] = [];
    const root = await fs.promises.realpath(targetDirectory);

    for (const [relativePath, replacements] of groupByPath(template)) {
      if (!(await pathExists(path.join(root, relativePath)))) {
        log.debug(`Skipping ${relativePath}: not present in template ${template.identifier}`);
        report.skipped.push(relativePath);
        continue;
      }

      const absolutePath = await resolveInside(root, relativePath, template.identifier);
      const original = await readText(absolutePath, relativePath, template.identifier);
      let content = original;
      let count = 0;

      for (const replacement of replacements) {
        const value = lookupValue(values, replacement.value);
        if (value === undefined) {
          throw new SubstitutionError(
            ErrorCodes.UNDEFINED_VARIABLE,
            `No value for ${describeValueKind(replacement.value)} ` +
              `(placeholder '${replacement.placeholder}' in ${relativePath})`,
            {
              identifier: template.identifier,
              path: relativePath,
              placeholder: replacement.placeholder,
              valueKind: describeValueKind(replacement.value),
            }
          );
        }

        const parts = content.split(replacement.placeholder);
        count += parts.length - 1;
        content = parts.join(value);
      }

      if (content === original) {
        report.unchanged.push(relativePath);
      } else {
        writes.push({ absolutePath, content });
        report.modified.push({ path: relativePath, replacements: count });
      }
    }

    for (const write of writes) {
      await fs.promises.writeFile(write.absolutePath, write.content, 'utf-8');
    }

    log.debug(`Customized ${report.modified.length} file(s)`, {
      unchanged: report.unchanged,
      skipped: report.skipped,
    });
    return report;
  }
}

/**
 * Group replacements by target file, preserving first-appearance order of
 * files and declaration order of replacements.
 */
function groupByPath(template: Template): Map<string, Replacement[]> {
  const groups = new Map<string, Replacement[]>();
  for (const customization of template.customizations) {
    const key = path.normalize(customization.relativePath);
    const existing = groups.get(key);
    if (existing) {
      existing.push(...customization.replacements);
    } else {
      groups.set(key, [...customization.replacements]);
    }
  }
  return groups;
}

/**
 * Real path of a declared file, rejecting symlinked files and paths that a
 * symlinked directory leads out of `root`.
 */
async function resolveInside(root: string, relativePath: string, identifier: string): Promise<string> {
  const linked = path.join(root, relativePath);
  if ((await fs.promises.lstat(linked)).isSymbolicLink()) {
    throw new SubstitutionError(
      ErrorCodes.NON_TEXT_TARGET,
      `Cannot customize ${relativePath}: file is a symbolic link`,
      { identifier, path: relativePath }
    );
  }

  const real = await fs.promises.realpath(linked);
  if (!isContainedRelativePath(path.relative(root, real))) {
    throw new SubstitutionError(
      ErrorCodes.PATH_OUTSIDE_PROJECT,
      `Cannot customize ${relativePath}: it resolves outside the project (${real})`,
      { identifier, path: relativePath, resolvedPath: real }
    );
  }
  return real;
}

async function readText(absolutePath: string, relativePath: string, identifier: string): Promise<string> {
  const nonText = (reason: string) =>
    new SubstitutionError(
      ErrorCodes.NON_TEXT_TARGET,
      `Cannot customize ${relativePath}: ${reason}`,
      { identifier, path: relativePath }
    );

  const stat = await fs.promises.lstat(absolutePath);
  if (!stat.isFile()) {
    throw nonText('not a regular file');
  }

  const buffer = await readFileBuffer(absolutePath);
  if (buffer.includes(0)) {
    throw nonText('file is binary');
  }

  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
  } catch { /* invalid byte sequence */
    throw nonText('file is not valid UTF-8 text');
  }
}
