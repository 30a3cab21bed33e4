/**
 * ProjectService - the create-project pipeline and cache maintenance.
 *
 * Stage order is fixed: resolve → fetch/cache → materialize → substitute →
 * reset history → promote. The first three content stages run in a staging
 * directory beside the target; only a finished project is moved into place,
 * so the target is either absent, untouched, or complete.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { MaterializeError, ErrorCodes, describeError } from '../../utils/errors.js';
import { ensureDir, isWritable, pathExists, removePath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { TemplateRegistry } from '../registry/registry.js';
import type { Template } from '../registry/types.js';
import type { TemplateCache } from '../cache/manager.js';
import type { CacheEntry } from '../cache/types.js';
import { ProjectMaterializer } from '../materialize/materializer.js';
import { SubstitutionEngine } from '../substitution/engine.js';
import { resolveValues } from '../substitution/values.js';
import { RepositoryReinitializer } from '../history/reinitializer.js';
import type {
  CreateProjectOptions,
  CreationReport,
  ProjectDefaults,
  RefreshResult,
} from './types.js';

const log = logger.child('project');

export interface ProjectServiceDeps {
  registry: TemplateRegistry;
  cache: TemplateCache;
  materializer?: ProjectMaterializer;
  substitution?: SubstitutionEngine;
  reinitializer?: RepositoryReinitializer;
  defaults?: Partial<ProjectDefaults>;
  /** Invocation clock, for the current_date value */
  now?: () => Date;
}

/**
 * Check a project name before it becomes a directory name.
 *
 * @throws MaterializeError (INVALID_PROJECT_NAME)
 */
export function validateProjectName(projectName: string): void {
  const problem =
    projectName.trim().length === 0
      ? 'must not be empty'
      : projectName === '.' || projectName === '..'
        ? 'must not be "." or ".."'
        : /[\\/]/.test(projectName)
          ? 'must not contain path separators'
          : projectName.includes('\0')
            ? 'must not contain NUL characters'
            : null;

  if (problem) {
    throw new MaterializeError(
      ErrorCodes.INVALID_PROJECT_NAME,
      `Invalid project name '${projectName}': ${problem}`,
      { projectName }
    );
  }
}

export class ProjectService {
  private readonly registry: TemplateRegistry;
  private readonly cache: TemplateCache;
  private readonly materializer: ProjectMaterializer;
  private readonly substitution: SubstitutionEngine;
  private readonly reinitializer: RepositoryReinitializer;
  private readonly defaults: ProjectDefaults;
  private readonly now: () => Date;

  constructor(deps: ProjectServiceDeps) {
    this.registry = deps.registry;
    this.cache = deps.cache;
    this.materializer = deps.materializer ?? new ProjectMaterializer();
    this.substitution = deps.substitution ?? new SubstitutionEngine();
    this.reinitializer = deps.reinitializer ?? new RepositoryReinitializer();
    this.defaults = {
      variables: deps.defaults?.variables ?? {},
      initialCommit: deps.defaults?.initialCommit ?? false,
    };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Create `<targetParentDirectory>/<projectName>` from a template.
   *
   * @throws RegistryError, FetchError, CacheError, MaterializeError,
   *   SubstitutionError or VcsError from the failing stage
   */
  async createProject(
    identifier: string,
    projectName: string,
    targetParentDirectory: string,
    options: CreateProjectOptions = {}
  ): Promise<CreationReport> {
    const template = this.registry.resolve(identifier);
    validateProjectName(projectName);

    const parent = path.resolve(targetParentDirectory);
    const targetDirectory = path.join(parent, projectName);
    const force = options.forceOverwrite ?? false;

    if (!force && (await pathExists(targetDirectory))) {
      throw new MaterializeError(
        ErrorCodes.TARGET_EXISTS,
        `Target directory already exists: ${targetDirectory}`,
        { identifier: template.identifier, path: targetDirectory }
      );
    }
    await this.assertWritableParent(parent);

    log.info(`Creating ${template.identifier} project '${projectName}' in ${parent}`);
    const templatePath = await this.cache.getOrFetch(template);

    const values = resolveValues({
      projectName,
      projectPath: targetDirectory,
      authorName: options.author?.name,
      authorEmail: options.author?.email,
      date: this.now(),
      templateVariables: template.variables,
      configVariables: this.defaults.variables,
      extraValues: options.extraValues,
    });

    const staging = path.join(parent, `.${projectName}.seedling-${randomBytes(4).toString('hex')}`);
    try {
      log.debug('Copying template files...');
      await this.materializer.materialize(templatePath, staging);

      log.debug('Customizing project files...');
      const substitution = await this.substitution.substitute(staging, template, values);

      log.debug('Initializing git repository...');
      const history = await this.reinitializer.resetHistory(staging, {
        initialCommit: options.initialCommit ?? this.defaults.initialCommit,
        author: options.author,
      });

      await this.promote(staging, targetDirectory, force);

      return {
        identifier: template.identifier,
        projectName,
        targetDirectory,
        templatePath,
        overridesBuiltin: template.overridesBuiltin,
        substitution,
        initialCommit: history.committed,
      };
    } catch (error) {
      await removePath(staging);
      throw error;
    }
  }

  /**
   * All registered templates, in listing order.
   */
  listTemplates(): Template[] {
    return this.registry.list();
  }

  /**
   * Cache entry for a template identifier, or null when not cached.
   */
  async cacheEntry(identifier: string): Promise<CacheEntry | null> {
    return this.cache.entry(this.registry.resolve(identifier));
  }

  /**
   * Fetch the latest remote state of one template into the cache.
   */
  async refreshTemplate(identifier: string): Promise<string> {
    return this.cache.update(this.registry.resolve(identifier));
  }

  /**
   * Refresh every template that currently has a cache entry.
   * Different identifiers are refreshed concurrently; one failure does not
   * stop the others.
   */
  async refreshAllCached(): Promise<RefreshResult[]> {
    const cached: Template[] = [];
    for (const template of this.registry.list()) {
      if (await this.cache.entry(template)) {
        cached.push(template);
      }
    }

    return Promise.all(
      cached.map(async (template): Promise<RefreshResult> => {
        try {
          const entryPath = await this.cache.update(template);
          return { identifier: template.identifier, ok: true, path: entryPath };
        } catch (error) {
          return {
            identifier: template.identifier,
            ok: false,
            error: error instanceof Error ? error : new Error(String(error)),
          };
        }
      })
    );
  }

  /**
   * Drop a template's cache entry. Returns false when it was not cached.
   */
  async invalidateTemplate(identifier: string): Promise<boolean> {
    return this.cache.invalidate(this.registry.resolve(identifier));
  }

  private async assertWritableParent(parent: string): Promise<void> {
    try {
      await ensureDir(parent);
    } catch (error) {
      throw new MaterializeError(
        ErrorCodes.TARGET_NOT_WRITABLE,
        `Cannot create parent directory ${parent}: ${describeError(error)}`,
        { path: parent, cause: describeError(error) }
      );
    }
    if (!(await isWritable(parent))) {
      throw new MaterializeError(
        ErrorCodes.TARGET_NOT_WRITABLE,
        `Parent directory is not writable: ${parent}`,
        { path: parent }
      );
    }
  }

  /**
   * Move the finished project into place. An existing target (force) is
   * moved aside first and restored if the move fails. If it cannot be
   * restored either, the error names where it was left.
   */
  private async promote(staging: string, targetDirectory: string, force: boolean): Promise<void> {
    const fail = (error: unknown) =>
      new MaterializeError(
        ErrorCodes.COPY_FAILED,
        `Failed to move project into ${targetDirectory}: ${describeError(error)}`,
        { path: targetDirectory, cause: describeError(error) }
      );

    if (!(await pathExists(targetDirectory))) {
      try {
        await fs.promises.rename(staging, targetDirectory);
      } catch (error) {
        throw fail(error);
      }
      return;
    }

    if (!force) {
      throw new MaterializeError(
        ErrorCodes.TARGET_EXISTS,
        `Target directory already exists: ${targetDirectory}`,
        { path: targetDirectory }
      );
    }

    const backup = `${staging}-previous`;
    try {
      await fs.promises.rename(targetDirectory, backup);
    } catch (error) {
      throw fail(error);
    }
    try {
      await fs.promises.rename(staging, targetDirectory);
    } catch (error) {
      try {
        await fs.promises.rename(backup, targetDirectory);
      } catch (restoreError) {
        throw new MaterializeError(
          ErrorCodes.COPY_FAILED,
          `Failed to move project into ${targetDirectory}: ${describeError(error)}. ` +
            `The previous contents could not be restored and are at ${backup}`,
          {
            path: targetDirectory,
            backupPath: backup,
            cause: describeError(error),
            restoreCause: describeError(restoreError),
          }
        );
      }
      throw fail(error);
    }
    await removePath(backup);
  }
}
