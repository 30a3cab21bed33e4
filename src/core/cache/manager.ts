/**
 * TemplateCache - local working copies of template repositories.
 * Cache location: <cacheRoot>/<identifier>/
 *
 * Entries are never edited in place: fetches and refreshes are written to a
 * temporary sibling and renamed into position, so a concurrent invocation
 * sees either the old entry or the new one.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { CacheError, ErrorCodes, SeedlingError, describeError } from '../../utils/errors.js';
import { ensureDir, isDirEmpty, isDirectory, pathExists, removePath } from '../../utils/file-system.js';
import { hasGitMetadata } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';
import type { Template } from '../registry/types.js';
import type { RepositoryFetcher } from '../fetcher/types.js';
import { KeyedLock } from './lock.js';
import type { CacheEntry, TemplateCacheOptions } from './types.js';

const log = logger.child('cache');

const DAY_MS = 24 * 60 * 60 * 1000;

/** rename() failures that mean another process already populated the entry. */
const LOST_RACE_CODES = new Set(['ENOTEMPTY', 'EEXIST', 'EISDIR']);

export class TemplateCache {
  readonly cacheRoot: string;
  private readonly fetcher: RepositoryFetcher;
  private readonly autoUpdate: boolean;
  private readonly updateIntervalMs: number;
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();

  constructor(options: TemplateCacheOptions) {
    this.cacheRoot = options.cacheRoot;
    this.fetcher = options.fetcher;
    this.autoUpdate = options.autoUpdate ?? false;
    this.updateIntervalMs = (options.updateIntervalDays ?? 7) * DAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Path of the working copy for a template, whether or not it exists.
   */
  entryPath(template: Template): string {
    return path.join(this.cacheRoot, template.identifier);
  }

  /**
   * The cache entry for a template, or null when absent or empty.
   */
  async entry(template: Template): Promise<CacheEntry | null> {
    const entryPath = this.entryPath(template);
    if (!(await isDirectory(entryPath)) || (await isDirEmpty(entryPath))) {
      return null;
    }
    const stat = await fs.promises.stat(entryPath);
    return { identifier: template.identifier, path: entryPath, lastFetchedAt: stat.mtime };
  }

  /**
   * Return the local working copy, cloning it first if absent.
   * An existing entry is returned without network access unless
   * auto-update is on and the entry is stale.
   *
   * @throws CacheError (CACHE_CORRUPT) when the entry is not a repository
   * @throws FetchError when the clone fails
   */
  async getOrFetch(template: Template): Promise<string> {
    return this.lock.run(template.identifier, async () => {
      const existing = await this.entry(template);

      if (!existing) {
        log.info(`Template '${template.identifier}' not cached, fetching ${template.sourceLocation}`);
        return this.fetchFresh(template);
      }

      await this.assertRepository(existing);

      if (this.isStale(existing)) {
        log.info(`Cached template '${template.identifier}' is stale, refreshing`);
        try {
          await this.refresh(template);
        } catch (error) {
          log.warn(`Could not refresh '${template.identifier}', using cached copy: ${describeError(error)}`);
        }
      } else {
        log.debug(`Using cached template at ${existing.path}`);
      }

      return existing.path;
    });
  }

  /**
   * Refresh an entry from its remote. A failed refresh leaves the previous
   * copy intact; a missing or corrupt entry is cloned fresh.
   */
  async update(template: Template): Promise<string> {
    return this.lock.run(template.identifier, () => this.refresh(template));
  }

  /**
   * Remove an entry. Returns false when there was nothing to remove.
   */
  async invalidate(template: Template): Promise<boolean> {
    return this.lock.run(template.identifier, async () => {
      const entryPath = this.entryPath(template);
      if (!(await pathExists(entryPath))) {
        return false;
      }
      const doomed = this.tempPath(template.identifier, 'old');
      await this.io(template, () => fs.promises.rename(entryPath, doomed));
      await removePath(doomed);
      log.debug(`Removed cached template '${template.identifier}'`);
      return true;
    });
  }

  private isStale(entry: CacheEntry): boolean {
    if (!this.autoUpdate) return false;
    return this.now().getTime() - entry.lastFetchedAt.getTime() > this.updateIntervalMs;
  }

  private async assertRepository(entry: CacheEntry): Promise<void> {
    if (!(await hasGitMetadata(entry.path))) {
      throw new CacheError(
        ErrorCodes.CACHE_CORRUPT,
        `Cached template '${entry.identifier}' at ${entry.path} is not a git repository. ` +
          `Run 'seedling clean ${entry.identifier}' or 'seedling update ${entry.identifier}'.`,
        { identifier: entry.identifier, path: entry.path }
      );
    }
  }

  private async fetchFresh(template: Template): Promise<string> {
    const entryPath = this.entryPath(template);
    const staging = await this.stage(template, (tempPath) =>
      this.fetcher.clone(template.sourceLocation, tempPath)
    );

    // An empty directory at the entry path counts as absent
    if (await isDirectory(entryPath)) {
      try {
        await fs.promises.rmdir(entryPath);
      } catch (error) {
        if (!isLostRace(error)) {
          await removePath(staging);
          throw this.ioError(template, error);
        }
      }
    }

    try {
      await fs.promises.rename(staging, entryPath);
    } catch (error) {
      await removePath(staging);
      if (isLostRace(error)) {
        log.debug(`Another process populated '${template.identifier}' first, using its copy`);
        return entryPath;
      }
      throw this.ioError(template, error);
    }

    await this.touch(entryPath);
    log.info(`Fetched template '${template.identifier}'`);
    return entryPath;
  }

  private async refresh(template: Template): Promise<string> {
    const entryPath = this.entryPath(template);
    const existing = await this.entry(template);
    const canPull = existing !== null && (await hasGitMetadata(existing.path));

    const staging = await this.stage(template, async (tempPath) => {
      if (canPull) {
        await this.io(template, () =>
          fs.promises.cp(entryPath, tempPath, { recursive: true, verbatimSymlinks: true })
        );
        await this.fetcher.pull(tempPath);
      } else {
        await this.fetcher.clone(template.sourceLocation, tempPath);
      }
    });

    await this.swap(template, staging, entryPath);
    await this.touch(entryPath);
    log.info(`Updated template '${template.identifier}'`);
    return entryPath;
  }

  /**
   * Run `work` against a fresh temporary path; remove it if work fails.
   */
  private async stage(template: Template, work: (tempPath: string) => Promise<void>): Promise<string> {
    await this.io(template, () => ensureDir(this.cacheRoot));
    const tempPath = this.tempPath(template.identifier, 'tmp');
    try {
      await work(tempPath);
    } catch (error) {
      await removePath(tempPath);
      throw error;
    }
    return tempPath;
  }

  /**
   * Replace `entryPath` with `staging`. The old entry is restored if the
   * second rename fails.
   */
  private async swap(template: Template, staging: string, entryPath: string): Promise<void> {
    if (!(await pathExists(entryPath))) {
      try {
        await fs.promises.rename(staging, entryPath);
      } catch (error) {
        await removePath(staging);
        throw this.ioError(template, error);
      }
      return;
    }

    const backup = this.tempPath(template.identifier, 'old');
    await this.io(template, () => fs.promises.rename(entryPath, backup));
    try {
      await fs.promises.rename(staging, entryPath);
    } catch (error) {
      await fs.promises.rename(backup, entryPath);
      await removePath(staging);
      throw this.ioError(template, error);
    }
    await removePath(backup);
  }

  private async touch(entryPath: string): Promise<void> {
    const now = this.now();
    await fs.promises.utimes(entryPath, now, now);
  }

  private tempPath(identifier: string, suffix: 'tmp' | 'old'): string {
    return path.join(this.cacheRoot, `.${identifier}.${suffix}-${randomBytes(4).toString('hex')}`);
  }

  private async io<T>(template: Template, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.ioError(template, error);
    }
  }

  private ioError(template: Template, error: unknown): SeedlingError {
    if (error instanceof SeedlingError) return error;
    return new CacheError(
      ErrorCodes.CACHE_IO,
      `Cache operation failed for '${template.identifier}': ${describeError(error)}`,
      { identifier: template.identifier, cacheRoot: this.cacheRoot, cause: describeError(error) }
    );
  }
}

function isLostRace(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && LOST_RACE_CODES.has(error.code);
}
