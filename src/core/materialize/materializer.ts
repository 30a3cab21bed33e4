/**
 * ProjectMaterializer - copies a cached template tree into a new project
 * directory.
 *
 * Version-control metadata is excluded from enumeration, so it is never
 * written to the target, not even transiently.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { MaterializeError, ErrorCodes, SeedlingError, describeError } from '../../utils/errors.js';
import { ensureDir, isDirectory, pathExists, removePath, walkTree } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('materialize');

/** Metadata directories of the supported version-control systems. */
export const VCS_METADATA_DIRS = ['.git', '.hg', '.svn'] as const;

const VCS_IGNORE = VCS_METADATA_DIRS.flatMap((dir) => [`**/${dir}`, `**/${dir}/**`]);

export type CopyFileFn = (source: string, destination: string) => Promise<void>;

export interface MaterializerOptions {
  /** File copy primitive; defaults to fs.promises.copyFile */
  copyFile?: CopyFileFn;
}

export interface MaterializeOptions {
  /** Replace an existing target directory */
  force?: boolean;
}

/**
 * Summary of a completed copy.
 */
export interface MaterializeResult {
  targetDirectory: string;
  files: number;
  directories: number;
  symlinks: number;
}

export class ProjectMaterializer {
  private readonly copyFile: CopyFileFn;

  constructor(options: MaterializerOptions = {}) {
    this.copyFile = options.copyFile ?? ((source, destination) => fs.promises.copyFile(source, destination));
  }

  /**
   * Copy `sourceDirectory` into `targetDirectory`.
   *
   * @throws MaterializeError (TARGET_EXISTS) when the target exists and force is unset;
   *   the existing target is left untouched
   * @throws MaterializeError (COPY_FAILED) on any I/O error; the partial target is removed
   */
  async materialize(
    sourceDirectory: string,
    targetDirectory: string,
    options: MaterializeOptions = {}
  ): Promise<MaterializeResult> {
    if (!(await isDirectory(sourceDirectory))) {
      throw new MaterializeError(
        ErrorCodes.COPY_FAILED,
        `Template source is not a directory: ${sourceDirectory}`,
        { source: sourceDirectory, path: targetDirectory }
      );
    }

    if (await pathExists(targetDirectory)) {
      if (!options.force) {
        throw new MaterializeError(
          ErrorCodes.TARGET_EXISTS,
          `Target directory already exists: ${targetDirectory}`,
          { path: targetDirectory }
        );
      }
      log.debug(`Removing existing target ${targetDirectory}`);
      await removePath(targetDirectory);
    }

    try {
      const result = await this.copyTree(sourceDirectory, targetDirectory);
      log.debug(`Copied ${result.files} files into ${targetDirectory}`);
      return result;
    } catch (error) {
      await removePath(targetDirectory);
      if (error instanceof SeedlingError) throw error;
      throw new MaterializeError(
        ErrorCodes.COPY_FAILED,
        `Failed to copy template into ${targetDirectory}: ${describeError(error)}`,
        { source: sourceDirectory, path: targetDirectory, cause: describeError(error) }
      );
    }
  }

  private async copyTree(sourceDirectory: string, targetDirectory: string): Promise<MaterializeResult> {
    const entries = await walkTree(sourceDirectory, VCS_IGNORE);
    const result: MaterializeResult = { targetDirectory, files: 0, directories: 0, symlinks: 0 };

    await ensureDir(targetDirectory);

    for (const entry of entries) {
      const source = path.join(sourceDirectory, entry.relativePath);
      const destination = path.join(targetDirectory, entry.relativePath);

      switch (entry.type) {
        case 'directory':
          await ensureDir(destination);
          result.directories++;
          break;
        case 'symlink':
          await ensureDir(path.dirname(destination));
          await fs.promises.symlink(await fs.promises.readlink(source), destination);
          result.symlinks++;
          break;
        case 'file': {
          await ensureDir(path.dirname(destination));
          await this.copyFile(source, destination);
          const { mode } = await fs.promises.stat(source);
          await fs.promises.chmod(destination, mode & 0o7777);
          result.files++;
          break;
        }
      }
    }

    return result;
  }
}
