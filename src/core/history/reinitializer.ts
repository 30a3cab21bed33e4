/**
 * RepositoryReinitializer - replaces inherited history with a new, empty
 * git repository. Runs last, once the project content is final.
 */
import * as path from 'node:path';
import { VcsError, ErrorCodes, describeError } from '../../utils/errors.js';
import { isDirectory, removePath } from '../../utils/file-system.js';
import { GitCommandError, runGit } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('history');

export const DEFAULT_COMMIT_MESSAGE = 'Initial commit';

export interface ResetHistoryOptions {
  /** Record the project content as a first commit */
  initialCommit?: boolean;
  commitMessage?: string;
  /** Commit identity; git's own configuration is used for missing fields */
  author?: { name: string | null; email: string | null };
}

export interface ResetHistoryResult {
  committed: boolean;
}

export class RepositoryReinitializer {
  /**
   * Remove any `.git` under `targetDirectory` and run `git init` there.
   * Tolerates a missing `.git`.
   *
   * @throws VcsError (GIT_UNAVAILABLE) when git cannot be run
   * @throws VcsError (RESET_FAILED) when any step fails
   */
  async resetHistory(targetDirectory: string, options: ResetHistoryOptions = {}): Promise<ResetHistoryResult> {
    // git reports a missing cwd the same way as a missing executable
    if (!(await isDirectory(targetDirectory))) {
      throw new VcsError(ErrorCodes.RESET_FAILED, `Project directory does not exist: ${targetDirectory}`, {
        path: targetDirectory,
      });
    }

    try {
      await removePath(path.join(targetDirectory, '.git'));
    } catch (error) {
      throw new VcsError(
        ErrorCodes.RESET_FAILED,
        `Failed to remove inherited history in ${targetDirectory}: ${describeError(error)}`,
        { path: targetDirectory, cause: describeError(error) }
      );
    }

    await this.git(['init', '--quiet'], targetDirectory);
    log.debug(`Initialized empty repository in ${targetDirectory}`);

    if (!options.initialCommit) {
      return { committed: false };
    }

    const identity: string[] = ['-c', 'commit.gpgsign=false'];
    if (options.author?.name) identity.push('-c', `user.name=${options.author.name}`);
    if (options.author?.email) identity.push('-c', `user.email=${options.author.email}`);

    await this.git(['add', '--all'], targetDirectory);
    await this.git(
      [...identity, 'commit', '--quiet', '--allow-empty', '-m', options.commitMessage ?? DEFAULT_COMMIT_MESSAGE],
      targetDirectory
    );
    log.debug(`Created initial commit in ${targetDirectory}`);
    return { committed: true };
  }

  private async git(args: string[], cwd: string): Promise<void> {
    try {
      await runGit(args, { cwd });
    } catch (error) {
      if (error instanceof GitCommandError && error.isMissingExecutable) {
        throw new VcsError(ErrorCodes.GIT_UNAVAILABLE, 'git is not installed or not on PATH', {
          path: cwd,
        });
      }
      throw new VcsError(
        ErrorCodes.RESET_FAILED,
        `History reset failed in ${cwd}: ${describeError(error)}`,
        { path: cwd, cause: describeError(error) }
      );
    }
  }
}
