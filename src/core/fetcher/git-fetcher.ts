/**
 * GitFetcher - clones and pulls template repositories with the git executable.
 */
import { FetchError, type FetchFailureReason } from '../../utils/errors.js';
import { isDirEmpty, pathExists } from '../../utils/file-system.js';
import { GitCommandError, runGit } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';
import { classifyGitFailure } from './classify.js';
import type { GitFetcherOptions, RepositoryFetcher } from './types.js';

const log = logger.child('fetch');

/** Remote operations can be slow; local git commands use the shorter default. */
const DEFAULT_FETCH_TIMEOUT_MS = 5 * 60 * 1000;

export class GitFetcher implements RepositoryFetcher {
  private readonly timeoutMs: number;
  private readonly shallow: boolean;

  constructor(options: GitFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.shallow = options.shallow ?? false;
  }

  async clone(sourceLocation: string, destinationPath: string): Promise<void> {
    if (await isOccupied(destinationPath)) {
      throw new FetchError(
        'destination_not_empty',
        `Cannot clone ${sourceLocation}: ${destinationPath} is not empty`,
        { source: sourceLocation, path: destinationPath }
      );
    }

    const args = ['clone', '--quiet'];
    if (this.shallow) {
      args.push('--depth', '1');
    }
    args.push('--', sourceLocation, destinationPath);

    log.debug(`Cloning ${sourceLocation} into ${destinationPath}`);
    await this.run(args, undefined, { source: sourceLocation, path: destinationPath });
    log.debug(`Cloned ${sourceLocation}`);
  }

  async pull(existingPath: string): Promise<void> {
    log.debug(`Pulling latest changes in ${existingPath}`);
    await this.run(['pull', '--ff-only', '--quiet'], existingPath, { path: existingPath });
  }

  private async run(args: string[], cwd: string | undefined, details: Record<string, unknown>): Promise<void> {
    try {
      await runGit(args, { cwd, timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof GitCommandError) {
        if (error.isMissingExecutable) {
          throw new FetchError('unknown', 'git is not installed or not on PATH', details);
        }
        const reason = classifyGitFailure(error.stderr);
        throw new FetchError(reason, describeFailure(reason, details), {
          ...details,
          stderr: error.stderr.trim(),
        });
      }
      throw error;
    }
  }
}

async function isOccupied(destinationPath: string): Promise<boolean> {
  if (!(await pathExists(destinationPath))) return false;
  try {
    return !(await isDirEmpty(destinationPath));
  } catch { /* a file or unreadable directory is never a valid clone target */
    return true;
  }
}

function describeFailure(reason: FetchFailureReason, details: Record<string, unknown>): string {
  const target = String(details.source ?? details.path);
  switch (reason) {
    case 'network_unreachable':
      return `Network unreachable while fetching ${target}`;
    case 'auth_required':
      return `Authentication required for ${target}`;
    case 'remote_not_found':
      return `Remote repository not found: ${target}`;
    case 'destination_not_empty':
      return `Destination is not empty: ${String(details.path)}`;
    case 'unknown':
      return `Failed to fetch ${target}`;
  }
}
