/**
 * Git integration utilities.
 * Runs the `git` executable; never prompts for credentials.
 */

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { pathExists } from './file-system.js';

/** Default timeout for local git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

/** Output of a finished git command. */
export interface GitResult {
  stdout: string;
  stderr: string;
}

export interface RunGitOptions {
  /** Working directory for the command */
  cwd?: string;
  /** Kill the command after this many milliseconds (0 = no limit) */
  timeoutMs?: number;
}

/**
 * A git command that exited unsuccessfully or could not be started.
 */
export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly stderr: string,
    public readonly exitCode: number | string | null
  ) {
    super(`git ${args.join(' ')} failed${stderr ? `: ${stderr.trim()}` : ''}`);
    this.name = 'GitCommandError';
  }

  /** True when the git executable itself could not be found. */
  get isMissingExecutable(): boolean {
    return this.exitCode === 'ENOENT';
  }
}

/**
 * Run git with the given arguments.
 *
 * @throws GitCommandError when git exits non-zero or cannot be spawned
 */
export function runGit(args: string[], options: RunGitOptions = {}): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      {
        cwd: options.cwd,
        encoding: 'utf-8',
        timeout: options.timeoutMs ?? GIT_COMMAND_TIMEOUT_MS,
        maxBuffer: 16 * 1024 * 1024,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      },
      (error, stdout, stderr) => {
        if (error) {
          reject(new GitCommandError(args, stderr || error.message, error.code ?? null));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });
}

/**
 * Check if git is available on the system.
 */
export async function isGitAvailable(): Promise<boolean> {
  try {
    await runGit(['--version']);
    return true;
  } catch { /* git missing or broken */
    return false;
  }
}

/**
 * Read a git config value (e.g. `user.name`) from the user's configuration.
 *
 * @returns The trimmed value, or null when unset or git is unavailable
 */
export async function getGitConfigValue(key: string, cwd?: string): Promise<string | null> {
  try {
    const { stdout } = await runGit(['config', '--get', key], { cwd });
    return stdout.trim() || null;
  } catch { /* key unset */
    return null;
  }
}

/**
 * Check whether a directory holds git metadata at its root.
 */
export async function hasGitMetadata(dirPath: string): Promise<boolean> {
  return pathExists(path.join(dirPath, '.git'));
}
