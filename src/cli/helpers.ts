/**
 * Shared helpers for CLI commands.
 */
import * as readline from 'node:readline';
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { createProjectService } from '../core/project/factory.js';
import type { ProjectService } from '../core/project/service.js';
import type { AuthorIdentity } from '../core/project/types.js';
import { ErrorCodes, SeedlingError, VcsError } from '../utils/errors.js';
import { getGitConfigValue, isGitAvailable } from '../utils/git.js';
import { logger as log } from '../utils/logger.js';

export interface CliContext {
  config: Config;
  service: ProjectService;
}

/**
 * Load the config and wire the project pipeline for one invocation.
 */
export async function loadCliContext(configPath?: string): Promise<CliContext> {
  const config = await loadConfig(configPath);
  return { config, service: createProjectService(config) };
}

/**
 * Author identity from config defaults, falling back to git's user config.
 */
export async function resolveAuthorIdentity(config: Config): Promise<AuthorIdentity> {
  const name = config.defaults.author_name ?? (await getGitConfigValue('user.name'));
  const email = config.defaults.author_email ?? (await getGitConfigValue('user.email'));
  return { name, email };
}

/**
 * Fail fast when the git executable cannot be run.
 *
 * @throws VcsError (GIT_UNAVAILABLE)
 */
export async function ensureGitAvailable(): Promise<void> {
  if (!(await isGitAvailable())) {
    throw new VcsError(
      ErrorCodes.GIT_UNAVAILABLE,
      'git is not installed or not on PATH. Install git and try again.'
    );
  }
}

/**
 * Commander option parser for repeatable `--var key=value`.
 */
export function collectVariable(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${value}'.`);
  }
  return { ...previous, [value.slice(0, separator).trim()]: value.slice(separator + 1) };
}

/**
 * Ask a yes/no question on the terminal. Anything but y/yes is a no.
 */
export async function askConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(question, resolve);
  });
  rl.close();
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

/**
 * Log a failed command. Error details are shown at debug level.
 */
export function reportError(error: unknown): void {
  if (error instanceof SeedlingError) {
    log.error(`${error.message} [${error.code}]`);
    if (error.details) {
      log.debug('Error details', error.details);
    }
    return;
  }
  log.error(error instanceof Error ? error.message : 'Unknown error');
}
