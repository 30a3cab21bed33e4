/**
 * CLI program assembly.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import { createNewCommand } from './commands/new.js';
import { createListCommand } from './commands/list.js';
import { createUpdateCommand } from './commands/update.js';
import { createCleanCommand } from './commands/clean.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('seedling')
    .description('Create new projects from language templates')
    .version(VERSION)
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors')
    .hook('preAction', (command) => {
      const options = command.opts<GlobalOptions>();
      if (options.verbose) logger.setLevel('debug');
      else if (options.quiet) logger.setLevel('error');
    });

  [createNewCommand, createListCommand, createUpdateCommand, createCleanCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
