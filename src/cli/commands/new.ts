/**
 * `seedling new` - create a project from a template.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { pathExists } from '../../utils/file-system.js';
import { expandHome } from '../../utils/paths.js';
import { logger as log } from '../../utils/logger.js';
import type { CreationReport } from '../../core/project/types.js';
import {
  askConfirmation,
  collectVariable,
  ensureGitAvailable,
  loadCliContext,
  reportError,
  resolveAuthorIdentity,
} from '../helpers.js';

interface NewOptions {
  directory?: string;
  yes?: boolean;
  var: Record<string, string>;
  commit?: boolean;
  config?: string;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return new Command('new')
    .description('Create a new project from a template')
    .argument('<template>', 'Template identifier (rust, go, or a custom template)')
    .argument('<name>', 'Project name, also used as the directory name')
    .option('-d, --directory <dir>', 'Parent directory for the project')
    .option('-y, --yes', 'Overwrite an existing project directory without asking')
    .option('--var <key=value>', 'Value for a custom placeholder (repeatable)', collectVariable, {})
    .option('--commit', 'Record the new project as an initial commit')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (template: string, name: string, options: NewOptions) => {
      try {
        await runNew(template, name, options);
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}

async function runNew(template: string, name: string, options: NewOptions): Promise<void> {
  await ensureGitAvailable();
  const { config, service } = await loadCliContext(options.config);
  const parent = path.resolve(expandHome(options.directory ?? config.defaults.directory ?? '.'));
  const target = path.join(parent, name);

  let force = options.yes ?? false;
  // Non-interactive runs fall through to the pipeline's target-exists error.
  if (!force && process.stdin.isTTY && (await pathExists(target))) {
    const confirmed = await askConfirmation(`Directory ${target} already exists. Overwrite it? [y/N] `);
    if (!confirmed) {
      log.info('Aborted, nothing was changed.');
      return;
    }
    force = true;
  }

  const report = await service.createProject(template, name, parent, {
    forceOverwrite: force,
    extraValues: options.var,
    author: await resolveAuthorIdentity(config),
    initialCommit: options.commit ? true : undefined,
  });

  printReport(report);
}

function printReport(report: CreationReport): void {
  log.success(`Created ${report.identifier} project '${report.projectName}' at ${report.targetDirectory}`);

  for (const file of report.substitution.modified) {
    console.log(chalk.dim(`  customized ${file.path} (${file.replacements} replacement${file.replacements === 1 ? '' : 's'})`));
  }
  for (const file of report.substitution.skipped) {
    log.warn(`${file} not found in template, skipped`);
  }
  if (report.overridesBuiltin) {
    log.warn(`'${report.identifier}' is a custom template overriding the built-in one`);
  }

  console.log();
  console.log(chalk.bold('Next steps:'));
  console.log(`  cd ${report.targetDirectory}`);
  if (!report.initialCommit) {
    console.log('  git add . && git commit -m "Initial commit"');
  }
}
