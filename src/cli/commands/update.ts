/**
 * `seedling update` - refresh cached templates from their sources.
 */
import { Command } from 'commander';
import { logger as log } from '../../utils/logger.js';
import { describeError } from '../../utils/errors.js';
import { ensureGitAvailable, loadCliContext, reportError } from '../helpers.js';

interface UpdateOptions {
  config?: string;
}

/**
 * Create the update command.
 */
export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Refresh a cached template, or every cached template')
    .argument('[template]', 'Template identifier')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (template: string | undefined, options: UpdateOptions) => {
      let ok = false;
      try {
        ok = await runUpdate(template, options);
      } catch (error) {
        reportError(error);
      }
      if (!ok) process.exit(1);
    });
}

async function runUpdate(template: string | undefined, options: UpdateOptions): Promise<boolean> {
  await ensureGitAvailable();
  const { service } = await loadCliContext(options.config);

  if (template) {
    const entryPath = await service.refreshTemplate(template);
    log.success(`Updated '${template}' (${entryPath})`);
    return true;
  }

  const results = await service.refreshAllCached();
  if (results.length === 0) {
    log.info('No cached templates to update.');
    return true;
  }

  for (const result of results) {
    if (result.ok) {
      log.success(`Updated '${result.identifier}'`);
    } else {
      log.fail(`Failed to update '${result.identifier}': ${describeError(result.error)}`);
    }
  }
  return results.every((result) => result.ok);
}
