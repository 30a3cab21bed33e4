/**
 * `seedling clean` - drop a template's cache entry.
 */
import { Command } from 'commander';
import { logger as log } from '../../utils/logger.js';
import { loadCliContext, reportError } from '../helpers.js';

interface CleanOptions {
  config?: string;
}

/**
 * Create the clean command.
 */
export function createCleanCommand(): Command {
  return new Command('clean')
    .description('Remove a template from the local cache')
    .argument('<template>', 'Template identifier')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (template: string, options: CleanOptions) => {
      try {
        const { service } = await loadCliContext(options.config);
        const removed = await service.invalidateTemplate(template);
        if (removed) {
          log.success(`Removed cached copy of '${template}'`);
        } else {
          log.info(`'${template}' is not cached`);
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
