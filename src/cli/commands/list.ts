/**
 * `seedling list` - show the available templates.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { describeValueKind } from '../../core/registry/types.js';
import { loadCliContext, reportError } from '../helpers.js';

interface ListOptions {
  json?: boolean;
  config?: string;
}

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List available templates')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ListOptions) => {
      try {
        await runList(options);
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}

async function runList(options: ListOptions): Promise<void> {
  const { service } = await loadCliContext(options.config);

  const rows = await Promise.all(
    service.listTemplates().map(async (template) => ({
      template,
      cached: await service.cacheEntry(template.identifier),
    }))
  );

  if (options.json) {
    const output = rows.map(({ template, cached }) => ({
      identifier: template.identifier,
      name: template.displayName,
      description: template.description,
      repository: template.sourceLocation,
      origin: template.origin,
      overridesBuiltin: template.overridesBuiltin,
      files: template.customizations.map((c) => ({
        path: c.relativePath,
        replacements: c.replacements.map((r) => ({
          placeholder: r.placeholder,
          value: describeValueKind(r.value),
        })),
      })),
      cached: cached ? { path: cached.path, lastFetchedAt: cached.lastFetchedAt.toISOString() } : null,
    }));
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log(chalk.bold('Available templates:'));
  console.log();
  for (const { template, cached } of rows) {
    const flags = [
      template.origin === 'custom' ? chalk.cyan('custom') : null,
      template.overridesBuiltin ? chalk.yellow('overrides built-in') : null,
      cached ? chalk.green('cached') : null,
    ].filter((flag): flag is string => flag !== null);

    console.log(`  ${chalk.bold(template.identifier)}${flags.length > 0 ? ` (${flags.join(', ')})` : ''}`);
    if (template.description) {
      console.log(`    ${template.description}`);
    }
    console.log(chalk.dim(`    ${template.sourceLocation}`));
  }
}
