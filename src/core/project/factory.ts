/**
 * Wiring of the project pipeline from a loaded config.
 */
import type { Config } from '../config/schema.js';
import { getCacheRoot, getCustomTemplates } from '../config/loader.js';
import { TemplateRegistry } from '../registry/registry.js';
import { TemplateCache } from '../cache/manager.js';
import { GitFetcher } from '../fetcher/git-fetcher.js';
import type { RepositoryFetcher } from '../fetcher/types.js';
import { ProjectService, type ProjectServiceDeps } from './service.js';

export interface ProjectServiceOverrides extends Partial<Omit<ProjectServiceDeps, 'registry' | 'cache'>> {
  /** Replaces the git-backed fetcher */
  fetcher?: RepositoryFetcher;
}

/**
 * Build a ProjectService for a config.
 *
 * @throws RegistryError when the config's custom templates are invalid
 */
export function createProjectService(config: Config, overrides: ProjectServiceOverrides = {}): ProjectService {
  const { fetcher, ...rest } = overrides;
  const registry = TemplateRegistry.build(getCustomTemplates(config));
  const cache = new TemplateCache({
    cacheRoot: getCacheRoot(config),
    fetcher: fetcher ?? new GitFetcher(),
    autoUpdate: config.templates.auto_update,
    updateIntervalDays: config.templates.update_interval_days,
    now: rest.now,
  });

  return new ProjectService({
    registry,
    cache,
    defaults: {
      variables: config.defaults.variables,
      initialCommit: config.defaults.initial_commit,
    },
    ...rest,
  });
}
