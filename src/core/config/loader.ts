/**
 * Config loading. The config file is consumed, never written.
 */
import * as path from 'node:path';
import { ConfigFileSchema, ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { expandHome, getDefaultCacheRoot, getDefaultConfigPath } from '../../utils/paths.js';
import type { TemplateDefinition } from '../registry/types.js';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Get the config file path: an explicit path, or the per-user default.
 */
export function getConfigPath(configPath?: string): string {
  return configPath ? path.resolve(expandHome(configPath)) : getDefaultConfigPath();
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const fullPath = getConfigPath(configPath);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: unknown): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Effective template cache root.
 */
export function getCacheRoot(config: Config): string {
  const configured = config.templates.cache_directory;
  return configured ? path.resolve(expandHome(configured)) : getDefaultCacheRoot();
}

/**
 * Custom templates declared in the config, in declaration order.
 */
export function getCustomTemplates(config: Config): TemplateDefinition[] {
  return config.templates.custom;
}
