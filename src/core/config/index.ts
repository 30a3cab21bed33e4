/**
 * Config exports barrel file.
 */
export {
  loadConfig,
  getDefaultConfig,
  getConfigPath,
  mergeConfig,
  getCacheRoot,
  getCustomTemplates,
} from './loader.js';
export { ConfigSchema, ConfigFileSchema, DefaultsSchema, TemplatesSettingsSchema } from './schema.js';
export type { Config, Defaults, TemplatesSettings } from './schema.js';
