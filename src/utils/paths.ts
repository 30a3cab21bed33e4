/**
 * Well-known locations for configuration and cache files.
 */
import * as os from 'node:os';
import * as path from 'node:path';

const APP_DIR = 'seedling';

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Default config file: $SEEDLING_CONFIG, then $XDG_CONFIG_HOME/seedling/config.yaml,
 * then ~/.config/seedling/config.yaml.
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SEEDLING_CONFIG) {
    return path.resolve(expandHome(env.SEEDLING_CONFIG));
  }
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR, 'config.yaml');
}

/**
 * Default template cache root: $XDG_CACHE_HOME/seedling, then ~/.cache/seedling.
 */
export function getDefaultCacheRoot(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(base, APP_DIR);
}
