/**
 * Tests for config and cache location helpers.
 */
import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { expandHome, getDefaultConfigPath, getDefaultCacheRoot } from '../../../src/utils/paths.js';

describe('paths', () => {
  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~')).toBe(homedir());
      expect(expandHome('~/code')).toBe(join(homedir(), 'code'));
    });

    it('should leave other paths alone', () => {
      expect(expandHome('/srv/code')).toBe('/srv/code');
      expect(expandHome('relative/~')).toBe('relative/~');
    });
  });

  describe('getDefaultConfigPath', () => {
    it('should prefer SEEDLING_CONFIG', () => {
      expect(getDefaultConfigPath({ SEEDLING_CONFIG: '/etc/seedling.yaml', XDG_CONFIG_HOME: '/xdg' })).toBe(
        resolve('/etc/seedling.yaml')
      );
    });

    it('should use XDG_CONFIG_HOME next', () => {
      expect(getDefaultConfigPath({ XDG_CONFIG_HOME: '/xdg' })).toBe(join('/xdg', 'seedling', 'config.yaml'));
    });

    it('should fall back to ~/.config', () => {
      expect(getDefaultConfigPath({})).toBe(join(homedir(), '.config', 'seedling', 'config.yaml'));
    });
  });

  describe('getDefaultCacheRoot', () => {
    it('should use XDG_CACHE_HOME when set', () => {
      expect(getDefaultCacheRoot({ XDG_CACHE_HOME: '/xdg-cache' })).toBe(join('/xdg-cache', 'seedling'));
    });

    it('should fall back to ~/.cache', () => {
      expect(getDefaultCacheRoot({})).toBe(join(homedir(), '.cache', 'seedling'));
    });
  });
});
