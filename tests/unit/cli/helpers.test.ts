/**
 * Tests for shared CLI helpers.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { InvalidArgumentError } from 'commander';
import {
  askConfirmation,
  collectVariable,
  ensureGitAvailable,
  loadCliContext,
  reportError,
  resolveAuthorIdentity,
} from '../../../src/cli/helpers.js';
import { mergeConfig } from '../../../src/core/config/loader.js';
import { CacheError, ErrorCodes, VcsError } from '../../../src/utils/errors.js';
import { getGitConfigValue, isGitAvailable } from '../../../src/utils/git.js';
import { logger } from '../../../src/utils/logger.js';
import { createTempDir, removeTempDir } from '../../helpers/temp.js';

let nextAnswer = '';

vi.mock('node:readline', () => ({
  createInterface: () => ({
    question: (_query: string, callback: (answer: string) => void) => callback(nextAnswer),
    close: vi.fn(),
  }),
}));

vi.mock('../../../src/utils/git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/utils/git.js')>()),
  getGitConfigValue: vi.fn(),
  isGitAvailable: vi.fn(),
}));

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    child: () => ({ error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() }),
  },
}));

describe('CLI helpers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('collectVariable', () => {
    it('should accumulate key=value pairs', () => {
      const first = collectVariable('org=acme', {});
      expect(collectVariable('url=https://example.com/?a=b', first)).toEqual({
        org: 'acme',
        url: 'https://example.com/?a=b',
      });
    });

    it('should allow empty values and let later values win', () => {
      expect(collectVariable('org=', { org: 'acme' })).toEqual({ org: '' });
    });

    it('should reject values without a key', () => {
      expect(() => collectVariable('novalue', {})).toThrow(InvalidArgumentError);
      expect(() => collectVariable('=x', {})).toThrow(InvalidArgumentError);
    });
  });

  describe('resolveAuthorIdentity', () => {
    it('should prefer config defaults', async () => {
      const config = mergeConfig({ defaults: { author_name: 'Config Author', author_email: 'config@example.com' } });

      expect(await resolveAuthorIdentity(config)).toEqual({ name: 'Config Author', email: 'config@example.com' });
      expect(getGitConfigValue).not.toHaveBeenCalled();
    });

    it('should fall back to git config', async () => {
      vi.mocked(getGitConfigValue).mockImplementation(async (key: string) =>
        key === 'user.name' ? 'Git Author' : null
      );

      expect(await resolveAuthorIdentity(mergeConfig({}))).toEqual({ name: 'Git Author', email: null });
    });
  });

  describe('ensureGitAvailable', () => {
    it('should pass when git runs', async () => {
      vi.mocked(isGitAvailable).mockResolvedValue(true);

      await expect(ensureGitAvailable()).resolves.toBeUndefined();
    });

    it('should throw GIT_UNAVAILABLE when git is missing', async () => {
      vi.mocked(isGitAvailable).mockResolvedValue(false);

      const error = await ensureGitAvailable().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VcsError);
      expect(error).toMatchObject({ code: ErrorCodes.GIT_UNAVAILABLE });
    });
  });

  describe('askConfirmation', () => {
    it.each([
      ['y', true],
      [' YES ', true],
      ['n', false],
      ['', false],
    ])('should read %j as %s', async (answer, expected) => {
      nextAnswer = answer;
      expect(await askConfirmation('Overwrite? ')).toBe(expected);
    });
  });

  describe('reportError', () => {
    it('should log the code and details of seedling errors', () => {
      reportError(new CacheError('K001', 'Cached template is broken', { identifier: 't1' }));

      expect(logger.error).toHaveBeenCalledWith('Cached template is broken [K001]');
      expect(logger.debug).toHaveBeenCalledWith('Error details', { identifier: 't1' });
    });

    it('should log plain errors by message', () => {
      reportError(new Error('plain failure'));
      expect(logger.error).toHaveBeenCalledWith('plain failure');
    });

    it('should handle non-errors', () => {
      reportError('weird');
      expect(logger.error).toHaveBeenCalledWith('Unknown error');
    });
  });

  describe('loadCliContext', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir('cli-context');
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it('should wire the service from the config file', async () => {
      const configPath = join(tempDir, 'config.yaml');
      writeFileSync(
        configPath,
        ['templates:', `  cache_directory: ${join(tempDir, 'cache')}`, '  custom:', '    - id: web', '      repository: /srv/web', ''].join('\n')
      );

      const { config, service } = await loadCliContext(configPath);

      expect(config.templates.cache_directory).toBe(join(tempDir, 'cache'));
      expect(service.listTemplates().map((t) => t.identifier)).toEqual(['rust', 'go', 'web']);
    });
  });
});
