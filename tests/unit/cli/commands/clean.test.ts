/**
 * Tests for the clean command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createCleanCommand } from '../../../../src/cli/commands/clean.js';
import { loadCliContext } from '../../../../src/cli/helpers.js';
import { mergeConfig } from '../../../../src/core/config/loader.js';
import type { ProjectService } from '../../../../src/core/project/service.js';
import { logger } from '../../../../src/utils/logger.js';
import { RegistryError } from '../../../../src/utils/errors.js';

vi.mock('../../../../src/cli/helpers.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../../src/cli/helpers.js')>()),
  loadCliContext: vi.fn(),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
    child: () => ({ error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() }),
  },
}));

vi.spyOn(process, 'exit').mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

describe('clean command', () => {
  const invalidateTemplate = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadCliContext).mockResolvedValue({
      config: mergeConfig({}),
      service: { invalidateTemplate } as unknown as ProjectService,
    });
  });

  it('should remove a cached template', async () => {
    invalidateTemplate.mockResolvedValue(true);

    await createCleanCommand().parseAsync(['node', 'test', 'rust']);

    expect(invalidateTemplate).toHaveBeenCalledWith('rust');
    expect(logger.success).toHaveBeenCalledWith("Removed cached copy of 'rust'");
  });

  it('should report templates that were not cached', async () => {
    invalidateTemplate.mockResolvedValue(false);

    await createCleanCommand().parseAsync(['node', 'test', 'go']);

    expect(logger.info).toHaveBeenCalledWith("'go' is not cached");
  });

  it('should fail for unknown templates', async () => {
    invalidateTemplate.mockRejectedValue(new RegistryError('R001', "Template 'nope' not found. Available: rust, go"));

    await expect(createCleanCommand().parseAsync(['node', 'test', 'nope'])).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith("Template 'nope' not found. Available: rust, go [R001]");
  });
});
