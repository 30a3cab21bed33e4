/**
 * Tests for the template registry.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  TemplateRegistry,
  parseTemplateId,
  formatTemplateId,
  validateTemplateDefinition,
} from '../../../../src/core/registry/registry.js';
import { BUILTIN_TEMPLATES } from '../../../../src/core/registry/builtins.js';
import type { TemplateDefinition } from '../../../../src/core/registry/types.js';
import { RegistryError } from '../../../../src/utils/errors.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({ error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() }),
  },
}));

function definition(overrides: Partial<TemplateDefinition> = {}): TemplateDefinition {
  return {
    identifier: 't1',
    displayName: 'Template one',
    description: '',
    sourceLocation: '/srv/templates/t1',
    customizations: [
      {
        relativePath: 'README.md',
        replacements: [{ placeholder: '{{NAME}}', value: { kind: 'project_name' } }],
      },
    ],
    variables: {},
    ...overrides,
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof RegistryError ? error.code : 'not-a-registry-error';
  }
  return undefined;
}

describe('parseTemplateId', () => {
  it('should normalize built-in aliases', () => {
    expect(parseTemplateId('rust')).toEqual({ kind: 'builtin', language: 'rust' });
    expect(parseTemplateId('rs')).toEqual({ kind: 'builtin', language: 'rust' });
    expect(parseTemplateId('Golang')).toEqual({ kind: 'builtin', language: 'go' });
    expect(parseTemplateId(' go ')).toEqual({ kind: 'builtin', language: 'go' });
  });

  it('should treat anything else as custom', () => {
    expect(parseTemplateId('my-api')).toEqual({ kind: 'custom', name: 'my-api' });
  });

  it('should format back to the registry key', () => {
    expect(formatTemplateId(parseTemplateId('rs'))).toBe('rust');
    expect(formatTemplateId({ kind: 'custom', name: 'web' })).toBe('web');
  });
});

describe('validateTemplateDefinition', () => {
  it('should accept the built-in templates', () => {
    expect(() => validateTemplateDefinition(BUILTIN_TEMPLATES.rust)).not.toThrow();
    expect(() => validateTemplateDefinition(BUILTIN_TEMPLATES.go)).not.toThrow();
  });

  it('should reject identifiers that are not filesystem-safe', () => {
    expect(codeOf(() => validateTemplateDefinition(definition({ identifier: 'My Template' })))).toBe('R002');
    expect(codeOf(() => validateTemplateDefinition(definition({ identifier: '../up' })))).toBe('R002');
  });

  it('should reject an empty source location', () => {
    expect(codeOf(() => validateTemplateDefinition(definition({ sourceLocation: '  ' })))).toBe('R002');
  });

  it('should reject customization paths that escape the project', () => {
    const escaping = definition({
      customizations: [{ relativePath: '../outside.txt', replacements: [] }],
    });
    const absolute = definition({
      customizations: [{ relativePath: '/etc/hosts', replacements: [] }],
    });

    expect(codeOf(() => validateTemplateDefinition(escaping))).toBe('R002');
    expect(codeOf(() => validateTemplateDefinition(absolute))).toBe('R002');
  });

  it('should reject empty and duplicate placeholders', () => {
    const empty = definition({
      customizations: [
        { relativePath: 'a.txt', replacements: [{ placeholder: '', value: { kind: 'project_name' } }] },
      ],
    });
    const duplicate = definition({
      customizations: [
        {
          relativePath: 'a.txt',
          replacements: [
            { placeholder: 'X', value: { kind: 'project_name' } },
            { placeholder: 'X', value: { kind: 'author_name' } },
          ],
        },
      ],
    });

    expect(codeOf(() => validateTemplateDefinition(empty))).toBe('R002');
    expect(codeOf(() => validateTemplateDefinition(duplicate))).toBe('R002');
  });

  it('should allow the same placeholder in separate customizations', () => {
    const split = definition({
      customizations: [
        { relativePath: 'a.txt', replacements: [{ placeholder: 'X', value: { kind: 'project_name' } }] },
        { relativePath: 'a.txt', replacements: [{ placeholder: 'X', value: { kind: 'author_name' } }] },
      ],
    });

    expect(() => validateTemplateDefinition(split)).not.toThrow();
  });
});

describe('TemplateRegistry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should list built-ins in fixed order', () => {
    const registry = TemplateRegistry.build();

    expect(registry.list().map((t) => t.identifier)).toEqual(['rust', 'go']);
    expect(registry.list().every((t) => t.origin === 'builtin')).toBe(true);
  });

  it('should resolve built-ins through aliases', () => {
    const registry = TemplateRegistry.build();

    expect(registry.resolve('rs').identifier).toBe('rust');
    expect(registry.resolve('golang').sourceLocation).toBe('https://github.com/iepathos/go-claude-code');
  });

  it('should add custom templates after the built-ins', () => {
    const registry = TemplateRegistry.build([definition(), definition({ identifier: 'web' })]);

    expect(registry.list().map((t) => t.identifier)).toEqual(['rust', 'go', 't1', 'web']);
    expect(registry.resolve('t1')).toMatchObject({ origin: 'custom', overridesBuiltin: false });
  });

  it('should throw R001 listing available identifiers for unknown templates', () => {
    const registry = TemplateRegistry.build([definition()]);

    try {
      registry.resolve('python');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryError);
      expect(error).toMatchObject({
        code: 'R001',
        details: { identifier: 'python', available: ['rust', 'go', 't1'] },
      });
    }
  });

  it('should return null from find for unknown templates', () => {
    expect(TemplateRegistry.build().find('python')).toBeNull();
  });

  it('should reject duplicate custom identifiers', () => {
    expect(codeOf(() => TemplateRegistry.build([definition(), definition()]))).toBe('R003');
  });

  it('should reject invalid custom templates at build time', () => {
    expect(codeOf(() => TemplateRegistry.build([definition({ identifier: 'Bad Id' })]))).toBe('R002');
  });

  it('should let a custom template override a built-in and keep its slot', () => {
    const registry = TemplateRegistry.build([
      definition({ identifier: 'extra' }),
      definition({ identifier: 'rust', sourceLocation: '/srv/templates/my-rust' }),
    ]);

    expect(registry.list().map((t) => t.identifier)).toEqual(['rust', 'go', 'extra']);
    expect(registry.resolve('rs')).toMatchObject({
      sourceLocation: '/srv/templates/my-rust',
      origin: 'custom',
      overridesBuiltin: true,
    });
    expect(registry.overrides()).toEqual(['rust']);
  });

  it('should forget a removed custom template on the next build', () => {
    const withCustom = TemplateRegistry.build([definition()]);
    expect(withCustom.find('t1')).not.toBeNull();

    const withoutCustom = TemplateRegistry.build([]);
    expect(withoutCustom.find('t1')).toBeNull();
    expect(withoutCustom.list().map((t) => t.identifier)).toEqual(['rust', 'go']);
  });
});
