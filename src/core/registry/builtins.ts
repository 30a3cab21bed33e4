/**
 * Templates that ship with seedling.
 */
import type { BuiltinLanguage, TemplateDefinition } from './types.js';

export const BUILTIN_TEMPLATES: Record<BuiltinLanguage, TemplateDefinition> = {
  rust: {
    identifier: 'rust',
    displayName: 'rust-claude-code',
    description: 'Comprehensive Rust starter template with Claude Code guidelines',
    sourceLocation: 'https://github.com/iepathos/rust-claude-code',
    customizations: [
      {
        relativePath: 'Cargo.toml',
        replacements: [{ placeholder: 'my-project', value: { kind: 'project_name' } }],
      },
      {
        relativePath: 'README.md',
        replacements: [
          { placeholder: 'yourusername', value: { kind: 'author_name' } },
          { placeholder: 'my-rust-project', value: { kind: 'project_name' } },
        ],
      },
    ],
    variables: {},
  },
  go: {
    identifier: 'go',
    displayName: 'go-claude-code',
    description: 'Go project template optimized for Claude Code development',
    sourceLocation: 'https://github.com/iepathos/go-claude-code',
    customizations: [
      {
        relativePath: 'go.mod',
        replacements: [
          {
            placeholder: 'github.com/yourusername/my-project',
            value: { kind: 'custom', name: 'module_path' },
          },
        ],
      },
      {
        relativePath: 'README.md',
        replacements: [
          { placeholder: 'yourusername', value: { kind: 'author_name' } },
          { placeholder: 'my-go-project', value: { kind: 'project_name' } },
        ],
      },
    ],
    variables: {
      module_path: 'github.com/user/project',
    },
  },
};
