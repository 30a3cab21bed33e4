/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
  parseYaml,
  parseYamlWithSchema,
  loadYamlWithSchema,
  formatZodError,
} from '../../../src/utils/yaml.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir } from '../../helpers/temp.js';

const PersonSchema = z.object({
  name: z.string(),
  age: z.number().default(30),
});

describe('yaml utilities', () => {
  describe('parseYaml', () => {
    it('should parse valid YAML', () => {
      expect(parseYaml('name: seed\nlist:\n  - a\n  - b\n')).toEqual({ name: 'seed', list: ['a', 'b'] });
    });

    it('should throw ConfigError C001 for malformed YAML', () => {
      expect(() => parseYaml('key: [unclosed')).toThrow(ConfigError);
      try {
        parseYaml('key: [unclosed');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toHaveProperty('code', 'C001');
      }
    });
  });

  describe('parseYamlWithSchema', () => {
    it('should apply schema defaults', () => {
      expect(parseYamlWithSchema('name: Ada\n', PersonSchema)).toEqual({ name: 'Ada', age: 30 });
    });

    it('should throw ConfigError C002 naming the invalid field', () => {
      try {
        parseYamlWithSchema('name: 12\n', PersonSchema);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toHaveProperty('code', 'C002');
        expect(error instanceof Error ? error.message : '').toContain('name:');
      }
    });
  });

  describe('loadYamlWithSchema', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir('yaml');
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it('should load and validate a file', async () => {
      const filePath = join(tempDir, 'person.yaml');
      writeFileSync(filePath, 'name: Grace\nage: 40\n');

      expect(await loadYamlWithSchema(filePath, PersonSchema)).toEqual({ name: 'Grace', age: 40 });
    });

    it('should add the file path to validation errors', async () => {
      const filePath = join(tempDir, 'bad.yaml');
      writeFileSync(filePath, 'age: 3\n');

      await expect(loadYamlWithSchema(filePath, PersonSchema)).rejects.toThrow(`(file: ${filePath})`);
    });

    it('should throw C001 for a missing file', async () => {
      await expect(loadYamlWithSchema(join(tempDir, 'missing.yaml'), PersonSchema)).rejects.toMatchObject({
        code: 'C001',
      });
    });
  });

  describe('formatZodError', () => {
    it('should join issues with their paths', () => {
      const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });
      expect(result.success).toBe(false);
      if (!result.success) {
        const formatted = formatZodError(result.error);
        expect(formatted.split('; ')).toHaveLength(2);
        expect(formatted).toMatch(/^a: /);
        expect(formatted).toContain('; b: ');
      }
    });
  });
});
