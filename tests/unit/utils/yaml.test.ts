/**
 * @arch patternloom.test.unit
 */
/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  formatZodError,
  loadYamlWithSchema,
  parseYaml,
  parseYamlWithSchema,
} from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

// Mock file-system for async load functions
vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const LevelSchema = z.object({
  level: z.enum(['debug', 'info']).default('info'),
  weights: z.object({ security: z.number().max(1) }).optional(),
});

describe('parseYaml', () => {
  it('should parse nested objects', () => {
    const yaml = `
scoring:
  weights:
    security: 0.5
`;
    expect(parseYaml(yaml)).toEqual({ scoring: { weights: { security: 0.5 } } });
  });

  it('should parse empty YAML as null', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('should throw SystemError for invalid YAML', () => {
    const invalidYaml = `
name: test
  invalid: indentation
`;
    expect(() => parseYaml(invalidYaml)).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('weights:\n  security: 0.3\n', LevelSchema)).toEqual({
      level: 'info',
      weights: { security: 0.3 },
    });
  });

  it('should throw MALFORMED_FILE with the failing path', () => {
    try {
      parseYamlWithSchema('weights:\n  security: 2\n', LevelSchema);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.MALFORMED_FILE);
        expect(error.message).toContain('YAML validation failed: weights.security:');
      }
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('level: debug\n');

    await expect(loadYamlWithSchema('/p/config.yaml', LevelSchema)).resolves.toEqual({
      level: 'debug',
    });
    expect(mockReadFile).toHaveBeenCalledWith('/p/config.yaml');
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('level: loud\n');

    await expect(loadYamlWithSchema('/p/config.yaml', LevelSchema)).rejects.toThrow(
      '(file: /p/config.yaml)'
    );
  });

  it('should wrap read failures as PARSE_ERROR', async () => {
    mockReadFile.mockRejectedValue(new Error('EACCES'));

    await expect(loadYamlWithSchema('/p/config.yaml', LevelSchema)).rejects.toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
      message: 'Failed to load YAML file: /p/config.yaml',
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      const message = formatZodError(result.error);
      expect(message.startsWith('a: ')).toBe(true);
      expect(message).toContain('; b: ');
    }
  });

  it('should omit the path for root issues', () => {
    const result = z.string().safeParse(42);
    expect(result.success).toBe(false);
    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message);
      expect(formatZodError(result.error)).toBe(messages.join('; '));
    }
  });
});
