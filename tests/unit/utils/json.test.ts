/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  loadJson,
  loadJsonSync,
  parseJson,
  stringifyJson,
  writeJson,
  writeJsonSync,
} from '../../../src/utils/json.js';
import { ErrorCodes, SystemError } from '../../../src/utils/errors.js';

describe('json utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'patternloom-json-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parseJson', () => {
    it('should parse valid content', () => {
      expect(parseJson('{"name":"Redis","tags":["cache"]}')).toEqual({
        name: 'Redis',
        tags: ['cache'],
      });
    });

    it('should throw a SystemError naming the source', () => {
      expect(() => parseJson('{not json', 'catalog.json')).toThrow(SystemError);
      try {
        parseJson('{not json', 'catalog.json');
      } catch (error) {
        expect(error).toBeInstanceOf(SystemError);
        if (error instanceof SystemError) {
          expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
          expect(error.message).toContain('Failed to parse JSON from catalog.json');
        }
      }
    });
  });

  describe('stringifyJson', () => {
    it('should indent by two spaces and end with a newline', () => {
      expect(stringifyJson({ a: 1 })).toBe('{\n  "a": 1\n}\n');
    });
  });

  describe('file round trip', () => {
    it('should write and read asynchronously', async () => {
      const filePath = join(tempDir, 'nested', 'data.json');

      await writeJson(filePath, { version: 1, items: [1, 2] });

      expect(await loadJson(filePath)).toEqual({ version: 1, items: [1, 2] });
    });

    it('should write and read synchronously', () => {
      const filePath = join(tempDir, 'data.json');

      writeJsonSync(filePath, ['a']);

      expect(readFileSync(filePath, 'utf-8')).toBe('[\n  "a"\n]\n');
      expect(loadJsonSync(filePath)).toEqual(['a']);
    });

    it('should report the path of a malformed file', () => {
      const filePath = join(tempDir, 'broken.json');
      writeFileSync(filePath, '[1,');

      expect(() => loadJsonSync(filePath)).toThrow(`Failed to parse JSON from ${filePath}`);
    });
  });
});
