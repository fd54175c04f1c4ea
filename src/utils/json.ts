/**
 * @arch patternloom.infra.fs
 *
 * JSON parsing and serialization for catalog and pattern files.
 */
import { SystemError, ErrorCodes, getErrorMessage } from './errors.js';
import { readFile, readFileSync, writeFile, writeFileSync } from './file-system.js';

/**
 * Parse JSON content into an unknown value.
 * Callers validate the shape with a schema.
 */
export function parseJson(content: string, source = 'input'): unknown {
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse JSON from ${source}: ${getErrorMessage(error)}`,
      { source }
    );
  }
}

/**
 * Load and parse a JSON file.
 */
export async function loadJson(filePath: string): Promise<unknown> {
  const content = await readFile(filePath);
  return parseJson(content, filePath);
}

/**
 * Load and parse a JSON file synchronously.
 */
export function loadJsonSync(filePath: string): unknown {
  return parseJson(readFileSync(filePath), filePath);
}

/**
 * Stringify a value with two-space indentation and a trailing newline.
 */
export function stringifyJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Write a value to a JSON file.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  try {
    await writeFile(filePath, stringifyJson(data));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.WRITE_ERROR,
      `Failed to write ${filePath}: ${getErrorMessage(error)}`,
      { filePath }
    );
  }
}

/**
 * Write a value to a JSON file synchronously.
 */
export function writeJsonSync(filePath: string, data: unknown): void {
  try {
    writeFileSync(filePath, stringifyJson(data));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.WRITE_ERROR,
      `Failed to write ${filePath}: ${getErrorMessage(error)}`,
      { filePath }
    );
  }
}
