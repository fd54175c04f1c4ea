/**
 * @arch patternloom.infra.fs
 *
 * File system operations - reading, writing and removing snapshot files.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return stripBom(await fs.promises.readFile(filePath, 'utf-8'));
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return stripBom(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content to a file synchronously, creating parent directories.
 */
export function writeFileSync(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a file exists (sync).
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Remove a file if it exists. Returns whether anything was removed.
 */
export function removeFileSync(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;
  fs.rmSync(filePath, { force: true });
  return true;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

/**
 * Drop a leading byte-order mark so files saved by editors that add one parse.
 */
function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}
