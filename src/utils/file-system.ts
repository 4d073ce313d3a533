/**
 * File system operations - reading, writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { TextDecoder } from 'node:util';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as strict UTF-8.
 * Rejects when the bytes are not valid UTF-8 instead of substituting U+FFFD.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const bytes = await fs.promises.readFile(filePath);
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
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
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    /** Match files and directories whose names start with a dot */
    dot?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/target/**'],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    onlyFiles: true,
  });
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

/**
 * Convert a path to forward slashes for reports and glob matching.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}
