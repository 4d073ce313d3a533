/**
 * File locator - expands a layer's glob patterns into concrete files.
 */
import { globFiles, toPosixPath } from '../../utils/file-system.js';

export const DEFAULT_IGNORE = ['**/target/**'];

export interface LocateOptions {
  /** Directory the patterns are relative to */
  cwd: string;
  /** Glob patterns excluded from every expansion */
  ignore?: string[];
}

/**
 * Resolve patterns to project-relative POSIX paths.
 *
 * Each pattern is expanded on its own and its matches sorted, so the result
 * order only depends on the pattern order and the tree. A path matched by
 * several patterns is kept at its first position. Hidden files and directories
 * are included. Patterns that match nothing, including ones under a missing
 * directory, contribute nothing.
 */
export async function resolveFiles(
  patterns: readonly string[],
  options: LocateOptions
): Promise<string[]> {
  const seen = new Set<string>();

  for (const pattern of patterns) {
    const matches = await globFiles(toPosixPath(pattern), {
      cwd: options.cwd,
      ignore: options.ignore ?? DEFAULT_IGNORE,
      absolute: false,
      dot: true,
    });

    for (const match of matches.map(toPosixPath).sort()) {
      seen.add(match);
    }
  }

  return Array.from(seen);
}
