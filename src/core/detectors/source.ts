/**
 * Shared helpers for the line-oriented detectors.
 */
import { readTextFile, resolvePath } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import type { ApiPattern } from '../registry/types.js';
import { createViolation, type Violation } from '../report/types.js';

/**
 * What to do with a layer file that cannot be read as UTF-8 text.
 * `skip` treats it as clean; `fail` reports an UNREADABLE_FILE violation.
 */
export type UnreadableFilePolicy = 'skip' | 'fail';

export interface SourceScanOptions {
  /** Root the project-relative file paths resolve against */
  projectRoot: string;
  unreadableFiles?: UnreadableFilePolicy;
}

export type SourceReadResult =
  | { ok: true; content: string }
  | { ok: false; violations: Violation[] };

/**
 * Read a layer file. Never rejects: a read or decode failure becomes either
 * nothing or a single file-level violation, depending on the policy.
 */
export async function readSource(
  file: string,
  options: SourceScanOptions
): Promise<SourceReadResult> {
  try {
    const content = await readTextFile(resolvePath(options.projectRoot, file));
    return { ok: true, content };
  } catch (error) {
    if ((options.unreadableFiles ?? 'skip') === 'skip') {
      return { ok: false, violations: [] };
    }
    return {
      ok: false,
      violations: [
        createViolation(
          file,
          0,
          'UNREADABLE_FILE',
          `Cannot read ${file} as UTF-8 text: ${errorMessage(error)}`
        ),
      ],
    };
  }
}

/**
 * Split content into physical lines. Index i holds line i + 1.
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * Display form of a layer name in violation details: "core" -> "Core".
 */
export function layerLabel(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export interface CompiledPattern {
  regex: RegExp;
  description: string;
}

/**
 * Compile line patterns once per scan. Rule patterns are validated when the
 * rule is built.
 */
export function compilePatterns(patterns: readonly Readonly<ApiPattern>[]): CompiledPattern[] {
  return patterns.map(({ pattern, description }) => ({ regex: new RegExp(pattern), description }));
}

/**
 * Escape a literal for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
