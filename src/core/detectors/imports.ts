/**
 * Import detector - line-oriented scan for forbidden `use` targets,
 * deny-listed standard-library paths and the rule's import patterns.
 *
 * This is text matching, not parsing: grouped imports such as
 * `use crate::{ui, core};` and re-exports (`pub use`) are not recognised.
 */
import type { LayerRule, StdPrefixMatch } from '../registry/types.js';
import { createViolation, type Violation } from '../report/types.js';
import {
  compilePatterns,
  escapeRegExp,
  layerLabel,
  readSource,
  splitLines,
  type SourceScanOptions,
} from './source.js';

const IMPORT_KEYWORD = 'use ';
const DECLARATION_KEYWORDS = ['use ', 'extern '];

/**
 * Path of a trimmed `use` line without the keyword and trailing `;`.
 */
function importPath(line: string): string {
  return line.slice(IMPORT_KEYWORD.length).trim().replace(/\s*;$/, '');
}

/**
 * Whether a `use` path references a module token as one of its segments.
 */
function referencesToken(line: string, path: string, token: string): boolean {
  return (
    line.includes(`::${token}::`) ||
    path.endsWith(`::${token}`) ||
    path.startsWith(`${token}::`) ||
    path === token
  );
}

/**
 * Std prefix test for the rule's matching mode.
 */
function stdPrefixMatcher(prefix: string, mode: StdPrefixMatch): (line: string) => boolean {
  if (mode === 'substring') {
    return (line) => line.includes(prefix);
  }
  const regex = new RegExp(`${escapeRegExp(prefix)}(?![A-Za-z0-9_])`);
  return (line) => regex.test(line);
}

/**
 * Scan file content. Pure; `file` is only used to label violations.
 *
 * On each line, token hits come first, then std prefixes, then import
 * patterns, each in rule order.
 */
export function scanImports(file: string, content: string, rule: LayerRule): Violation[] {
  const violations: Violation[] = [];
  const label = layerLabel(rule.name);
  const stdPrefixes = rule.forbiddenStdImports.map((prefix) => ({
    prefix,
    matches: stdPrefixMatcher(prefix, rule.stdPrefixMatch),
  }));
  const importPatterns = compilePatterns(rule.importPatterns);

  splitLines(content).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;

    if (line.startsWith(IMPORT_KEYWORD)) {
      const path = importPath(line);
      for (const token of rule.forbiddenImports) {
        if (referencesToken(line, path, token)) {
          violations.push(
            createViolation(
              file,
              lineNumber,
              'FORBIDDEN_IMPORT',
              `${label} module imports forbidden layer '${token}': ${line}`
            )
          );
        }
      }
    }

    if (DECLARATION_KEYWORDS.some((keyword) => line.includes(keyword))) {
      for (const { prefix, matches } of stdPrefixes) {
        if (matches(line)) {
          violations.push(
            createViolation(
              file,
              lineNumber,
              'FORBIDDEN_STD_IMPORT',
              `${label} module uses forbidden std import '${prefix}': ${line}`
            )
          );
        }
      }
    }

    for (const { regex, description } of importPatterns) {
      if (regex.test(rawLine)) {
        violations.push(
          createViolation(file, lineNumber, 'FORBIDDEN_IMPORT', `${label} module ${description}: ${line}`)
        );
      }
    }
  });

  return violations;
}

/**
 * Read a layer file and scan it.
 */
export async function detectImports(
  file: string,
  rule: LayerRule,
  options: SourceScanOptions
): Promise<Violation[]> {
  const source = await readSource(file, options);
  if (!source.ok) {
    return source.violations;
  }
  return scanImports(file, source.content, rule);
}
