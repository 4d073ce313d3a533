/**
 * Pattern detector - regex scan for forbidden API usage on every line,
 * whether or not the line is an import.
 *
 * Comments and string literals are matched as well.
 */
import type { LayerRule } from '../registry/types.js';
import { createViolation, type Violation } from '../report/types.js';
import {
  compilePatterns,
  layerLabel,
  readSource,
  splitLines,
  type SourceScanOptions,
} from './source.js';

/**
 * Scan file content. Each pattern that matches a line yields its own violation.
 */
export function scanPatterns(file: string, content: string, rule: LayerRule): Violation[] {
  const violations: Violation[] = [];
  const label = layerLabel(rule.name);
  const compiled = compilePatterns(rule.apiPatterns);

  splitLines(content).forEach((line, index) => {
    for (const { regex, description } of compiled) {
      if (regex.test(line)) {
        violations.push(
          createViolation(
            file,
            index + 1,
            'FORBIDDEN_API_USAGE',
            `${label} module ${description}: ${line.trim()}`
          )
        );
      }
    }
  });

  return violations;
}

/**
 * Read a layer file and scan it.
 */
export async function detectPatterns(
  file: string,
  rule: LayerRule,
  options: SourceScanOptions
): Promise<Violation[]> {
  const source = await readSource(file, options);
  if (!source.ok) {
    return source.violations;
  }
  return scanPatterns(file, source.content, rule);
}
