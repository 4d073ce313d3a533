/**
 * Human-readable report, grouped by violation kind.
 */
import chalk from 'chalk';
import { groupByKind } from './aggregator.js';
import type { ValidationReport, Violation, ViolationKind } from './types.js';

export interface HumanReportOptions {
  /** Use colors in output */
  colors: boolean;
}

export const REMEDIATION_NOTE = [
  '## Remediation',
  'Protected layers must not directly import UI, network, or filesystem layers.',
  'Instead, use dependency injection or abstract interfaces.',
];

type Color = 'red' | 'green' | 'yellow' | 'dim';

/**
 * One-line form of a violation: `file:line [KIND] detail`.
 */
export function formatViolation(violation: Violation): string {
  return `${violation.file}:${violation.line} [${violation.kind}] ${violation.detail}`;
}

export class HumanReporter {
  private options: HumanReportOptions;

  constructor(options: Partial<HumanReportOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  render(report: ValidationReport): string {
    if (report.isClean) {
      return `${this.colorize('✓', 'green')} No architectural violations found. All layer boundaries are respected.`;
    }

    const lines: string[] = [];
    lines.push(
      `${this.colorize('✗', 'red')} Found ${report.violations.length} architectural violation(s):`
    );
    lines.push('');

    for (const [kind, violations] of groupByKind(report)) {
      lines.push(this.colorize(`## ${kind} (${violations.length} violations)`, this.kindColor(kind)));
      for (const violation of violations) {
        lines.push(`  - ${formatViolation(violation)}`);
      }
      lines.push('');
    }

    lines.push(...REMEDIATION_NOTE.map((line, i) => (i === 0 ? line : this.colorize(line, 'dim'))));

    return lines.join('\n');
  }

  // Unverifiable findings read as warnings; everything else as errors
  private kindColor(kind: ViolationKind): Color {
    return kind === 'POTENTIAL_VIOLATION' || kind === 'MANIFEST_PARSE_ERROR' ? 'yellow' : 'red';
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
