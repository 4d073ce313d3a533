/**
 * Violation aggregator - the single point where detector output is merged
 * into a report.
 */
import type { ValidationReport, Violation, ViolationKind, ViolationStream } from './types.js';

/**
 * Build a frozen report from violations already in report order.
 */
export function createReport(violations: readonly Violation[]): ValidationReport {
  const frozen = Object.freeze([...violations]);
  return Object.freeze({
    violations: frozen,
    isClean: frozen.length === 0,
  });
}

/**
 * Merge independently produced streams into one report.
 *
 * Streams are ordered by detector index, then sequence; violations keep their
 * emission order within a stream. The input order of the streams does not
 * matter, so per-file tasks may complete in any order.
 */
export function aggregate(streams: Iterable<ViolationStream>): ValidationReport {
  const ordered = Array.from(streams).sort(
    (a, b) => a.detector - b.detector || a.sequence - b.sequence
  );
  return createReport(ordered.flatMap((stream) => stream.violations));
}

/**
 * Group violations by kind. Kinds appear in first-seen order.
 */
export function groupByKind(report: ValidationReport): Map<ViolationKind, Violation[]> {
  const groups = new Map<ViolationKind, Violation[]>();
  for (const violation of report.violations) {
    const group = groups.get(violation.kind);
    if (group) {
      group.push(violation);
    } else {
      groups.set(violation.kind, [violation]);
    }
  }
  return groups;
}

/**
 * Process exit status: 1 for any violation, 0 for a clean report.
 */
export function exitStatus(report: ValidationReport): 0 | 1 {
  return report.isClean ? 0 : 1;
}
