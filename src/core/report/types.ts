/**
 * Violation and report type definitions.
 */

/**
 * Closed set of violation categories. The values are the `type` field of the
 * machine report and must stay stable.
 */
export const VIOLATION_KINDS = [
  'FORBIDDEN_IMPORT',
  'FORBIDDEN_STD_IMPORT',
  'FORBIDDEN_DEPENDENCY',
  'FORBIDDEN_FEATURE',
  'POTENTIAL_VIOLATION',
  'MANIFEST_PARSE_ERROR',
  'FORBIDDEN_API_USAGE',
  // Only emitted when the unreadable-file policy is `fail`
  'UNREADABLE_FILE',
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

/**
 * One detected boundary breach.
 */
export interface Violation {
  /** Project-relative path of the source file or manifest */
  readonly file: string;
  /** 1-based line number, 0 for file-level violations */
  readonly line: number;
  readonly kind: ViolationKind;
  /** Explanation that echoes the offending text */
  readonly detail: string;
}

/**
 * Violations produced by one detector over one unit of work (a file, or the
 * manifest). The aggregator orders streams by `detector`, then `sequence`.
 */
export interface ViolationStream {
  /** Detector execution index */
  detector: number;
  /** Position of the unit of work within the detector, e.g. file index */
  sequence: number;
  violations: readonly Violation[];
}

/**
 * Outcome of one run.
 */
export interface ValidationReport {
  readonly violations: readonly Violation[];
  readonly isClean: boolean;
}

/**
 * One entry of the machine-readable report.
 */
export interface MachineRecord {
  file: string;
  line: number;
  type: ViolationKind;
  detail: string;
}

/**
 * Create a frozen violation.
 */
export function createViolation(
  file: string,
  line: number,
  kind: ViolationKind,
  detail: string
): Violation {
  return Object.freeze({ file, line, kind, detail });
}
