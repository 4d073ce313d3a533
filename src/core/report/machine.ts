/**
 * Machine-readable report: a flat JSON array of `{ file, line, type, detail }`.
 * CI consumers parse this file, so the field names are fixed.
 */
import { z } from 'zod';
import { writeFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { VIOLATION_KINDS, type MachineRecord, type ValidationReport } from './types.js';

export const DEFAULT_REPORT_PATH = 'architecture_report.json';

export const MachineRecordSchema = z
  .object({
    file: z.string(),
    line: z.number().int().nonnegative(),
    type: z.enum(VIOLATION_KINDS),
    detail: z.string(),
  })
  .strict();

export const MachineReportSchema = z.array(MachineRecordSchema);

export function toMachineRecords(report: ValidationReport): MachineRecord[] {
  return report.violations.map((v) => ({
    file: v.file,
    line: v.line,
    type: v.kind,
    detail: v.detail,
  }));
}

/**
 * Serialize the report. Identical reports give identical bytes.
 */
export function renderMachine(report: ValidationReport): string {
  return `${JSON.stringify(toMachineRecords(report), null, 2)}\n`;
}

/**
 * Write the machine report, clean or not.
 */
export async function writeMachineReport(filePath: string, report: ValidationReport): Promise<void> {
  try {
    await writeFile(filePath, renderMachine(report));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.WRITE_ERROR,
      `Failed to write report to ${filePath}: ${errorMessage(error)}`,
      { filePath }
    );
  }
}
