/**
 * Report types and interfaces.
 *
 * Validation and repair share one report shape: an ordered list of entries,
 * each tagged with the file it concerns. Repairs use the `fixed` code.
 */

// ============================================================================
// Entry Types
// ============================================================================

/**
 * Codes for report entries.
 */
export type IssueCode =
  | 'parse-error'
  | 'missing-required'
  | 'invalid-id'
  | 'invalid-status'
  | 'invalid-date'
  | 'invalid-field'
  | 'unknown-field'
  | 'duplicate-id'
  | 'workflow'
  | 'write-failed'
  | 'fixed';

/**
 * A single report entry.
 */
export interface ReportEntry {
  /** Path relative to the work folder (`workflow` for the doing-folder rule) */
  file: string;
  message: string;
  code: IssueCode;
  suggestion?: string | undefined;
}

export interface ValidationReport {
  entries: ReportEntry[];
}

/** File name attached to workflow entries. */
export const WORKFLOW_FILE = 'workflow';

export function createReport(): ValidationReport {
  return { entries: [] };
}

export function addEntry(
  report: ValidationReport,
  file: string,
  code: IssueCode,
  message: string,
  suggestion?: string
): void {
  report.entries.push(suggestion === undefined ? { file, code, message } : { file, code, message, suggestion });
}

/**
 * Append every entry of `source` to `target`, keeping order.
 */
export function mergeReports(target: ValidationReport, source: ValidationReport): void {
  target.entries.push(...source.entries);
}

/**
 * Entries that are findings rather than applied fixes.
 */
export function problemEntries(report: ValidationReport): ReportEntry[] {
  return report.entries.filter(entry => entry.code !== 'fixed');
}

export function hasErrors(report: ValidationReport): boolean {
  return problemEntries(report).length > 0;
}

// ============================================================================
// Fix Types
// ============================================================================

/**
 * Summary of a doctor run.
 */
export interface FixSummary {
  fixed: number;
  failed: number;
  remaining: number;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Lint command options.
 */
export interface LintOptions {
  strict?: boolean;
  path?: string;
  output?: string;
}

/**
 * Doctor command options.
 */
export interface DoctorOptions {
  strict?: boolean;
  output?: string;
}

/**
 * Options for a validation run.
 */
export interface ValidationRunOptions {
  /** Overrides `validation.strict` when set */
  strict?: boolean | undefined;
  /** Glob or substring restricting which files are checked */
  pathFilter?: string | undefined;
  /** Clock for relative dates */
  now?: Date | undefined;
}
