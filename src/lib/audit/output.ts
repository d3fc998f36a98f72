/**
 * Report output formatting.
 *
 * Text reports group entries by category; JSON output carries the raw
 * entries plus per-category counts.
 */

import chalk from 'chalk';
import { jsonSuccess, printJson, printSuccess, printWarning } from '../output.js';
import { problemEntries, type FixSummary, type IssueCode, type ReportEntry, type ValidationReport } from './types.js';

// ============================================================================
// Categories
// ============================================================================

export type ReportCategory = 'field' | 'unknown-field' | 'workflow' | 'duplicate' | 'parse' | 'other';

interface CategoryInfo {
  category: ReportCategory;
  title: string;
  /** Workflow entries are not tied to a file */
  includeFile: boolean;
}

const CATEGORIES: readonly CategoryInfo[] = [
  { category: 'field', title: 'Field Validation Errors', includeFile: true },
  { category: 'unknown-field', title: 'Unknown Fields', includeFile: true },
  { category: 'workflow', title: 'Workflow Errors', includeFile: false },
  { category: 'duplicate', title: 'Duplicate ID Errors', includeFile: true },
  { category: 'parse', title: 'Parse Errors', includeFile: true },
  { category: 'other', title: 'Other Errors', includeFile: true },
];

export function categorizeEntry(code: IssueCode): ReportCategory {
  switch (code) {
    case 'missing-required':
    case 'invalid-id':
    case 'invalid-status':
    case 'invalid-date':
    case 'invalid-field':
      return 'field';
    case 'unknown-field':
      return 'unknown-field';
    case 'workflow':
      return 'workflow';
    case 'duplicate-id':
      return 'duplicate';
    case 'parse-error':
      return 'parse';
    default:
      return 'other';
  }
}

export interface CategoryGroup extends CategoryInfo {
  entries: ReportEntry[];
}

/**
 * Non-empty categories in display order. Entries keep their report order.
 */
export function groupEntries(entries: readonly ReportEntry[]): CategoryGroup[] {
  return CATEGORIES.map(info => ({
    ...info,
    entries: entries.filter(entry => categorizeEntry(entry.code) === info.category),
  })).filter(group => group.entries.length > 0);
}

export function countByCategory(entries: readonly ReportEntry[]): Record<ReportCategory, number> {
  const counts: Record<ReportCategory, number> = {
    field: 0,
    'unknown-field': 0,
    workflow: 0,
    duplicate: 0,
    parse: 0,
    other: 0,
  };
  for (const entry of entries) {
    counts[categorizeEntry(entry.code)] += 1;
  }
  return counts;
}

// ============================================================================
// Text Output
// ============================================================================

export function formatEntry(entry: ReportEntry, includeFile: boolean): string {
  return includeFile ? `${entry.file}: ${entry.message}` : entry.message;
}

/**
 * Print grouped entries without a header.
 */
export function printCategorizedEntries(entries: readonly ReportEntry[]): void {
  for (const group of groupEntries(entries)) {
    console.log(chalk.bold(`${group.title} (${group.entries.length}):`));
    for (const entry of group.entries) {
      console.log(`  ${chalk.red('✗')} ${formatEntry(entry, group.includeFile)}`);
      if (entry.suggestion) {
        console.log(chalk.dim(`    ${entry.suggestion}`));
      }
    }
    console.log('');
  }
}

/**
 * Print a validation report as text.
 */
export function outputTextReport(report: ValidationReport): void {
  const problems = problemEntries(report);
  if (problems.length === 0) {
    printSuccess('No issues found. All work items are valid.');
    return;
  }

  console.log(chalk.bold(`Validation errors found (${problems.length} total):\n`));
  printCategorizedEntries(problems);
}

/**
 * Print the fixes one repair pass applied.
 */
export function outputFixedEntries(title: string, report: ValidationReport): void {
  const fixed = report.entries.filter(entry => entry.code === 'fixed');
  if (fixed.length === 0) return;

  console.log('');
  printSuccess(`✓ ${title}:`);
  for (const entry of fixed) {
    console.log(`  ${formatEntry(entry, true)}`);
  }
}

/**
 * Print what a doctor run left behind and its counts.
 */
export function outputFixResults(summary: FixSummary, remaining: readonly ReportEntry[]): void {
  console.log('');

  if (remaining.length > 0) {
    printWarning('Issues requiring manual attention:');
    console.log('');
    printCategorizedEntries(remaining);
    console.log(chalk.dim('These issues cannot be automatically fixed and need manual intervention.'));
  } else if (summary.fixed > 0) {
    printSuccess('All fixable issues have been resolved!');
  } else {
    printSuccess('All issues have been resolved!');
  }

  console.log('');
  console.log(chalk.bold('Summary:'));
  console.log(`  Fixed: ${summary.fixed} issues`);
  if (summary.failed > 0) {
    console.log(`  Failed: ${summary.failed} issues`);
  }
  console.log(`  Remaining: ${summary.remaining} issues`);
}

// ============================================================================
// JSON Output
// ============================================================================

function toJsonEntry(entry: ReportEntry): Record<string, string> {
  return {
    file: entry.file,
    code: entry.code,
    category: categorizeEntry(entry.code),
    message: entry.message,
    ...(entry.suggestion !== undefined && { suggestion: entry.suggestion }),
  };
}

/**
 * Print a validation report as JSON.
 */
export function outputJsonReport(report: ValidationReport): void {
  const problems = problemEntries(report);
  printJson(
    jsonSuccess({
      data: {
        valid: problems.length === 0,
        entries: problems.map(toJsonEntry),
        summary: { total: problems.length, ...countByCategory(problems) },
      },
    })
  );
}

/**
 * Print a doctor run as JSON.
 */
export function outputJsonFixResults(
  fixes: ValidationReport,
  summary: FixSummary,
  remaining: readonly ReportEntry[]
): void {
  printJson(
    jsonSuccess({
      data: {
        fixes: fixes.entries.map(toJsonEntry),
        remaining: remaining.map(toJsonEntry),
        summary,
      },
    })
  );
}
