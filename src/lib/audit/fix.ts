/**
 * Automatic repairs.
 *
 * Each runner walks the discovered files one at a time, rewrites a file only
 * when something changed, and reports every applied fix as a `fixed` entry.
 * Per-file failures are recorded; a ConfigurationError aborts the run.
 */

import { readWorkItemFile, writeWorkItemFile } from '../frontmatter.js';
import { discoverWorkItemFiles } from '../discovery.js';
import { ParseError, WorkItemWriteError } from '../errors.js';
import { compileDatePattern, formatWithPattern, isIsoCalendarDate, parseAlternateDate, parseWithPattern } from '../local-date.js';
import { isHardcodedField } from '../schema.js';
import { isValidEmail } from '../validation.js';
import { applyFieldDefaults } from './defaults.js';
import { isEmptyFieldValue } from './emptiness.js';
import { addEntry, createReport, type ValidationReport } from './types.js';
import { displayFieldValue } from './value-utils.js';
import type { CompiledField, Schema } from '../../types/schema.js';
import type { FieldValue, ParsedWorkItem, WorkItem, WorkItemFile } from '../../types/work-item.js';

const ISO_PATTERN = compileDatePattern();

export interface FixRunOptions {
  /** Clock for `today` defaults */
  now?: Date | undefined;
}

// ============================================================================
// Value Fixes
// ============================================================================

function fixDate(value: string, field: CompiledField): string | null {
  if (parseWithPattern(value, field.datePattern) !== null) return null;

  const date = parseAlternateDate(value);
  if (date === null) return null;

  const fixed = formatWithPattern(date, field.datePattern);
  return fixed === value ? null : fixed;
}

function fixEnum(value: string, field: CompiledField): string | null {
  if (field.caseSensitive) return null;

  const allowed = field.config.allowed_values ?? [];
  const folded = value.trim().toLowerCase();
  const canonical = allowed.find(option => option.toLowerCase() === folded);

  if (canonical === undefined || canonical === value) return null;
  return canonical;
}

function fixEmail(value: string): string | null {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  const fixed = lower !== trimmed && isValidEmail(lower) ? lower : trimmed;
  return fixed === value ? null : fixed;
}

/**
 * Try to repair a stored value without requiring it to validate first.
 * Returns the corrected value, or null when there is nothing to fix.
 */
export function tryFixFieldValue(value: FieldValue, field: CompiledField): FieldValue | null {
  if (value.kind !== 'string') return null;

  let fixed: string | null;
  switch (field.type) {
    case 'date':
      fixed = fixDate(value.value, field);
      break;
    case 'enum':
      fixed = fixEnum(value.value, field);
      break;
    case 'email':
      fixed = fixEmail(value.value);
      break;
    default:
      fixed = null;
  }

  return fixed === null ? null : { kind: 'string', value: fixed };
}

/**
 * Normalize a hardcoded date (`created`) to YYYY-MM-DD.
 */
export function tryFixHardcodedDate(value: string): string | null {
  if (isIsoCalendarDate(value)) return null;
  const date = parseAlternateDate(value);
  return date === null ? null : formatWithPattern(date, ISO_PATTERN);
}

/**
 * Apply defaults and value fixes to one item in memory.
 *
 * @returns one message per applied fix, empty when nothing changed
 */
export function fixWorkItemFields(item: WorkItem, schema: Schema, now?: Date): string[] {
  const messages = applyFieldDefaults(item, schema, now).map(
    name => `fixed field '${name}': applied default value`
  );

  for (const [name, field] of schema.fields) {
    if (isHardcodedField(name)) continue;

    const value = item.fields[name];
    if (value === undefined || isEmptyFieldValue(value)) continue;

    const fixed = tryFixFieldValue(value, field);
    if (fixed) {
      item.fields[name] = fixed;
      messages.push(
        `fixed field '${name}': corrected value (${displayFieldValue(value)} -> ${displayFieldValue(fixed)})`
      );
    }
  }

  return messages;
}

// ============================================================================
// Runners
// ============================================================================

/**
 * Read a work item for a repair pass. Read failures are recorded as
 * `parse-error` entries and yield null; with `skipParseErrors`, malformed
 * front matter is left for validation to report.
 */
export async function readWorkItemForFix(
  root: string,
  file: WorkItemFile,
  report: ValidationReport,
  context: string,
  options: { skipParseErrors?: boolean } = {}
): Promise<ParsedWorkItem | null> {
  try {
    return await readWorkItemFile(root, file.path);
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    if (options.skipParseErrors && err instanceof ParseError) return null;
    addEntry(report, file.relativePath, 'parse-error', `${context}: failed to parse file: ${err.message}`);
    return null;
  }
}

async function writeFixed(
  root: string,
  file: WorkItemFile,
  parsed: ParsedWorkItem,
  report: ValidationReport,
  context: string
): Promise<boolean> {
  try {
    await writeWorkItemFile(root, file.path, parsed.item, parsed.body, parsed.eol);
    return true;
  } catch (err) {
    if (!(err instanceof WorkItemWriteError)) throw err;
    addEntry(report, file.relativePath, 'write-failed', `${context}: ${err.message}`);
    return false;
  }
}

/**
 * Apply defaults and value fixes to every work item.
 */
export async function fixFieldIssues(
  schema: Schema,
  root: string,
  options: FixRunOptions = {}
): Promise<ValidationReport> {
  const report = createReport();
  if (schema.fields.size === 0) {
    return report;
  }

  for (const file of await discoverWorkItemFiles(root, schema)) {
    const parsed = await readWorkItemForFix(root, file, report, 'failed to fix fields');
    if (!parsed) continue;

    const messages = fixWorkItemFields(parsed.item, schema, options.now);
    if (messages.length === 0) continue;

    if (await writeFixed(root, file, parsed, report, 'failed to write fixes')) {
      for (const message of messages) {
        addEntry(report, file.relativePath, 'fixed', message);
      }
    }
  }

  return report;
}

/**
 * Normalize the hardcoded `created` field with the alternate date encodings.
 * Files with malformed front matter are left to validation; other read
 * failures are recorded.
 */
export async function fixHardcodedDateFormats(schema: Schema, root: string): Promise<ValidationReport> {
  const report = createReport();

  for (const file of await discoverWorkItemFiles(root, schema)) {
    const parsed = await readWorkItemForFix(root, file, report, 'failed to fix created date', {
      skipParseErrors: true,
    });
    if (!parsed) continue;

    const original = parsed.item.created;
    if (original === '') continue;

    const fixed = tryFixHardcodedDate(original);
    if (fixed === null) continue;

    parsed.item.created = fixed;
    if (await writeFixed(root, file, parsed, report, 'failed to fix created date')) {
      addEntry(report, file.relativePath, 'fixed', `fixed created date format: ${original} -> ${fixed}`);
    }
  }

  return report;
}
