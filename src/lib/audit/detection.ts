/**
 * Work item validation.
 *
 * Per-file checks run in discovery order; duplicate IDs and the
 * doing-folder rule are evaluated once every file has been read.
 */

import { basename, join } from 'path';
import { readWorkItemFile } from '../frontmatter.js';
import { discoverWorkItemFiles, filterByPath } from '../discovery.js';
import { getDoingFolder, isHardcodedField } from '../schema.js';
import { isIsoCalendarDate } from '../local-date.js';
import { suggestEnumValue, suggestFieldName, validateFieldValue } from '../validation.js';
import { listFilesInDir } from '../workspace.js';
import { isEmptyFieldValue } from './emptiness.js';
import {
  addEntry,
  createReport,
  WORKFLOW_FILE,
  type ReportEntry,
  type ValidationReport,
  type ValidationRunOptions,
} from './types.js';
import type { Schema } from '../../types/schema.js';
import type { WorkItem, WorkItemFile } from '../../types/work-item.js';

// ============================================================================
// Per-file Checks
// ============================================================================

export interface ItemCheckOptions {
  strict?: boolean | undefined;
  now?: Date | undefined;
}

function entry(file: string, code: ReportEntry['code'], message: string, suggestion?: string): ReportEntry {
  return suggestion === undefined ? { file, code, message } : { file, code, message, suggestion };
}

function checkHardcodedFields(item: WorkItem, schema: Schema, file: string): ReportEntry[] {
  const entries: ReportEntry[] = [];
  const { requiredFields, idFormat, idFormatSource, statusValues } = schema.validation;

  for (const name of requiredFields) {
    if (name === 'id' || name === 'title' || name === 'status' || name === 'kind' || name === 'created') {
      if (item[name] === '') {
        entries.push(entry(file, 'missing-required', `missing required field: ${name}`));
      }
    }
  }

  if (item.id !== '' && !idFormat.test(item.id)) {
    entries.push(entry(file, 'invalid-id', `invalid ID format: ${item.id} (expected format: ${idFormatSource})`));
  }

  if (item.status !== '' && !statusValues.includes(item.status)) {
    const suggestion = suggestEnumValue(item.status, statusValues);
    entries.push(
      entry(
        file,
        'invalid-status',
        `invalid status '${item.status}'. Valid values: ${statusValues.join(', ')}`,
        suggestion === undefined ? undefined : `Did you mean '${suggestion}'?`
      )
    );
  }

  if (item.created !== '' && !isIsoCalendarDate(item.created)) {
    entries.push(entry(file, 'invalid-date', `invalid created date format: ${item.created}`));
  }

  return entries;
}

/**
 * Fields without a schema entry whose name mentions a date are still
 * expected to hold YYYY-MM-DD.
 */
function checkUndeclaredDates(item: WorkItem, schema: Schema, file: string): ReportEntry[] {
  const entries: ReportEntry[] = [];

  for (const name of Object.keys(item.fields).sort()) {
    if (schema.fields.has(name)) continue;
    if (!name.includes('date') && !name.includes('due')) continue;

    const value = item.fields[name];
    if (value?.kind === 'string' && value.value !== '' && !isIsoCalendarDate(value.value)) {
      entries.push(entry(file, 'invalid-date', `invalid ${name} date format: ${value.value}`));
    }
  }

  return entries;
}

function checkConfiguredFields(item: WorkItem, schema: Schema, file: string, now: Date | undefined): ReportEntry[] {
  const entries: ReportEntry[] = [];

  for (const [name, field] of schema.fields) {
    if (isHardcodedField(name) || !field.config.required) continue;
    if (isEmptyFieldValue(item.fields[name])) {
      entries.push(entry(file, 'missing-required', `missing required field: ${name}`));
    }
  }

  for (const name of Object.keys(item.fields).sort()) {
    const field = schema.fields.get(name);
    const value = item.fields[name];
    if (!field || value === undefined) continue;
    // Empty scalars are a "missing" problem, reported above when required
    if (value.kind === 'null' || (value.kind === 'string' && value.value === '')) continue;

    const issue = validateFieldValue(value, field, { now });
    if (issue) {
      entries.push(entry(file, 'invalid-field', issue.message, issue.suggestion));
    }
  }

  return entries;
}

function checkUnknownFields(item: WorkItem, schema: Schema, file: string): ReportEntry[] {
  const unknown = Object.keys(item.fields)
    .filter(name => !isHardcodedField(name) && !schema.fields.has(name))
    .sort();
  if (unknown.length === 0) return [];

  const known = [...schema.fields.keys()];
  const hints = unknown.flatMap(name => {
    const match = suggestFieldName(name, known);
    return match === undefined ? [] : [`'${name}' -> '${match}'`];
  });

  return [
    entry(
      file,
      'unknown-field',
      `unknown fields found (not in configuration): ${unknown.join(', ')}`,
      hints.length > 0 ? `Did you mean: ${hints.join(', ')}?` : undefined
    ),
  ];
}

/**
 * Run every per-file check against one parsed work item.
 */
export function validateWorkItem(
  item: WorkItem,
  schema: Schema,
  file: string,
  options: ItemCheckOptions = {}
): ReportEntry[] {
  const strict = options.strict ?? schema.validation.strict;

  const entries = [
    ...checkHardcodedFields(item, schema, file),
    ...checkUndeclaredDates(item, schema, file),
    ...checkConfiguredFields(item, schema, file, options.now),
  ];
  if (strict) {
    entries.push(...checkUnknownFields(item, schema, file));
  }
  return entries;
}

// ============================================================================
// Cross-file Checks
// ============================================================================

/**
 * One entry per ID held by more than one file, attached to the first file.
 */
export function findDuplicateIds(items: ReadonlyArray<{ file: string; id: string }>): ReportEntry[] {
  const groups = new Map<string, string[]>();
  for (const { file, id } of items) {
    if (id === '') continue;
    const group = groups.get(id);
    if (group) {
      group.push(file);
    } else {
      groups.set(id, [file]);
    }
  }

  const entries: ReportEntry[] = [];
  for (const [id, files] of groups) {
    const first = files[0];
    if (files.length > 1 && first !== undefined) {
      entries.push(entry(first, 'duplicate-id', `duplicate ID found: ${id} in files ${files.join(', ')}`));
    }
  }
  return entries;
}

/**
 * At most one markdown file may sit directly in the doing folder.
 */
export async function checkWorkflow(schema: Schema, root: string): Promise<ReportEntry[]> {
  const doing = getDoingFolder(schema);
  if (doing === undefined || doing === '') return [];

  const names = (await listFilesInDir(join(root, doing)))
    .map(file => basename(file))
    .sort((a, b) => a.localeCompare(b, 'en'));
  if (names.length <= 1) return [];

  return [
    entry(
      WORKFLOW_FILE,
      'workflow',
      `multiple items in doing folder. Only one item allowed at a time. Found: ${names.join(', ')}`
    ),
  ];
}

// ============================================================================
// Main Validation Runner
// ============================================================================

async function selectFiles(schema: Schema, root: string, pathFilter: string | undefined): Promise<WorkItemFile[]> {
  const files = await discoverWorkItemFiles(root, schema);
  return pathFilter ? filterByPath(files, pathFilter) : files;
}

/**
 * Validate every discovered work item under the work root.
 * Files are read one at a time; a file that cannot be parsed is reported
 * and skipped.
 */
export async function validateWorkItems(
  schema: Schema,
  root: string,
  options: ValidationRunOptions = {}
): Promise<ValidationReport> {
  const report = createReport();
  const files = await selectFiles(schema, root, options.pathFilter);
  const ids: Array<{ file: string; id: string }> = [];

  for (const file of files) {
    let item: WorkItem;
    try {
      ({ item } = await readWorkItemFile(root, file.path));
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      addEntry(report, file.relativePath, 'parse-error', `failed to parse file: ${err.message}`);
      continue;
    }

    report.entries.push(...validateWorkItem(item, schema, file.relativePath, options));
    ids.push({ file: file.relativePath, id: item.id });
  }

  report.entries.push(...findDuplicateIds(ids));
  report.entries.push(...(await checkWorkflow(schema, root)));
  return report;
}
