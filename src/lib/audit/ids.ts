/**
 * Work item IDs: next free ID and duplicate repair.
 */

import { stat } from 'fs/promises';
import { writeWorkItemFile } from '../frontmatter.js';
import { discoverWorkItemFiles } from '../discovery.js';
import { WorkItemWriteError } from '../errors.js';
import { readWorkItemForFix } from './fix.js';
import { addEntry, createReport, type ValidationReport } from './types.js';
import type { Schema } from '../../types/schema.js';
import type { ParsedWorkItem, WorkItemFile } from '../../types/work-item.js';

const ID_WIDTH = 3;
const NUMERIC_ID = /^\d+$/;

interface LoadedItem {
  file: WorkItemFile;
  parsed: ParsedWorkItem;
}

async function loadItems(schema: Schema, root: string, report: ValidationReport): Promise<LoadedItem[]> {
  const items: LoadedItem[] = [];
  for (const file of await discoverWorkItemFiles(root, schema)) {
    // Unparseable files hold no ID; validation reports them
    const parsed = await readWorkItemForFix(root, file, report, 'failed to load IDs', { skipParseErrors: true });
    if (parsed) {
      items.push({ file, parsed });
    }
  }
  return items;
}

function maxNumericId(items: LoadedItem[]): number {
  let max = 0;
  for (const { parsed } of items) {
    const id = parsed.item.id;
    if (NUMERIC_ID.test(id)) {
      max = Math.max(max, parseInt(id, 10));
    }
  }
  return max;
}

export function formatId(value: number): string {
  return String(value).padStart(ID_WIDTH, '0');
}

/**
 * The next free ID: highest numeric ID plus one, zero-padded to three digits.
 */
export async function getNextId(schema: Schema, root: string): Promise<string> {
  return formatId(maxNumericId(await loadItems(schema, root, createReport())) + 1);
}

async function sortOldestFirst(group: LoadedItem[]): Promise<LoadedItem[]> {
  const withTimes: Array<{ item: LoadedItem; mtime: number }> = [];
  for (const item of group) {
    const info = await stat(item.file.path);
    withTimes.push({ item, mtime: info.mtimeMs });
  }

  withTimes.sort(
    (a, b) => a.mtime - b.mtime || a.item.file.relativePath.localeCompare(b.item.file.relativePath, 'en')
  );
  return withTimes.map(entry => entry.item);
}

/**
 * Give every file sharing an ID, except the oldest, a fresh ID.
 */
export async function fixDuplicateIds(schema: Schema, root: string): Promise<ValidationReport> {
  const report = createReport();
  const items = await loadItems(schema, root, report);

  const groups = new Map<string, LoadedItem[]>();
  for (const item of items) {
    const id = item.parsed.item.id;
    if (id === '') continue;
    groups.set(id, [...(groups.get(id) ?? []), item]);
  }

  let nextId = maxNumericId(items);
  const { idFormat, idFormatSource } = schema.validation;

  for (const [id, group] of groups) {
    if (group.length < 2) continue;

    const [, ...newer] = await sortOldestFirst(group);
    for (const { file, parsed } of newer) {
      nextId += 1;
      const newId = formatId(nextId);
      if (!idFormat.test(newId)) {
        addEntry(
          report,
          file.relativePath,
          'invalid-id',
          `failed to fix duplicate ID ${id}: generated ID ${newId} does not match ${idFormatSource}`
        );
        continue;
      }

      parsed.item.id = newId;
      try {
        await writeWorkItemFile(root, file.path, parsed.item, parsed.body, parsed.eol);
      } catch (err) {
        if (!(err instanceof WorkItemWriteError)) throw err;
        addEntry(report, file.relativePath, 'write-failed', `failed to update ID: ${err.message}`);
        continue;
      }
      addEntry(report, file.relativePath, 'fixed', `fixed duplicate ID: ${id} -> ${newId}`);
    }
  }

  return report;
}
