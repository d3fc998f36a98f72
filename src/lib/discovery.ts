/**
 * Work item discovery.
 *
 * Finds the markdown files under the work folder, skipping templates,
 * IDEAS.md and anything matched by `ignored_paths`.
 */

import ignore from 'ignore';
import { minimatch } from 'minimatch';
import { readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { toReportPath } from './workspace.js';
import type { Schema } from '../types/schema.js';
import type { WorkItemFile } from '../types/work-item.js';

const IDEAS_FILE = 'IDEAS.md';

type Ignore = ReturnType<typeof ignore>;

const stablePathCompare = (a: WorkItemFile, b: WorkItemFile): number =>
  a.relativePath.localeCompare(b.relativePath, 'en');

/**
 * Whether a discovered markdown file is excluded by the fixed rules.
 */
export function isExcludedWorkItemPath(relativePath: string): boolean {
  const name = relativePath.split('/').pop() ?? relativePath;
  return relativePath.includes('template') || name === IDEAS_FILE;
}

/**
 * Build the matcher for `ignored_paths` (gitignore syntax).
 */
export function buildIgnoreMatcher(patterns: readonly string[]): Ignore {
  return ignore().add([...patterns]);
}

async function collectMarkdownFiles(dir: string, root: string, ignored: Ignore): Promise<WorkItemFile[]> {
  const files: WorkItemFile[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    const relativePath = toReportPath(root, fullPath);

    if (entry.isDirectory()) {
      if (ignored.ignores(`${relativePath}/`)) continue;
      files.push(...(await collectMarkdownFiles(fullPath, root, ignored)));
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      if (isExcludedWorkItemPath(relativePath) || ignored.ignores(relativePath)) continue;
      files.push({ path: fullPath, relativePath });
    }
  }

  return files;
}

/**
 * Discover all work item files under the work root.
 * A missing work folder yields no files.
 */
export async function discoverWorkItemFiles(root: string, schema: Schema): Promise<WorkItemFile[]> {
  if (!existsSync(root)) {
    return [];
  }
  const files = await collectMarkdownFiles(root, root, buildIgnoreMatcher(schema.ignoredPaths));
  // Sort for deterministic ordering across platforms (readdir order varies by filesystem)
  return files.sort(stablePathCompare);
}

/**
 * Restrict files to a glob pattern, or to a substring for plain patterns.
 */
export function filterByPath(files: WorkItemFile[], pattern: string): WorkItemFile[] {
  const isGlob = /[*?[\]]/.test(pattern);
  if (isGlob) {
    return files.filter(file => minimatch(file.relativePath, pattern, { matchBase: true }));
  }
  return files.filter(file => file.relativePath.includes(pattern));
}
