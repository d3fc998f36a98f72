import { readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { PathOutsideRootError, WorkspaceNotFoundError } from './errors.js';
import { loadSchema } from './schema.js';
import type { Schema } from '../types/schema.js';

/**
 * Resolve workspace directory from options, env, or cwd.
 */
export function resolveWorkspaceDir(options: { workspace?: string }): string {
  if (options.workspace) {
    return options.workspace;
  }
  if (process.env['WORKTRACK_WORKSPACE']) {
    return process.env['WORKTRACK_WORKSPACE'];
  }
  return process.cwd();
}

/**
 * Absolute path of the work folder (the root every item lives under).
 */
export function getWorkRoot(workspaceDir: string, schema: Schema): string {
  return resolve(workspaceDir, schema.workFolder);
}

export interface Workspace {
  schema: Schema;
  /** Absolute work folder path */
  root: string;
}

/**
 * Load the schema and locate the work folder of a workspace.
 */
export async function openWorkspace(workspaceDir: string): Promise<Workspace> {
  const schema = await loadSchema(workspaceDir);
  const root = getWorkRoot(workspaceDir, schema);
  if (!existsSync(root)) {
    throw new WorkspaceNotFoundError(schema.workFolder);
  }
  return { schema, root };
}

/**
 * Resolve a path against the work root, rejecting anything that lands
 * outside it (`..` segments, absolute paths elsewhere).
 */
export function resolveWithinRoot(root: string, filePath: string): string {
  const absoluteRoot = resolve(root);
  const absolutePath = isAbsolute(filePath) ? resolve(filePath) : resolve(absoluteRoot, filePath);
  const rel = relative(absoluteRoot, absolutePath);

  const escapes = rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
  if (!escapes) {
    return absolutePath;
  }
  throw new PathOutsideRootError(filePath);
}

/**
 * Path relative to the work root with `/` separators, for reports.
 */
export function toReportPath(root: string, filePath: string): string {
  return relative(resolve(root), resolve(filePath)).split(sep).join('/');
}

/**
 * List the .md files directly inside a directory (no recursion).
 */
export async function listFilesInDir(dirPath: string): Promise<string[]> {
  if (!existsSync(dirPath)) {
    return [];
  }

  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith('.md')) {
      files.push(join(dirPath, entry.name));
    }
  }

  return files;
}
