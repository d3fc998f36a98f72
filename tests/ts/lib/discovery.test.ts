import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { cleanupTestWorkspace, createTestWorkspace, writeWorkFile, workItem } from '../fixtures/setup.js';
import { discoverWorkItemFiles, filterByPath, isExcludedWorkItemPath } from '../../../src/lib/discovery.js';
import { compileSchema } from '../../../src/lib/schema.js';

describe('discovery', () => {
  let workspaceDir: string;
  let root: string;

  beforeEach(async () => {
    workspaceDir = await createTestWorkspace();
    root = join(workspaceDir, '.work');
  });

  afterEach(async () => {
    await cleanupTestWorkspace(workspaceDir);
  });

  describe('discoverWorkItemFiles', () => {
    it('should find work items sorted by relative path', async () => {
      const files = await discoverWorkItemFiles(root, compileSchema({}));

      expect(files.map(file => file.relativePath)).toEqual([
        '1_todo/001-set-up-ci.md',
        '2_doing/002-fix-login.md',
        '4_done/003-write-docs.md',
      ]);
      expect(files[0]?.path).toBe(join(root, '1_todo', '001-set-up-ci.md'));
    });

    it('should descend into nested folders and skip other extensions', async () => {
      await writeWorkFile(workspaceDir, '4_done/2025/004-old.md', workItem(['id: 004']));
      await writeWorkFile(workspaceDir, '1_todo/notes.txt', 'not markdown');

      const files = await discoverWorkItemFiles(root, compileSchema({}));

      expect(files.map(file => file.relativePath)).toContain('4_done/2025/004-old.md');
      expect(files.map(file => file.relativePath)).not.toContain('1_todo/notes.txt');
    });

    it('should skip paths matched by ignored_paths', async () => {
      const schema = compileSchema({ ignored_paths: ['4_done/', '*-fix-*.md'] });
      const files = await discoverWorkItemFiles(root, schema);

      expect(files.map(file => file.relativePath)).toEqual(['1_todo/001-set-up-ci.md']);
    });

    it('should return nothing for a missing work folder', async () => {
      expect(await discoverWorkItemFiles(join(workspaceDir, 'missing'), compileSchema({}))).toEqual([]);
    });
  });

  describe('isExcludedWorkItemPath', () => {
    it('should exclude templates and IDEAS.md', () => {
      expect(isExcludedWorkItemPath('templates/task.md')).toBe(true);
      expect(isExcludedWorkItemPath('1_todo/task-template.md')).toBe(true);
      expect(isExcludedWorkItemPath('0_backlog/IDEAS.md')).toBe(true);
      expect(isExcludedWorkItemPath('1_todo/001-ideas.md')).toBe(false);
    });
  });

  describe('filterByPath', () => {
    it('should match globs and substrings', async () => {
      const files = await discoverWorkItemFiles(root, compileSchema({}));

      expect(filterByPath(files, '2_doing/*').map(file => file.relativePath)).toEqual(['2_doing/002-fix-login.md']);
      expect(filterByPath(files, '00[13]-*.md').map(file => file.relativePath)).toEqual([
        '1_todo/001-set-up-ci.md',
        '4_done/003-write-docs.md',
      ]);
      expect(filterByPath(files, 'docs').map(file => file.relativePath)).toEqual(['4_done/003-write-docs.md']);
    });
  });
});
