import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { fixDuplicateIds, formatId, getNextId } from '../../../src/lib/audit/ids.js';
import { validateWorkItems } from '../../../src/lib/audit/detection.js';
import { loadSchema } from '../../../src/lib/schema.js';
import type { Schema } from '../../../src/types/schema.js';
import {
  cleanupTestWorkspace,
  createTestWorkspace,
  readWorkFile,
  setWorkFileTime,
  writeWorkFile,
  workItem,
} from '../fixtures/setup.js';

function itemLines(id: string, title: string): string[] {
  return [`id: ${id}`, `title: ${title}`, 'status: todo', 'kind: task', 'created: 2026-01-06'];
}

describe('audit ids', () => {
  let workspaceDir: string;
  let root: string;
  let schema: Schema;

  beforeEach(async () => {
    workspaceDir = await createTestWorkspace();
    root = join(workspaceDir, '.work');
    schema = await loadSchema(workspaceDir);
  });

  afterEach(async () => {
    await cleanupTestWorkspace(workspaceDir);
  });

  describe('getNextId', () => {
    it('should pad the next free ID to three digits', async () => {
      expect(await getNextId(schema, root)).toBe('004');
      expect(formatId(12)).toBe('012');
      expect(formatId(1200)).toBe('1200');
    });
  });

  describe('fixDuplicateIds', () => {
    it('should keep the oldest file and renumber the newer one', async () => {
      await writeWorkFile(workspaceDir, '1_todo/004-copy.md', workItem(itemLines('001', 'Copy'), 'Copied body\n'));
      await setWorkFileTime(workspaceDir, '1_todo/001-set-up-ci.md', 1_000_000);
      await setWorkFileTime(workspaceDir, '1_todo/004-copy.md', 2_000_000);

      const report = await fixDuplicateIds(schema, root);

      expect(report.entries).toEqual([
        { file: '1_todo/004-copy.md', code: 'fixed', message: 'fixed duplicate ID: 001 -> 004' },
      ]);
      expect(await readWorkFile(workspaceDir, '1_todo/004-copy.md')).toBe(
        workItem(itemLines('004', 'Copy'), 'Copied body\n')
      );
      expect((await validateWorkItems(schema, root)).entries).toEqual([]);
    });

    it('should renumber the original when the copy is older', async () => {
      await writeWorkFile(workspaceDir, '1_todo/004-copy.md', workItem(itemLines('001', 'Copy')));
      await setWorkFileTime(workspaceDir, '1_todo/001-set-up-ci.md', 3_000_000);
      await setWorkFileTime(workspaceDir, '1_todo/004-copy.md', 1_000_000);

      const report = await fixDuplicateIds(schema, root);

      expect(report.entries).toEqual([
        { file: '1_todo/001-set-up-ci.md', code: 'fixed', message: 'fixed duplicate ID: 001 -> 004' },
      ]);
    });

    it('should break ties by path and hand out consecutive IDs', async () => {
      await writeWorkFile(workspaceDir, '1_todo/004-copy.md', workItem(itemLines('001', 'Copy')));
      await writeWorkFile(workspaceDir, '1_todo/005-copy.md', workItem(itemLines('001', 'Another copy')));
      for (const path of ['1_todo/001-set-up-ci.md', '1_todo/004-copy.md', '1_todo/005-copy.md']) {
        await setWorkFileTime(workspaceDir, path, 1_000_000);
      }

      const report = await fixDuplicateIds(schema, root);

      expect(report.entries).toEqual([
        { file: '1_todo/004-copy.md', code: 'fixed', message: 'fixed duplicate ID: 001 -> 004' },
        { file: '1_todo/005-copy.md', code: 'fixed', message: 'fixed duplicate ID: 001 -> 005' },
      ]);
    });

    it('should report a generated ID that breaks id_format', async () => {
      await writeWorkFile(workspaceDir, '1_todo/998-first.md', workItem(itemLines('999', 'First')));
      await writeWorkFile(workspaceDir, '1_todo/999-second.md', workItem(itemLines('999', 'Second')));
      await setWorkFileTime(workspaceDir, '1_todo/998-first.md', 1_000_000);
      await setWorkFileTime(workspaceDir, '1_todo/999-second.md', 2_000_000);

      const report = await fixDuplicateIds(schema, root);

      expect(report.entries).toEqual([
        {
          file: '1_todo/999-second.md',
          code: 'invalid-id',
          message: 'failed to fix duplicate ID 999: generated ID 1000 does not match ^\\d{3}$',
        },
      ]);
      expect(await readWorkFile(workspaceDir, '1_todo/999-second.md')).toBe(workItem(itemLines('999', 'Second')));
    });

    it('should do nothing without duplicates', async () => {
      expect((await fixDuplicateIds(schema, root)).entries).toEqual([]);
    });
  });
});
