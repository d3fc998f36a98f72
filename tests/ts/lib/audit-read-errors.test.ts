import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';

// Reads of any file named 007-locked.md fail as if permission were denied
vi.mock('fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readFile: vi.fn(async (...args: Parameters<typeof actual.readFile>) => {
      const [path] = args;
      if (typeof path === 'string' && path.endsWith('007-locked.md')) {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      }
      return actual.readFile(...args);
    }),
  };
});

import { fixHardcodedDateFormats } from '../../../src/lib/audit/fix.js';
import { fixDuplicateIds } from '../../../src/lib/audit/ids.js';
import { runDoctor } from '../../../src/commands/doctor.js';
import { ExitCodes } from '../../../src/lib/output.js';
import { loadSchema } from '../../../src/lib/schema.js';
import type { Schema } from '../../../src/types/schema.js';
import {
  captureConsole,
  cleanupTestWorkspace,
  createTestWorkspace,
  NOW,
  setWorkFileTime,
  writeWorkFile,
  workItem,
} from '../fixtures/setup.js';

const LOCKED = workItem(['id: 007', 'title: Locked', 'status: todo', 'kind: task', 'created: 2026/01/08']);

describe('repairs with unreadable files', () => {
  let workspaceDir: string;
  let root: string;
  let schema: Schema;

  beforeEach(async () => {
    workspaceDir = await createTestWorkspace();
    root = join(workspaceDir, '.work');
    schema = await loadSchema(workspaceDir);
    await writeWorkFile(workspaceDir, '1_todo/007-locked.md', LOCKED);
  });

  afterEach(async () => {
    await cleanupTestWorkspace(workspaceDir);
  });

  it('should record the file and keep normalizing created dates', async () => {
    await writeWorkFile(
      workspaceDir,
      '1_todo/004-normalize.md',
      workItem(['id: 004', 'title: Normalize me', 'status: todo', 'kind: task', 'created: 01/06/2026'])
    );

    const report = await fixHardcodedDateFormats(schema, root);

    expect(report.entries).toEqual([
      { file: '1_todo/004-normalize.md', code: 'fixed', message: 'fixed created date format: 01/06/2026 -> 2026-01-06' },
      {
        file: '1_todo/007-locked.md',
        code: 'parse-error',
        message: 'failed to fix created date: failed to parse file: EACCES: permission denied',
      },
    ]);
  });

  it('should record the file and keep fixing duplicate IDs', async () => {
    await writeWorkFile(
      workspaceDir,
      '1_todo/005-copy.md',
      workItem(['id: 001', 'title: Copy', 'status: todo', 'kind: task', 'created: 2026-01-06'])
    );
    await setWorkFileTime(workspaceDir, '1_todo/001-set-up-ci.md', 1_000_000);
    await setWorkFileTime(workspaceDir, '1_todo/005-copy.md', 2_000_000);

    const report = await fixDuplicateIds(schema, root);

    expect(report.entries).toEqual([
      {
        file: '1_todo/007-locked.md',
        code: 'parse-error',
        message: 'failed to load IDs: failed to parse file: EACCES: permission denied',
      },
      { file: '1_todo/005-copy.md', code: 'fixed', message: 'fixed duplicate ID: 001 -> 004' },
    ]);
  });

  it('should finish the doctor run and report the file as remaining', async () => {
    const output = captureConsole();
    try {
      const code = await runDoctor({}, { workspaceDir, now: NOW });

      expect(code).toBe(ExitCodes.VALIDATION_ERROR);
      expect(output.stdout().split('\n')).toContain(
        '  ✗ 1_todo/007-locked.md: failed to parse file: EACCES: permission denied'
      );
    } finally {
      output.restore();
    }
  });
});
