import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import {
  fixFieldIssues,
  fixHardcodedDateFormats,
  fixWorkItemFields,
  tryFixFieldValue,
  tryFixHardcodedDate,
} from '../../../src/lib/audit/fix.js';
import { compileField, compileSchema, loadSchema } from '../../../src/lib/schema.js';
import { createEmptyWorkItem } from '../../../src/lib/frontmatter.js';
import { ConfigurationError } from '../../../src/lib/errors.js';
import type { Schema } from '../../../src/types/schema.js';
import type { FieldValue } from '../../../src/types/work-item.js';
import {
  cleanupTestWorkspace,
  createTestWorkspace,
  FIXTURE_WORKSPACE,
  NOW,
  readWorkFile,
  writeWorkFile,
  workItem,
} from '../fixtures/setup.js';

const str = (value: string): FieldValue => ({ kind: 'string', value });

const HEADER = ['id: 004', 'title: Normalize me', 'status: todo', 'kind: task'];

describe('audit fix', () => {
  describe('tryFixFieldValue', () => {
    it('should rewrite alternate date encodings in the field pattern', () => {
      const iso = compileField('due', { type: 'date' });
      const european = compileField('due', { type: 'date', format: 'DD.MM.YYYY' });

      expect(tryFixFieldValue(str('2026/01/07'), iso)).toEqual(str('2026-01-07'));
      expect(tryFixFieldValue(str('01/07/2026'), iso)).toEqual(str('2026-01-07'));
      expect(tryFixFieldValue(str('2026-01-07T22:10:00+05:00'), iso)).toEqual(str('2026-01-07'));
      expect(tryFixFieldValue(str('2026-01-07'), european)).toEqual(str('07.01.2026'));
    });

    it('should carry the time of a timestamp into patterns with time tokens', () => {
      const stamped = compileField('due', { type: 'date', format: 'YYYY-MM-DD HH:mm' });

      expect(tryFixFieldValue(str('2026-01-05T10:30:00Z'), stamped)).toEqual(str('2026-01-05 10:30'));
      expect(tryFixFieldValue(str('2026/01/05'), stamped)).toEqual(str('2026-01-05 00:00'));
    });

    it('should leave valid and unrecognized dates alone', () => {
      const iso = compileField('due', { type: 'date' });

      expect(tryFixFieldValue(str('2026-01-07'), iso)).toBeNull();
      expect(tryFixFieldValue(str('next week'), iso)).toBeNull();
      expect(tryFixFieldValue({ kind: 'number', value: 20260107 }, iso)).toBeNull();
    });

    it('should fold enum case only for case-insensitive fields', () => {
      const folded = compileField('priority', {
        type: 'enum',
        allowed_values: ['low', 'medium', 'high'],
        case_sensitive: false,
      });
      const exact = compileField('priority', { type: 'enum', allowed_values: ['low', 'medium', 'high'] });

      expect(tryFixFieldValue(str('MEDIUM'), folded)).toEqual(str('medium'));
      expect(tryFixFieldValue(str(' High '), folded)).toEqual(str('high'));
      expect(tryFixFieldValue(str('medium'), folded)).toBeNull();
      expect(tryFixFieldValue(str('MEDIUM'), exact)).toBeNull();
      expect(tryFixFieldValue(str(' high '), exact)).toBeNull();
      expect(tryFixFieldValue(str('urgent'), folded)).toBeNull();
    });

    it('should trim and lowercase emails', () => {
      const field = compileField('assignee', { type: 'email' });

      expect(tryFixFieldValue(str(' Dev@Example.com '), field)).toEqual(str('dev@example.com'));
      expect(tryFixFieldValue(str('dev@example.com'), field)).toBeNull();
    });
  });

  describe('tryFixHardcodedDate', () => {
    it('should normalize created dates to YYYY-MM-DD', () => {
      expect(tryFixHardcodedDate('2026/01/05')).toBe('2026-01-05');
      expect(tryFixHardcodedDate('01/05/2026')).toBe('2026-01-05');
      expect(tryFixHardcodedDate('2026-01-05')).toBeNull();
      expect(tryFixHardcodedDate('soon')).toBeNull();
    });
  });

  describe('fixWorkItemFields', () => {
    let schema: Schema;

    beforeAll(async () => {
      schema = await loadSchema(FIXTURE_WORKSPACE);
    });

    it('should fix a case-insensitive enum exactly once', () => {
      const item = createEmptyWorkItem();
      item.fields['priority'] = str('MEDIUM');

      expect(fixWorkItemFields(item, schema, NOW)).toEqual([
        "fixed field 'priority': corrected value (MEDIUM -> medium)",
      ]);
      expect(item.fields['priority']).toEqual(str('medium'));
      expect(fixWorkItemFields(item, schema, NOW)).toEqual([]);
    });

    it('should report applied defaults before corrected values', () => {
      const item = createEmptyWorkItem();
      item.fields['assignee'] = str('Dev@Example.com');

      expect(fixWorkItemFields(item, schema, NOW)).toEqual([
        "fixed field 'priority': applied default value",
        "fixed field 'assignee': corrected value (Dev@Example.com -> dev@example.com)",
      ]);
    });
  });

  describe('runners', () => {
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

    describe('fixFieldIssues', () => {
      it('should rewrite only the files that change', async () => {
        await writeWorkFile(
          workspaceDir,
          '1_todo/004-normalize.md',
          workItem([...HEADER, 'created: 2026-01-06', 'due: 2026/02/01', 'priority: MEDIUM'], 'Body text\n')
        );
        await writeWorkFile(
          workspaceDir,
          '1_todo/005-no-priority.md',
          workItem(['id: 005', 'title: Defaults', 'status: todo', 'kind: task', 'created: 2026-01-07'])
        );
        const untouched = await readWorkFile(workspaceDir, '1_todo/001-set-up-ci.md');

        const report = await fixFieldIssues(schema, root, { now: NOW });

        expect(report.entries).toEqual([
          {
            file: '1_todo/004-normalize.md',
            code: 'fixed',
            message: "fixed field 'due': corrected value (2026/02/01 -> 2026-02-01)",
          },
          {
            file: '1_todo/004-normalize.md',
            code: 'fixed',
            message: "fixed field 'priority': corrected value (MEDIUM -> medium)",
          },
          { file: '1_todo/005-no-priority.md', code: 'fixed', message: "fixed field 'priority': applied default value" },
        ]);
        expect(await readWorkFile(workspaceDir, '1_todo/004-normalize.md')).toBe(
          workItem([...HEADER, 'created: 2026-01-06', 'due: 2026-02-01', 'priority: medium'], 'Body text\n')
        );
        expect(await readWorkFile(workspaceDir, '1_todo/001-set-up-ci.md')).toBe(untouched);
      });

      it('should keep large integers when rewriting for a default', async () => {
        await writeWorkFile(
          workspaceDir,
          '1_todo/004-ticket.md',
          workItem([...HEADER, 'created: 2026-01-06', 'ticket: 9007199254740993'])
        );

        await fixFieldIssues(schema, root, { now: NOW });

        expect(await readWorkFile(workspaceDir, '1_todo/004-ticket.md')).toBe(
          workItem([...HEADER, 'created: 2026-01-06', 'priority: medium', 'ticket: 9007199254740993'])
        );
      });

      it('should find nothing left to fix on a second run', async () => {
        await writeWorkFile(
          workspaceDir,
          '1_todo/004-normalize.md',
          workItem([...HEADER, 'created: 2026-01-06', 'priority: HIGH'])
        );

        await fixFieldIssues(schema, root, { now: NOW });
        const second = await fixFieldIssues(schema, root, { now: NOW });

        expect(second.entries).toEqual([]);
      });

      it('should record files it cannot parse', async () => {
        await writeWorkFile(workspaceDir, '1_todo/006-broken.md', '---\nid: 006\n');

        const report = await fixFieldIssues(schema, root, { now: NOW });

        expect(report.entries).toEqual([
          {
            file: '1_todo/006-broken.md',
            code: 'parse-error',
            message: 'failed to fix fields: failed to parse file: unterminated front matter block',
          },
        ]);
      });

      it('should abort on a default the field cannot hold', async () => {
        const broken = compileSchema({ fields: { due: { type: 'date', default: 'someday' } } });

        await expect(fixFieldIssues(broken, root, { now: NOW })).rejects.toThrow(ConfigurationError);
      });

      it('should do nothing without configured fields', async () => {
        await writeWorkFile(workspaceDir, '1_todo/006-broken.md', '---\nid: 006\n');

        const report = await fixFieldIssues(compileSchema({}), root, { now: NOW });
        expect(report.entries).toEqual([]);
      });
    });

    describe('fixHardcodedDateFormats', () => {
      it('should normalize created dates and skip unparseable files', async () => {
        await writeWorkFile(
          workspaceDir,
          '1_todo/004-normalize.md',
          workItem([...HEADER, 'created: 01/06/2026', 'priority: low'], 'Body\n')
        );
        await writeWorkFile(
          workspaceDir,
          '1_todo/005-timestamp.md',
          workItem(['id: 005', 'title: Stamped', 'status: todo', 'kind: task', 'created: 2026-01-07T09:00:00+02:00'])
        );
        await writeWorkFile(workspaceDir, '1_todo/006-broken.md', '---\ncreated: 2026/01/08\n');

        const report = await fixHardcodedDateFormats(schema, root);

        expect(report.entries).toEqual([
          { file: '1_todo/004-normalize.md', code: 'fixed', message: 'fixed created date format: 01/06/2026 -> 2026-01-06' },
          {
            file: '1_todo/005-timestamp.md',
            code: 'fixed',
            message: 'fixed created date format: 2026-01-07T09:00:00+02:00 -> 2026-01-07',
          },
        ]);
        expect(await readWorkFile(workspaceDir, '1_todo/004-normalize.md')).toBe(
          workItem([...HEADER, 'created: 2026-01-06', 'priority: low'], 'Body\n')
        );
      });
    });
  });
});
