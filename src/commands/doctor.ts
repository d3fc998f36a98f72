/**
 * Doctor command - validate, repair what can be repaired, re-validate.
 *
 * Repairs run in a fixed order: duplicate IDs, `created` date formats, then
 * configured-field defaults and value fixes. Whatever the second validation
 * still finds is reported as needing manual attention.
 */

import { Command } from 'commander';
import { ExitCodes, getOutputMode, printInfo, type ExitCode } from '../lib/output.js';
import { openWorkspace, resolveWorkspaceDir } from '../lib/workspace.js';
import { validateWorkItems } from '../lib/audit/detection.js';
import { fixFieldIssues, fixHardcodedDateFormats } from '../lib/audit/fix.js';
import { fixDuplicateIds } from '../lib/audit/ids.js';
import {
  outputFixedEntries,
  outputFixResults,
  outputJsonFixResults,
  outputJsonReport,
  outputTextReport,
} from '../lib/audit/output.js';
import {
  createReport,
  mergeReports,
  hasErrors,
  problemEntries,
  type DoctorOptions,
  type FixSummary,
  type ValidationReport,
} from '../lib/audit/types.js';
import { handleCommandError, type CommandContext } from './lint.js';
import type { Schema } from '../types/schema.js';

interface RepairPass {
  title: string;
  run: (schema: Schema, root: string, now: Date | undefined) => Promise<ValidationReport>;
}

const REPAIR_PASSES: readonly RepairPass[] = [
  { title: 'Fixed duplicate IDs', run: (schema, root) => fixDuplicateIds(schema, root) },
  { title: 'Fixed date formats', run: (schema, root) => fixHardcodedDateFormats(schema, root) },
  { title: 'Fixed field issues', run: (schema, root, now) => fixFieldIssues(schema, root, { now }) },
];

/**
 * Run every repair pass and print the fixes as they land (text mode).
 */
async function runRepairs(
  schema: Schema,
  root: string,
  now: Date | undefined,
  verbose: boolean
): Promise<ValidationReport> {
  const combined = createReport();
  for (const pass of REPAIR_PASSES) {
    const report = await pass.run(schema, root, now);
    if (verbose) {
      outputFixedEntries(pass.title, report);
    }
    mergeReports(combined, report);
  }
  return combined;
}

/**
 * @returns the process exit code
 */
export async function runDoctor(options: DoctorOptions, context: CommandContext): Promise<ExitCode> {
  const mode = getOutputMode(options);
  const text = mode === 'text';
  const runOptions = { strict: options.strict ? true : undefined, now: context.now };

  try {
    const { schema, root } = await openWorkspace(context.workspaceDir);

    if (text) printInfo('Validating work items...');
    const before = await validateWorkItems(schema, root, runOptions);

    if (!hasErrors(before)) {
      if (text) {
        outputTextReport(before);
      } else {
        outputJsonReport(before);
      }
      return ExitCodes.SUCCESS;
    }

    if (text) {
      console.log('');
      outputTextReport(before);
      printInfo('Attempting to fix issues...');
    }

    const fixes = await runRepairs(schema, root, context.now, text);
    const after = await validateWorkItems(schema, root, runOptions);

    const remaining = problemEntries(after);
    const summary: FixSummary = {
      fixed: fixes.entries.filter(entry => entry.code === 'fixed').length,
      failed: problemEntries(fixes).length,
      remaining: remaining.length,
    };

    if (text) {
      outputFixResults(summary, remaining);
    } else {
      outputJsonFixResults(fixes, summary, remaining);
    }

    return remaining.length > 0 ? ExitCodes.VALIDATION_ERROR : ExitCodes.SUCCESS;
  } catch (err) {
    return handleCommandError(err, mode);
  }
}

// ============================================================================
// Command Definition
// ============================================================================

export const doctorCommand = new Command('doctor')
  .description('Fix duplicate IDs, date formats and field issues in work items')
  .addHelpText('after', `
Repairs:
  duplicate IDs     Every copy but the oldest gets the next free ID
  created dates     YYYY/MM/DD, MM/DD/YYYY and ISO timestamps become YYYY-MM-DD
  field defaults    Missing configured fields get their default
  field values      Dates, enum casing and emails are normalized

Examples:
  worktrack doctor
  worktrack doctor --strict
  worktrack doctor --output json`)
  .option('--strict', 'Flag fields not defined in configuration')
  .option('-o, --output <format>', 'Output format: text (default) or json')
  .action(async (options: DoctorOptions, cmd: Command) => {
    const globals = cmd.optsWithGlobals<{ workspace?: string }>();
    const code = await runDoctor(options, { workspaceDir: resolveWorkspaceDir(globals) });
    if (code !== ExitCodes.SUCCESS) {
      process.exit(code);
    }
  });
