/**
 * Lint command - validate work items against the configured schema.
 */

import { Command } from 'commander';
import { ConfigurationError } from '../lib/errors.js';
import { ExitCodes, getOutputMode, reportError, type ExitCode, type OutputMode } from '../lib/output.js';
import { openWorkspace, resolveWorkspaceDir } from '../lib/workspace.js';
import { validateWorkItems } from '../lib/audit/detection.js';
import { outputJsonReport, outputTextReport } from '../lib/audit/output.js';
import { hasErrors, type LintOptions } from '../lib/audit/types.js';

export interface CommandContext {
  workspaceDir: string;
  /** Clock for relative dates */
  now?: Date | undefined;
}

/**
 * Map a failure that stopped a run to its exit code.
 */
export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof ConfigurationError ? ExitCodes.SCHEMA_ERROR : ExitCodes.IO_ERROR;
}

export function handleCommandError(err: unknown, mode: OutputMode): ExitCode {
  const message = err instanceof Error ? err.message : String(err);
  return reportError(message, exitCodeFor(err), mode);
}

/**
 * Validate every work item and print the report.
 *
 * @returns the process exit code
 */
export async function runLint(options: LintOptions, context: CommandContext): Promise<ExitCode> {
  const mode = getOutputMode(options);

  try {
    const { schema, root } = await openWorkspace(context.workspaceDir);
    const report = await validateWorkItems(schema, root, {
      strict: options.strict ? true : undefined,
      pathFilter: options.path,
      now: context.now,
    });

    if (mode === 'json') {
      outputJsonReport(report);
    } else {
      outputTextReport(report);
    }

    return hasErrors(report) ? ExitCodes.VALIDATION_ERROR : ExitCodes.SUCCESS;
  } catch (err) {
    return handleCommandError(err, mode);
  }
}

// ============================================================================
// Command Definition
// ============================================================================

export const lintCommand = new Command('lint')
  .description('Check work items for issues')
  .addHelpText('after', `
Checks:
  missing-required  Required field is missing or empty
  invalid-id        ID does not match validation.id_format
  invalid-status    Status not in validation.status_values
  invalid-date      Date not in YYYY-MM-DD form
  invalid-field     Configured field fails its type, format or range
  unknown-field     Field not in configuration (--strict only)
  duplicate-id      Same ID in more than one file
  workflow          More than one item in the doing folder

Examples:
  worktrack lint                     # Check all work items
  worktrack lint --strict            # Also flag unconfigured fields
  worktrack lint --path "2_doing/"   # Check matching files only
  worktrack lint --output json       # JSON output for CI`)
  .option('--strict', 'Flag fields not defined in configuration')
  .option('--path <pattern>', 'Limit checks to files matching a glob or substring')
  .option('-o, --output <format>', 'Output format: text (default) or json')
  .action(async (options: LintOptions, cmd: Command) => {
    const globals = cmd.optsWithGlobals<{ workspace?: string }>();
    const code = await runLint(options, { workspaceDir: resolveWorkspaceDir(globals) });
    if (code !== ExitCodes.SUCCESS) {
      process.exit(code);
    }
  });
