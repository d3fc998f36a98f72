import chalk from 'chalk';

/**
 * Output mode for commands.
 */
export type OutputMode = 'text' | 'json';

/**
 * JSON output wrapper for success results.
 */
export interface JsonSuccess<T = unknown> {
  success: true;
  data?: T;
  message?: string;
}

/**
 * JSON output wrapper for error results.
 */
export interface JsonError {
  success: false;
  error: string;
  code?: number;
}

/**
 * Combined JSON result type.
 */
export type JsonResult<T = unknown> = JsonSuccess<T> | JsonError;

/**
 * Exit codes for the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,
  VALIDATION_ERROR: 1,
  IO_ERROR: 2,
  SCHEMA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Print output as JSON.
 */
export function printJson(data: JsonResult): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Create a success JSON response.
 */
export function jsonSuccess<T = unknown>(
  options: Omit<JsonSuccess<T>, 'success'> = {}
): JsonSuccess<T> {
  return { success: true, ...options };
}

/**
 * Create an error JSON response.
 */
export function jsonError(
  error: string,
  options: Omit<JsonError, 'success' | 'error'> = {}
): JsonError {
  return { success: false, error, ...options };
}

/**
 * Print an error, as JSON or red text, and return its exit code.
 */
export function reportError(message: string, code: ExitCode, mode: OutputMode): ExitCode {
  if (mode === 'json') {
    printJson(jsonError(message, { code }));
  } else {
    printError(message);
  }
  return code;
}

/**
 * Determine output mode from command options.
 */
export function getOutputMode(options: { output?: string | undefined }): OutputMode {
  return options.output === 'json' ? 'json' : 'text';
}

// ============================================================================
// Console helpers
// ============================================================================

export function printError(message: string): void {
  console.error(chalk.red(message));
}

export function printWarning(message: string): void {
  console.error(chalk.yellow(message));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(message));
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(message));
}

/**
 * Strip ANSI color codes from a string.
 */
export function stripColors(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
