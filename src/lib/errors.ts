/**
 * Shared error types for worktrack.
 *
 * Per-file problems (ParseError, WorkItemWriteError, PathOutsideRootError) are
 * caught by the runners and recorded in the report. ConfigurationError is the
 * only class that aborts a run: every later check depends on the schema.
 */

/**
 * Thrown when a work item's front matter cannot be read.
 *
 * @example
 * ```ts
 * try {
 *   parseWorkItemContent(raw);
 * } catch (err) {
 *   if (err instanceof ParseError) report.add(file, `failed to parse file: ${err.message}`);
 * }
 * ```
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Thrown when the configuration or schema cannot be trusted
 * (unknown field type, bad regex, bad date format, invalid default).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when writing a repaired work item fails. The previous content on
 * disk is left as it was.
 */
export class WorkItemWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`failed to write ${filePath}: ${detail}`);
    this.name = 'WorkItemWriteError';
    this.filePath = filePath;
  }
}

/**
 * Thrown when a path resolves outside the work folder.
 */
export class PathOutsideRootError extends Error {
  constructor(path: string) {
    super(`path outside work folder: ${path}`);
    this.name = 'PathOutsideRootError';
  }
}

/**
 * Thrown when a value has no front-matter representation (functions,
 * symbols, bigints, class instances).
 */
export class UnrepresentableValueError extends Error {
  constructor(description: string) {
    super(`cannot represent ${description} in front matter`);
    this.name = 'UnrepresentableValueError';
  }
}

/**
 * Thrown when the work folder does not exist.
 */
export class WorkspaceNotFoundError extends Error {
  constructor(workFolder: string) {
    super(`not a worktrack workspace (no ${workFolder} directory found)`);
    this.name = 'WorkspaceNotFoundError';
  }
}
