/**
 * Work item types.
 *
 * Configurable field values are tagged once, when the front matter is parsed,
 * so validators switch on `kind` instead of inspecting runtime types.
 */

export type FieldValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number; digits?: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'date'; value: Date }
  | { kind: 'sequence'; items: FieldValue[] }
  | { kind: 'mapping'; entries: Record<string, FieldValue> };

export type FieldValueKind = FieldValue['kind'];

// `digits` holds an integer too large for a float, exactly as it was read;
// `value` is then only its nearest approximation.

/** The five fields every work item carries, in canonical write order. */
export const HARDCODED_FIELDS = ['id', 'title', 'status', 'kind', 'created'] as const;

export type HardcodedField = (typeof HARDCODED_FIELDS)[number];

export interface WorkItem {
  id: string;
  title: string;
  status: string;
  kind: string;
  created: string;
  /** Configurable fields; never holds a hardcoded field name */
  fields: Record<string, FieldValue>;
}

/**
 * A parsed work item document.
 */
export interface ParsedWorkItem {
  item: WorkItem;
  /** Everything after the closing delimiter, byte for byte */
  body: string;
  /** Line ending used by the front matter block */
  eol: '\n' | '\r\n';
  hasFrontMatter: boolean;
}

/**
 * A discovered work item file.
 */
export interface WorkItemFile {
  /** Absolute path */
  path: string;
  /** Path relative to the work folder, `/`-separated */
  relativePath: string;
}
