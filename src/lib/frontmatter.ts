import { readFile, writeFile, rename, rm } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { parseDocument, stringify, isMap, isScalar, isNode } from 'yaml';
import type { Document, Pair } from 'yaml';
import { ParseError, UnrepresentableValueError, WorkItemWriteError } from './errors.js';
import { detectEol, formatYamlDate, toFieldValue, toPlainValue } from './audit/value-utils.js';
import { resolveWithinRoot } from './workspace.js';
import { HARDCODED_FIELDS, type HardcodedField } from '../types/work-item.js';
import type { FieldValue, ParsedWorkItem, WorkItem } from '../types/work-item.js';

const DELIMITER = '---';

interface Line {
  start: number;
  end: number;
  text: string;
}

export function createEmptyWorkItem(): WorkItem {
  return { id: '', title: '', status: '', kind: '', created: '', fields: {} };
}

function isHardcodedName(name: string): name is HardcodedField {
  return HARDCODED_FIELDS.some(field => field === name);
}

function stripBom(value: string): string {
  return value.startsWith('\uFEFF') ? value.slice(1) : value;
}

function isDelimiterLine(line: string): boolean {
  return line.replace(/\r?\n$/, '').trim() === DELIMITER;
}

function splitLinesWithOffsets(raw: string): Line[] {
  const lines: Line[] = [];
  let start = 0;

  for (let i = 0; i <= raw.length; i++) {
    if (i === raw.length || raw[i] === '\n') {
      const end = i === raw.length ? i : i + 1;
      if (end > start) {
        lines.push({ start, end, text: raw.slice(start, end) });
      }
      start = end;
    }
  }

  return lines;
}

// ============================================================================
// Parsing
// ============================================================================

function readHardcodedValue(name: string, node: unknown, doc: Document.Parsed): string {
  if (node === null || node === undefined) {
    return '';
  }
  if (isScalar(node)) {
    if (node.value === null) return '';
    return typeof node.source === 'string' ? node.source : String(node.value);
  }

  const resolved: unknown = isNode(node) ? node.toJS(doc) : node;
  if (resolved === null) return '';
  if (
    typeof resolved === 'string' ||
    typeof resolved === 'number' ||
    typeof resolved === 'bigint' ||
    typeof resolved === 'boolean'
  ) {
    return String(resolved);
  }
  throw new ParseError(`field '${name}' must be a scalar value`);
}

function readFieldValue(name: string, node: unknown, doc: Document.Parsed): FieldValue {
  const resolved: unknown = isNode(node) ? node.toJS(doc) : (node ?? null);
  try {
    return toFieldValue(resolved);
  } catch (err) {
    if (err instanceof UnrepresentableValueError) {
      throw new ParseError(`field '${name}': ${err.message}`);
    }
    throw err;
  }
}

function readPairKey(pair: Pair): string {
  const key = pair.key;
  if (isScalar(key)) {
    return String(key.value);
  }
  throw new ParseError('front matter keys must be scalars');
}

/**
 * Parse the YAML between the delimiters into a WorkItem.
 */
export function parseFrontMatterYaml(yaml: string): WorkItem {
  const doc = parseDocument(yaml, { schema: 'core', uniqueKeys: true, intAsBigInt: true });
  const firstError = doc.errors[0];
  if (firstError) {
    throw new ParseError(firstError.message);
  }

  const item = createEmptyWorkItem();
  const contents = doc.contents;
  if (contents === null || (isScalar(contents) && contents.value === null)) {
    return item;
  }
  if (!isMap(contents)) {
    throw new ParseError('front matter must be a mapping');
  }

  for (const pair of contents.items) {
    const key = readPairKey(pair);
    if (isHardcodedName(key)) {
      item[key] = readHardcodedValue(key, pair.value, doc);
    } else {
      item.fields[key] = readFieldValue(key, pair.value, doc);
    }
  }

  return item;
}

/**
 * Split a document into its front matter and body.
 *
 * The block opens only when the first non-empty line is `---`; the body is
 * everything after the closing delimiter line, byte for byte.
 */
export function parseWorkItemContent(raw: string): ParsedWorkItem {
  const content = stripBom(raw);
  const lines = splitLinesWithOffsets(content);
  const eol = detectEol(content);

  const openIndex = lines.findIndex(line => line.text.trim() !== '');
  const opening = lines[openIndex];
  if (opening === undefined || !isDelimiterLine(opening.text)) {
    return { item: createEmptyWorkItem(), body: raw, eol, hasFrontMatter: false };
  }

  const closing = lines.slice(openIndex + 1).find(line => isDelimiterLine(line.text));
  if (closing === undefined) {
    throw new ParseError('unterminated front matter block');
  }

  const yaml = content.slice(opening.end, closing.start);
  return {
    item: parseFrontMatterYaml(yaml),
    body: content.slice(closing.end),
    eol,
    hasFrontMatter: true,
  };
}

// ============================================================================
// Writing
// ============================================================================

const SPECIAL_CHARS = /[:#[\]{},"'\\\n\r\t&*!|>%]/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const LEADING_INDICATOR = /^[-?@`]/;

const NULL_PLAIN = /^(?:~|null|Null|NULL)$/;

// Plain scalars that the core schema resolves to something other than a string
const NON_STRING_PLAIN = [
  NULL_PLAIN,
  /^(?:true|True|TRUE|false|False|FALSE)$/,
  /^[-+]?[0-9]+$/,
  /^0o[0-7]+$/,
  /^0x[0-9a-fA-F]+$/,
  /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/,
  /^[-+]?\.(?:inf|Inf|INF)$/,
  /^\.(?:nan|NaN|NAN)$/,
];

/**
 * Whether a string must be double-quoted to survive a write/parse cycle.
 * `typed` is set for configurable values, which are re-read with their
 * YAML type; hardcoded fields are re-read from source text, so only the
 * null forms need protecting there.
 */
export function needsQuoting(value: string, typed = true): boolean {
  if (value === '' || value !== value.trim()) return true;
  if (SPECIAL_CHARS.test(value) || CONTROL_CHARS.test(value)) return true;
  if (LEADING_INDICATOR.test(value) || NULL_PLAIN.test(value)) return true;
  return typed && NON_STRING_PLAIN.some(pattern => pattern.test(value));
}

function escapeChar(char: string): string {
  switch (char) {
    case '\\':
      return '\\\\';
    case '"':
      return '\\"';
    case '\n':
      return '\\n';
    case '\r':
      return '\\r';
    case '\t':
      return '\\t';
    default:
      return `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
  }
}

export function quoteString(value: string): string {
  return `"${value.replace(/[\\"\u0000-\u001f\u007f]/g, escapeChar)}"`;
}

export function formatString(value: string, typed = true): string {
  return needsQuoting(value, typed) ? quoteString(value) : value;
}

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  return String(value);
}

function isFlowScalar(value: FieldValue): boolean {
  return value.kind !== 'sequence' && value.kind !== 'mapping';
}

/**
 * Render one configurable value for a `key: value` line.
 */
export function formatFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'string':
      return formatString(value.value);
    case 'number':
      return value.digits ?? formatNumber(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'date':
      return formatYamlDate(value.value);
    case 'sequence':
      if (value.items.every(isFlowScalar)) {
        return `[${value.items.map(formatFieldValue).join(', ')}]`;
      }
      return formatStructured(value);
    case 'mapping':
      return formatStructured(value);
  }
}

function formatStructured(value: FieldValue): string {
  return stringify(toPlainValue(value), { collectionStyle: 'flow', lineWidth: 0 }).trimEnd();
}

/**
 * Serialize a work item's front matter, delimiters included.
 * Hardcoded fields come first in fixed order, then configurable fields
 * sorted by name.
 */
export function serializeFrontMatter(item: WorkItem, eol: '\n' | '\r\n' = '\n'): string {
  const lines = [DELIMITER];

  for (const name of HARDCODED_FIELDS) {
    lines.push(`${name}: ${formatString(item[name], false)}`);
  }

  const names = Object.keys(item.fields).sort();
  for (const name of names) {
    const value = item.fields[name];
    if (value === undefined || isHardcodedName(name)) continue;
    lines.push(`${formatString(name)}: ${formatFieldValue(value)}`);
  }

  lines.push(DELIMITER);
  return lines.join(eol) + eol;
}

/**
 * Build a complete markdown file with front matter and body.
 */
export function buildWorkItemContent(item: WorkItem, body: string, eol: '\n' | '\r\n' = '\n'): string {
  return serializeFrontMatter(item, eol) + body;
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * Read and parse a work item file under the work root.
 */
export async function readWorkItemFile(root: string, filePath: string): Promise<ParsedWorkItem> {
  const absolutePath = resolveWithinRoot(root, filePath);
  const raw = await readFile(absolutePath, 'utf-8');
  return parseWorkItemContent(raw);
}

/**
 * Write a work item back to disk.
 * Uses atomic write (temp file + rename) so a failure leaves the old content.
 */
export async function writeWorkItemFile(
  root: string,
  filePath: string,
  item: WorkItem,
  body: string,
  eol: '\n' | '\r\n' = '\n'
): Promise<void> {
  const absolutePath = resolveWithinRoot(root, filePath);
  const tempPath = join(dirname(absolutePath), `.${basename(absolutePath)}.tmp`);
  const content = buildWorkItemContent(item, body, eol);

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, absolutePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new WorkItemWriteError(filePath, err);
  }
}
