import { UnrepresentableValueError } from '../errors.js';
import type { FieldValue, FieldValueKind } from '../../types/work-item.js';

export function formatYamlDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeUnknown(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

function integerValue(value: bigint): FieldValue {
  const approx = Number(value);
  return Number.isSafeInteger(approx)
    ? { kind: 'number', value: approx }
    : { kind: 'number', value: approx, digits: value.toString() };
}

/**
 * Tag an untyped value (YAML output, configured default) as a FieldValue.
 * Throws UnrepresentableValueError for anything front matter cannot hold.
 */
export function toFieldValue(value: unknown): FieldValue {
  if (value === null) {
    return { kind: 'null' };
  }

  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
      return { kind: 'number', value };
    case 'bigint':
      return integerValue(value);
    case 'boolean':
      return { kind: 'boolean', value };
    case 'object':
      break;
    default:
      throw new UnrepresentableValueError(describeUnknown(value));
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnrepresentableValueError('an invalid Date');
    }
    return { kind: 'date', value };
  }

  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map((item: unknown) => toFieldValue(item)) };
  }

  if (!isPlainObject(value)) {
    throw new UnrepresentableValueError(describeUnknown(value));
  }

  const entries: Record<string, FieldValue> = {};
  for (const [key, inner] of Object.entries(value)) {
    entries[key] = toFieldValue(inner);
  }
  return { kind: 'mapping', entries };
}

/**
 * Convert back to a plain JS value (for structured YAML serialization).
 */
export function toPlainValue(value: FieldValue): unknown {
  switch (value.kind) {
    case 'number':
      return value.digits === undefined ? value.value : BigInt(value.digits);
    case 'string':
    case 'boolean':
      return value.value;
    case 'null':
      return null;
    case 'date':
      return formatYamlDate(value.value);
    case 'sequence':
      return value.items.map(toPlainValue);
    case 'mapping': {
      const result: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value.entries)) {
        result[key] = toPlainValue(inner);
      }
      return result;
    }
  }
}

function toJson(value: FieldValue): string {
  return JSON.stringify(toPlainValue(value), (_key, inner: unknown) =>
    typeof inner === 'bigint' ? inner.toString() : inner
  );
}

/**
 * Human-readable form used in report messages.
 */
export function displayFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'number':
      return value.digits ?? String(value.value);
    case 'boolean':
      return String(value.value);
    case 'null':
      return 'null';
    case 'date':
      return formatYamlDate(value.value);
    case 'sequence':
    case 'mapping':
      return toJson(value);
  }
}

/**
 * Equality key for array uniqueness: scalars compare by kind and value,
 * everything else by its structured string form.
 */
export function fieldValueKey(value: FieldValue): string {
  switch (value.kind) {
    case 'number':
      return `number:${value.digits ?? String(value.value)}`;
    case 'string':
    case 'boolean':
      return `${value.kind}:${String(value.value)}`;
    case 'null':
      return 'null';
    case 'date':
      return `date:${value.value.toISOString()}`;
    case 'sequence':
    case 'mapping':
      return `json:${toJson(value)}`;
  }
}

const KIND_LABELS: Record<FieldValueKind, string> = {
  string: 'string',
  number: 'number',
  boolean: 'boolean',
  null: 'null',
  date: 'date',
  sequence: 'array',
  mapping: 'object',
};

export function describeKind(value: FieldValue): string {
  return KIND_LABELS[value.kind];
}

export function detectEol(raw: string): '\n' | '\r\n' {
  const index = raw.indexOf('\n');
  if (index > 0 && raw[index - 1] === '\r') {
    return '\r\n';
  }
  return '\n';
}
