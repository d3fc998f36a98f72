/**
 * Default values for missing configurable fields.
 */

import { ConfigurationError, UnrepresentableValueError } from '../errors.js';
import { calendarToday, formatWithPattern, parseWithPattern } from '../local-date.js';
import { isHardcodedField } from '../schema.js';
import { isAllowedValue, isValidEmail, isValidUrl } from '../validation.js';
import { coerceNumberFromString } from './coercion.js';
import { isEmptyFieldValue } from './emptiness.js';
import { describeKind, toFieldValue } from './value-utils.js';
import type { CompiledField, Schema } from '../../types/schema.js';
import type { FieldValue, WorkItem } from '../../types/work-item.js';

const TODAY = 'today';

type Resolution = { ok: true; value: FieldValue } | { ok: false; reason: string };

function ok(value: FieldValue): Resolution {
  return { ok: true, value };
}

function fail(reason: string): Resolution {
  return { ok: false, reason };
}

function resolveString(value: FieldValue): Resolution {
  switch (value.kind) {
    case 'string':
      return ok(value);
    case 'number':
    case 'boolean':
      return ok({ kind: 'string', value: String(value.value) });
    default:
      return fail(`string default must be a scalar, got ${describeKind(value)}`);
  }
}

function resolveDate(value: FieldValue, field: CompiledField, now: Date | undefined): Resolution {
  if (value.kind !== 'string') {
    return fail(`date default must be a string, got ${describeKind(value)}`);
  }
  if (value.value === TODAY) {
    return ok({ kind: 'string', value: formatWithPattern(calendarToday(now), field.datePattern) });
  }
  if (parseWithPattern(value.value, field.datePattern) === null) {
    return fail(`invalid date default value '${value.value}' (expected format: ${field.datePattern.source})`);
  }
  return ok(value);
}

function resolveChecked(value: FieldValue, label: string, isValid: (text: string) => boolean): Resolution {
  if (value.kind !== 'string') {
    return fail(`${label} default must be a string, got ${describeKind(value)}`);
  }
  // Empty placeholders are allowed
  if (value.value !== '' && !isValid(value.value)) {
    return fail(`invalid ${label} default value: ${value.value}`);
  }
  return ok(value);
}

function resolveNumber(value: FieldValue): Resolution {
  if (value.kind === 'number') {
    return ok(value);
  }
  if (value.kind === 'string') {
    const coerced = coerceNumberFromString(value.value);
    if (coerced.ok) {
      return ok({ kind: 'number', value: coerced.value });
    }
  }
  return fail(`number default must be numeric, got ${describeKind(value)}`);
}

function resolveEnum(value: FieldValue, field: CompiledField): Resolution {
  if (value.kind !== 'string') {
    return fail(`enum default must be a string, got ${describeKind(value)}`);
  }
  const allowed = field.config.allowed_values ?? [];
  if (allowed.length > 0 && !isAllowedValue(value.value, allowed, field.caseSensitive)) {
    return fail(`enum default '${value.value}' is not in allowed values: ${allowed.join(', ')}`);
  }
  return ok(value);
}

function resolveByType(raw: FieldValue, field: CompiledField, now: Date | undefined): Resolution {
  switch (field.type) {
    case 'string':
      return resolveString(raw);
    case 'date':
      return resolveDate(raw, field, now);
    case 'email':
      return resolveChecked(raw, 'email', isValidEmail);
    case 'url':
      return resolveChecked(raw, 'URL', isValidUrl);
    case 'number':
      return resolveNumber(raw);
    case 'array':
      // A single value becomes a one-element array
      return ok(raw.kind === 'sequence' ? raw : { kind: 'sequence', items: [raw] });
    case 'enum':
      return resolveEnum(raw, field);
  }
}

/**
 * Whether a schema entry carries a default. `default: null` counts as none.
 */
export function hasDefault(field: CompiledField): boolean {
  return field.config.default !== undefined && field.config.default !== null;
}

/**
 * Convert a field's configured default to a typed value.
 * Throws ConfigurationError when the default cannot be used.
 */
export function resolveDefaultValue(field: CompiledField, now?: Date): FieldValue {
  let raw: FieldValue;
  try {
    raw = toFieldValue(field.config.default);
  } catch (err) {
    if (err instanceof UnrepresentableValueError) {
      throw new ConfigurationError(`failed to resolve default value for field '${field.name}': ${err.message}`);
    }
    throw err;
  }

  const resolution = resolveByType(raw, field, now);
  if (!resolution.ok) {
    throw new ConfigurationError(`failed to resolve default value for field '${field.name}': ${resolution.reason}`);
  }
  return resolution.value;
}

/**
 * Fill missing or empty configurable fields from their defaults.
 * Non-empty values and hardcoded fields are never touched.
 *
 * @returns names of the fields that received a default, sorted
 */
export function applyFieldDefaults(item: WorkItem, schema: Schema, now?: Date): string[] {
  const added: string[] = [];

  for (const [name, field] of schema.fields) {
    if (isHardcodedField(name) || !hasDefault(field)) continue;

    const current = item.fields[name];
    if (!isEmptyFieldValue(current)) continue;

    const value = resolveDefaultValue(field, now);
    // An empty default over an existing empty value changes nothing
    if (current !== undefined && isEmptyFieldValue(value)) continue;

    item.fields[name] = value;
    added.push(name);
  }

  return added.sort();
}
