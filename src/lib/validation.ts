import { addDays, calendarToday, formatWithPattern, compileDatePattern, parseWithPattern, toCalendarDate } from './local-date.js';
import { describeKind, displayFieldValue, fieldValueKey } from './audit/value-utils.js';
import type { CompiledField, DateBound } from '../types/schema.js';
import type { FieldValue } from '../types/work-item.js';

/**
 * A failed field check.
 */
export interface FieldIssue {
  /** `field '<name>': <detail>` */
  message: string;
  suggestion?: string;
}

export interface FieldValidationContext {
  /** Clock for relative date bounds (defaults to the current time) */
  now?: Date;
}

interface Detail {
  detail: string;
  suggestion?: string;
}

type Check = (value: FieldValue, field: CompiledField, context: FieldValidationContext) => Detail | null;

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}$/;
const MAX_URL_LENGTH = 2048;
const MAX_IPV6_LENGTH = 45;
const ISO_PATTERN = compileDatePattern();

// ============================================================================
// Well-formedness
// ============================================================================

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

function isValidBracketedHost(value: string): boolean {
  const start = value.indexOf('[');
  const end = value.indexOf(']');
  if (start === -1 || end === -1 || end <= start) {
    return false;
  }
  const host = value.slice(start + 1, end);
  if (host.length === 0 || host.length > MAX_IPV6_LENGTH) {
    return false;
  }
  return /^[0-9a-fA-F:.]+$/.test(host);
}

/**
 * Absolute URL or absolute path. Bracketed IPv6 hosts are checked before the
 * URL parser sees them.
 */
export function isValidUrl(value: string): boolean {
  if (value.length === 0 || value.length > MAX_URL_LENGTH) {
    return false;
  }
  if (value.includes('[') && value.includes(']') && !isValidBracketedHost(value)) {
    return false;
  }
  return value.startsWith('/') || URL.canParse(value);
}

function urlScheme(value: string): string {
  if (!URL.canParse(value)) return '';
  return new URL(value).protocol.replace(/:$/, '');
}

// ============================================================================
// Fuzzy matching
// ============================================================================

/**
 * Calculate Levenshtein distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Suggest a similar enum value using fuzzy matching.
 */
export function suggestEnumValue(value: string, allowed: readonly string[]): string | undefined {
  if (allowed.length === 0 || value.trim() === '') return undefined;

  const valueLower = value.trim().toLowerCase();

  const exact = allowed.find(option => option.toLowerCase() === valueLower);
  if (exact !== undefined) return exact;

  const prefix = allowed.find(option => option.toLowerCase().startsWith(valueLower));
  if (prefix !== undefined) return prefix;

  let bestMatch: string | undefined;
  let bestDistance = Infinity;
  for (const option of allowed) {
    const distance = levenshteinDistance(valueLower, option.toLowerCase());
    // Threshold: at most 40% of the longer string's length
    const maxDistance = Math.ceil(Math.max(valueLower.length, option.length) * 0.4);
    if (distance < bestDistance && distance <= maxDistance) {
      bestDistance = distance;
      bestMatch = option;
    }
  }

  return bestMatch;
}

/**
 * Suggest a similar field name using fuzzy matching.
 */
export function suggestFieldName(field: string, known: readonly string[]): string | undefined {
  const fieldLower = field.toLowerCase();

  const exact = known.find(option => option.toLowerCase() === fieldLower);
  if (exact !== undefined) return exact;

  let bestMatch: string | undefined;
  let bestDistance = Infinity;
  for (const option of known) {
    const distance = levenshteinDistance(fieldLower, option.toLowerCase());
    // Threshold: at most 2 characters different, or 40% of length
    const maxDistance = Math.min(2, Math.ceil(option.length * 0.4));
    if (distance < bestDistance && distance <= maxDistance) {
      bestDistance = distance;
      bestMatch = option;
    }
  }

  return bestMatch;
}

// ============================================================================
// Type check
// ============================================================================

function expected(label: string, value: FieldValue): Detail {
  return { detail: `expected ${label}, got ${describeKind(value)}` };
}

const checkType: Check = (value, field) => {
  switch (field.type) {
    case 'string':
      return value.kind === 'string' ? null : expected('string', value);
    case 'date':
      return value.kind === 'string' || value.kind === 'date' ? null : expected('date string or date', value);
    case 'email':
      if (value.kind !== 'string') return expected('email string', value);
      return isValidEmail(value.value) ? null : { detail: `invalid email format: ${value.value}` };
    case 'url':
      if (value.kind !== 'string') return expected('URL string', value);
      return isValidUrl(value.value) ? null : { detail: `invalid URL format: ${value.value}` };
    case 'number':
      return value.kind === 'number' ? null : expected('number', value);
    case 'array':
      return value.kind === 'sequence' ? null : expected('array', value);
    case 'enum':
      return value.kind === 'string' ? null : expected('enum string', value);
  }
};

// ============================================================================
// Format check
// ============================================================================

const checkFormat: Check = (value, field) => {
  if (value.kind !== 'string') return null;

  if (field.type === 'string' && field.pattern) {
    if (field.pattern.test(value.value)) return null;
    return { detail: `value '${value.value}' does not match format pattern: ${field.config.format ?? ''}` };
  }

  if (field.type === 'date' && parseWithPattern(value.value, field.datePattern) === null) {
    return { detail: `date '${value.value}' does not match format: ${field.datePattern.source}` };
  }

  return null;
};

// ============================================================================
// Membership check
// ============================================================================

export function isAllowedValue(value: string, allowed: readonly string[], caseSensitive: boolean): boolean {
  if (caseSensitive) {
    return allowed.includes(value);
  }
  const lower = value.toLowerCase();
  return allowed.some(option => option.toLowerCase() === lower);
}

function checkMembership(value: string, field: CompiledField): Detail | null {
  const allowed = field.config.allowed_values ?? [];
  if (isAllowedValue(value, allowed, field.caseSensitive)) return null;

  const detail: Detail = { detail: `value '${value}' is not in allowed values: ${allowed.join(', ')}` };
  const suggestion = suggestEnumValue(value, allowed);
  if (suggestion !== undefined) {
    detail.suggestion = `Did you mean '${suggestion}'?`;
  }
  return detail;
}

const checkEnum: Check = (value, field) => {
  if (field.type !== 'enum' || value.kind !== 'string') return null;
  return checkMembership(value.value, field);
};

// ============================================================================
// Range check
// ============================================================================

function checkLength(kind: 'string' | 'array', length: number, field: CompiledField): Detail | null {
  const { min_length: minLength, max_length: maxLength } = field.config;
  if (minLength !== undefined && length < minLength) {
    return { detail: `${kind} length ${length} is less than min_length ${minLength}` };
  }
  if (maxLength !== undefined && length > maxLength) {
    return { detail: `${kind} length ${length} is greater than max_length ${maxLength}` };
  }
  return null;
}

function checkNumberRange(num: number, field: CompiledField): Detail | null {
  const { min, max } = field.config;
  if (min !== undefined && num < min) {
    return { detail: `value ${num} is less than min ${min}` };
  }
  if (max !== undefined && num > max) {
    return { detail: `value ${num} is greater than max ${max}` };
  }
  return null;
}

function boundLabel(bound: DateBound): string {
  return bound.kind === 'absolute' ? bound.source : bound.kind;
}

function lowerBound(bound: DateBound, today: Date): Date {
  switch (bound.kind) {
    case 'today':
      return today;
    case 'future':
      return addDays(today, 1);
    case 'absolute':
      return bound.date;
  }
}

function upperBound(bound: DateBound, today: Date): Date | null {
  switch (bound.kind) {
    case 'today':
      return today;
    case 'future':
      return null;
    case 'absolute':
      return bound.date;
  }
}

function checkDateRange(value: FieldValue, field: CompiledField, now: Date | undefined): Detail | null {
  let parsed: Date | null = null;
  if (value.kind === 'string') {
    parsed = parseWithPattern(value.value, field.datePattern);
  } else if (value.kind === 'date') {
    parsed = value.value;
  }
  if (parsed === null) return null;

  const date = toCalendarDate(parsed);
  const today = calendarToday(now);
  const shown = formatWithPattern(date, ISO_PATTERN);

  if (field.minDate) {
    const min = lowerBound(field.minDate, today);
    if (date.getTime() < min.getTime()) {
      return { detail: `date ${shown} is before min_date ${boundLabel(field.minDate)}` };
    }
  }
  if (field.maxDate) {
    const max = upperBound(field.maxDate, today);
    if (max !== null && date.getTime() > max.getTime()) {
      return { detail: `date ${shown} is after max_date ${boundLabel(field.maxDate)}` };
    }
  }
  return null;
}

function checkArrayItem(item: FieldValue, field: CompiledField): Detail | null {
  switch (field.config.item_type) {
    case 'string':
      return item.kind === 'string' ? null : expected('string item', item);
    case 'number':
      return item.kind === 'number' ? null : expected('number item', item);
    case 'enum':
      if (item.kind !== 'string') return expected('enum string item', item);
      return checkMembership(item.value, field);
    case undefined:
      return null;
  }
}

function checkArray(items: FieldValue[], field: CompiledField): Detail | null {
  const lengthIssue = checkLength('array', items.length, field);
  if (lengthIssue) return lengthIssue;

  for (const [index, item] of items.entries()) {
    const itemIssue = checkArrayItem(item, field);
    if (itemIssue) {
      return { ...itemIssue, detail: `array item at index ${index}: ${itemIssue.detail}` };
    }
  }

  if (field.config.unique) {
    const seen = new Set<string>();
    for (const item of items) {
      const key = fieldValueKey(item);
      if (seen.has(key)) {
        return { detail: `array contains duplicate value: ${displayFieldValue(item)}` };
      }
      seen.add(key);
    }
  }
  return null;
}

function checkUrlScheme(value: string, field: CompiledField): Detail | null {
  const schemes = field.config.schemes ?? [];
  if (schemes.length === 0) return null;

  const scheme = urlScheme(value);
  if (schemes.includes(scheme)) return null;
  return { detail: `URL scheme '${scheme}' is not allowed. Allowed schemes: ${schemes.join(', ')}` };
}

const checkRange: Check = (value, field, context) => {
  switch (field.type) {
    case 'string':
      return value.kind === 'string' ? checkLength('string', [...value.value].length, field) : null;
    case 'number':
      return value.kind === 'number' ? checkNumberRange(value.value, field) : null;
    case 'date':
      return checkDateRange(value, field, context.now);
    case 'array':
      return value.kind === 'sequence' ? checkArray(value.items, field) : null;
    case 'url':
      return value.kind === 'string' ? checkUrlScheme(value.value, field) : null;
    default:
      return null;
  }
};

const CHECKS: readonly Check[] = [checkType, checkFormat, checkEnum, checkRange];

/**
 * Validate one field value against its schema entry.
 * Checks run in order (type, format, membership, range); the first failure
 * is returned.
 */
export function validateFieldValue(
  value: FieldValue,
  field: CompiledField,
  context: FieldValidationContext = {}
): FieldIssue | null {
  for (const check of CHECKS) {
    const result = check(value, field, context);
    if (result) {
      const issue: FieldIssue = { message: `field '${field.name}': ${result.detail}` };
      if (result.suggestion !== undefined) {
        issue.suggestion = result.suggestion;
      }
      return issue;
    }
  }
  return null;
}
