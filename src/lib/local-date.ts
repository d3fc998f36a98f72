/**
 * Calendar Dates
 * ==============
 *
 * Work item dates are calendar dates. Every date handled here is a Date at
 * UTC midnight, so two dates compare with plain getTime() arithmetic.
 *
 * "Today" is the calendar date of the local clock moved to UTC midnight:
 * a machine sitting at 23:30 in UTC-8 still sees its own date, and a
 * date string written elsewhere never shifts by one day.
 *
 * Date Format Patterns
 * --------------------
 * Configurable per field via `format`.
 * Supported tokens: YYYY, MM, DD, HH, mm, ss. Everything else is literal.
 * - YYYY-MM-DD (default, ISO 8601)
 * - YYYY/MM/DD
 * - DD.MM.YYYY
 * - YYYY-MM-DD HH:mm
 */

import type { DatePattern, DateSegment, DateToken } from '../types/schema.js';

/** Default date format (ISO 8601) */
export const DEFAULT_DATE_FORMAT = 'YYYY-MM-DD';

const TOKENS: readonly DateToken[] = ['YYYY', 'MM', 'DD', 'HH', 'mm', 'ss'];

const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tokenAt(source: string, index: number): DateToken | undefined {
  return TOKENS.find(token => source.startsWith(token, index));
}

/**
 * Compile a format pattern into a matcher. An empty pattern means YYYY-MM-DD.
 */
export function compileDatePattern(format: string = DEFAULT_DATE_FORMAT): DatePattern {
  const source = format === '' ? DEFAULT_DATE_FORMAT : format;
  const segments: DateSegment[] = [];
  const groups: DateToken[] = [];
  let regex = '';
  let literal = '';
  let index = 0;

  while (index < source.length) {
    const token = tokenAt(source, index);
    if (token === undefined) {
      literal += source.charAt(index);
      index += 1;
      continue;
    }
    if (literal !== '') {
      segments.push({ kind: 'literal', text: literal });
      regex += escapeRegex(literal);
      literal = '';
    }
    segments.push({ kind: 'token', token });
    groups.push(token);
    regex += token === 'YYYY' ? '(\\d{4})' : '(\\d{2})';
    index += token.length;
  }
  if (literal !== '') {
    segments.push({ kind: 'literal', text: literal });
    regex += escapeRegex(literal);
  }

  return { source, regex: new RegExp(`^${regex}$`), groups, segments };
}

/**
 * Build a UTC date without Date.UTC's two-digit year mapping.
 */
export function utcDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

/**
 * Validate date components are within valid ranges.
 */
export function validateDateComponents(year: number, month: number, day: number): string | null {
  if (year < 0 || year > 9999) {
    return `Invalid year: ${year}`;
  }
  if (month < 1 || month > 12) {
    return `Invalid month: ${month}`;
  }
  if (day < 1 || day > 31) {
    return `Invalid day: ${day}`;
  }

  const daysInMonth = utcDate(year, month + 1, 0).getUTCDate();
  if (day > daysInMonth) {
    return `Invalid day ${day} for month ${month} (max: ${daysInMonth})`;
  }

  return null;
}

function validateTimeComponents(hour: number, minute: number, second: number): boolean {
  return hour <= 23 && minute <= 59 && second <= 59;
}

const TOKEN_PARTS: Record<DateToken, keyof DateParts> = {
  YYYY: 'year',
  MM: 'month',
  DD: 'day',
  HH: 'hour',
  mm: 'minute',
  ss: 'second',
};

function assignToken(parts: DateParts, token: DateToken, value: number, seen: Set<DateToken>): boolean {
  const key = TOKEN_PARTS[token];
  if (seen.has(token)) {
    return parts[key] === value;
  }
  seen.add(token);
  parts[key] = value;
  return true;
}

/**
 * Parse a value with a compiled pattern. Components the pattern lacks
 * default to 1970-01-01 00:00:00. Returns null when the value does not
 * match or names an impossible date.
 */
export function parseWithPattern(value: string, pattern: DatePattern): Date | null {
  const match = pattern.regex.exec(value);
  if (!match) {
    return null;
  }

  const parts: DateParts = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  const seen = new Set<DateToken>();
  for (const [index, token] of pattern.groups.entries()) {
    const raw = match[index + 1];
    if (raw === undefined || !assignToken(parts, token, parseInt(raw, 10), seen)) {
      return null;
    }
  }

  if (validateDateComponents(parts.year, parts.month, parts.day) !== null) {
    return null;
  }
  if (!validateTimeComponents(parts.hour, parts.minute, parts.second)) {
    return null;
  }
  return utcDate(parts.year, parts.month, parts.day, parts.hour, parts.minute, parts.second);
}

/**
 * Format a Date with a compiled pattern, reading UTC components.
 *
 * @example
 * formatWithPattern(utcDate(2026, 1, 7), compileDatePattern('MM/DD/YYYY'))
 * // => '01/07/2026'
 */
export function formatWithPattern(date: Date, pattern: DatePattern): string {
  const values: Record<DateToken, number> = {
    YYYY: date.getUTCFullYear(),
    MM: date.getUTCMonth() + 1,
    DD: date.getUTCDate(),
    HH: date.getUTCHours(),
    mm: date.getUTCMinutes(),
    ss: date.getUTCSeconds(),
  };

  return pattern.segments
    .map(segment => {
      if (segment.kind === 'literal') return segment.text;
      const width = segment.token === 'YYYY' ? 4 : 2;
      return String(values[segment.token]).padStart(width, '0');
    })
    .join('');
}

/**
 * Check that a format pattern is usable: it must tell two different instants
 * apart and read back what it writes. Returns an error message or null.
 */
export function checkDatePattern(pattern: DatePattern): string | null {
  const first = utcDate(2006, 1, 2, 15, 4, 5);
  const second = utcDate(2007, 2, 3, 16, 5, 6);
  const formatted = formatWithPattern(first, pattern);

  if (formatted === formatWithPattern(second, pattern)) {
    return 'format does not contain date components';
  }

  const parsed = parseWithPattern(formatted, pattern);
  if (parsed === null || formatWithPattern(parsed, pattern) !== formatted) {
    return 'format does not round-trip';
  }
  return null;
}

/**
 * Truncate to the calendar date (UTC components) at UTC midnight.
 */
export function toCalendarDate(date: Date): Date {
  return utcDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * The local calendar date, at UTC midnight.
 *
 * @param now - Optional Date to use (defaults to current time, useful for testing)
 */
export function calendarToday(now: Date = new Date()): Date {
  return utcDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SLASH_DATE = /^(\d{4})\/(\d{2})\/(\d{2})$/;
const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

function calendarFrom(year: string, month: string, day: string): Date | null {
  const y = parseInt(year, 10);
  const m = parseInt(month, 10);
  const d = parseInt(day, 10);
  if (validateDateComponents(y, m, d) !== null) {
    return null;
  }
  return utcDate(y, m, d);
}

/**
 * Parse a strict YYYY-MM-DD calendar date.
 */
export function parseIsoCalendarDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, year = '', month = '', day = ''] = match;
  return calendarFrom(year, month, day);
}

/**
 * Strict YYYY-MM-DD check (hardcoded `created`, undeclared date fields).
 */
export function isIsoCalendarDate(value: string): boolean {
  return parseIsoCalendarDate(value) !== null;
}

/**
 * Recognize the common encodings a date is found in when it does not match
 * its configured pattern. Tried in order:
 * - YYYY-MM-DD
 * - YYYY/MM/DD
 * - MM/DD/YYYY
 * - YYYY-MM-DDTHH:MM:SS with optional fraction and Z or ±HH:MM offset
 *
 * The date and wall-clock time are taken as written; offsets never move them.
 */
export function parseAlternateDate(value: string): Date | null {
  const iso = parseIsoCalendarDate(value);
  if (iso) return iso;

  const slash = SLASH_DATE.exec(value);
  if (slash) {
    const [, year = '', month = '', day = ''] = slash;
    return calendarFrom(year, month, day);
  }

  const us = US_DATE.exec(value);
  if (us) {
    const [, month = '', day = '', year = ''] = us;
    return calendarFrom(year, month, day);
  }

  const dateTime = ISO_DATE_TIME.exec(value);
  if (dateTime) {
    const [, year = '', month = '', day = '', hour = '', minute = '', second = '', offsetHour, offsetMinute] = dateTime;
    const h = parseInt(hour, 10);
    const mi = parseInt(minute, 10);
    const sec = parseInt(second, 10);
    if (!validateTimeComponents(h, mi, sec)) {
      return null;
    }
    if (offsetHour !== undefined && offsetMinute !== undefined) {
      if (parseInt(offsetHour, 10) > 23 || parseInt(offsetMinute, 10) > 59) {
        return null;
      }
    }
    const date = calendarFrom(year, month, day);
    if (date === null) return null;
    date.setUTCHours(h, mi, sec, 0);
    return date;
  }

  return null;
}
