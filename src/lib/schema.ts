import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { ConfigurationError } from './errors.js';
import { checkDatePattern, compileDatePattern, DEFAULT_DATE_FORMAT, parseWithPattern, toCalendarDate } from './local-date.js';
import { HARDCODED_FIELDS } from '../types/work-item.js';
import {
  WorktrackConfigSchema,
  type CompiledField,
  type DateBound,
  type DatePattern,
  type FieldConfig,
  type Schema,
  type WorktrackConfig,
} from '../types/schema.js';

export const CONFIG_FILE = 'worktrack.yml';
export const DEFAULT_WORK_FOLDER = '.work';
export const DEFAULT_ID_FORMAT = '^\\d{3}$';

export const DEFAULT_STATUS_FOLDERS: Readonly<Record<string, string>> = {
  backlog: '0_backlog',
  todo: '1_todo',
  doing: '2_doing',
  review: '3_review',
  done: '4_done',
  archived: 'z_archive',
};

export const DEFAULT_STATUS_VALUES: readonly string[] = [
  'backlog',
  'todo',
  'doing',
  'review',
  'done',
  'released',
  'abandoned',
  'archived',
];

/**
 * Check if a field name is one of the five hardcoded fields.
 */
export function isHardcodedField(name: string): boolean {
  return HARDCODED_FIELDS.some(field => field === name);
}

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid configuration';
  const location = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `invalid configuration at ${location}: ${issue.message}`;
}

/**
 * Parse and validate configuration text (YAML).
 */
export function parseConfig(content: string): WorktrackConfig {
  let data: unknown;
  try {
    data = parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to parse ${CONFIG_FILE}: ${detail}`);
  }

  try {
    return WorktrackConfigSchema.parse(data ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigurationError(describeZodError(err));
    }
    throw err;
  }
}

/**
 * Find the configuration file: workspace root first, then the default work folder.
 */
export function findConfigFile(workspaceDir: string): string | null {
  const candidates = [join(workspaceDir, CONFIG_FILE), join(workspaceDir, DEFAULT_WORK_FOLDER, CONFIG_FILE)];
  return candidates.find(candidate => existsSync(candidate)) ?? null;
}

/**
 * Load the configuration for a workspace. A missing file yields defaults.
 */
export async function loadConfig(workspaceDir: string): Promise<WorktrackConfig> {
  const configPath = findConfigFile(workspaceDir);
  if (configPath === null) {
    return mergeWithDefaults({});
  }
  const content = await readFile(configPath, 'utf-8');
  return mergeWithDefaults(parseConfig(content));
}

/**
 * Fill in every setting the user left out. User status folders merge over
 * the defaults; everything else is replaced wholesale.
 */
export function mergeWithDefaults(config: WorktrackConfig): WorktrackConfig {
  const validation = config.validation ?? {};
  return {
    ...config,
    work_folder: config.work_folder ?? DEFAULT_WORK_FOLDER,
    status_folders: { ...DEFAULT_STATUS_FOLDERS, ...config.status_folders },
    validation: {
      required_fields: validation.required_fields ?? [...HARDCODED_FIELDS],
      id_format: validation.id_format ?? DEFAULT_ID_FORMAT,
      status_values: validation.status_values ?? [...DEFAULT_STATUS_VALUES],
      strict: validation.strict ?? false,
    },
    ignored_paths: config.ignored_paths ?? [],
    fields: config.fields ?? {},
  };
}

/**
 * Checks that belong to the configuration file rather than to a single field.
 */
export function validateConfig(config: WorktrackConfig): void {
  const workFolder = config.work_folder;
  if (workFolder !== undefined) {
    if (workFolder.trim() === '') {
      throw new ConfigurationError('work_folder cannot be empty or whitespace only');
    }
    if (workFolder.includes('\0')) {
      throw new ConfigurationError('work_folder cannot contain null byte');
    }
  }

  for (const name of Object.keys(config.fields ?? {})) {
    if (isHardcodedField(name)) {
      throw new ConfigurationError(`field '${name}' cannot be configured and must use hardcoded validation`);
    }
  }
}

// ============================================================================
// Compilation
// ============================================================================

function compileRegex(source: string, label: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${label} '${source}': ${detail}`);
  }
}

function compileDateBound(
  name: string,
  key: 'min_date' | 'max_date',
  value: string | undefined,
  pattern: DatePattern
): DateBound | null {
  if (value === undefined || value === '') return null;
  if (value === 'today') return { kind: 'today' };
  if (value === 'future') return { kind: 'future' };

  const parsed = parseWithPattern(value, pattern) ?? parseWithPattern(value, compileDatePattern(DEFAULT_DATE_FORMAT));
  if (parsed === null) {
    throw new ConfigurationError(`field '${name}': invalid ${key} '${value}'`);
  }
  return { kind: 'absolute', date: toCalendarDate(parsed), source: value };
}

function checkTypeSpecifics(name: string, config: FieldConfig): void {
  const allowed = config.allowed_values ?? [];
  if (config.type === 'enum' && allowed.length === 0) {
    throw new ConfigurationError(`field '${name}': enum type requires allowed_values`);
  }
  if (config.type !== 'array') return;

  if (config.item_type === undefined) {
    throw new ConfigurationError(`field '${name}': array type requires item_type`);
  }
  if (config.item_type === 'enum' && allowed.length === 0) {
    throw new ConfigurationError(`field '${name}': array with enum item_type requires allowed_values`);
  }
}

function checkConstraints(name: string, config: FieldConfig): void {
  const { min_length: minLength, max_length: maxLength, min, max } = config;

  if (minLength !== undefined && minLength < 0) {
    throw new ConfigurationError(`field '${name}': min_length (${minLength}) cannot be negative`);
  }
  if (maxLength !== undefined && maxLength < 0) {
    throw new ConfigurationError(`field '${name}': max_length (${maxLength}) cannot be negative`);
  }
  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    throw new ConfigurationError(
      `field '${name}': min_length (${minLength}) cannot be greater than max_length (${maxLength})`
    );
  }
  // A negative max only makes sense with a negative min
  if (max !== undefined && max < 0 && (min === undefined || min >= 0)) {
    throw new ConfigurationError(
      `field '${name}': max (${max}) cannot be negative when min is not set or is non-negative`
    );
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw new ConfigurationError(`field '${name}': min (${min}) cannot be greater than max (${max})`);
  }
}

/**
 * Validate one schema entry and precompile its patterns.
 */
export function compileField(name: string, config: FieldConfig): CompiledField {
  if (name === '') {
    throw new ConfigurationError('field name cannot be empty');
  }

  checkTypeSpecifics(name, config);

  const format = config.format ?? '';
  const pattern =
    config.type === 'string' && format !== '' ? compileRegex(format, `field '${name}': invalid regex format`) : null;

  const datePattern = compileDatePattern(config.type === 'date' ? format : '');
  if (config.type === 'date') {
    const problem = checkDatePattern(datePattern);
    if (problem !== null) {
      throw new ConfigurationError(`field '${name}': invalid date format '${datePattern.source}': ${problem}`);
    }
  }

  checkConstraints(name, config);

  return Object.freeze({
    name,
    type: config.type,
    config: Object.freeze({ ...config }),
    pattern,
    datePattern,
    caseSensitive: config.case_sensitive ?? true,
    minDate: compileDateBound(name, 'min_date', config.min_date, datePattern),
    maxDate: compileDateBound(name, 'max_date', config.max_date, datePattern),
  });
}

/**
 * Compile a configuration into the immutable Schema handed to every
 * validator, resolver and fixer. Unset settings take their defaults.
 */
export function compileSchema(config: WorktrackConfig): Schema {
  const merged = mergeWithDefaults(config);
  const validation = merged.validation ?? {};
  const idFormatSource = validation.id_format ?? DEFAULT_ID_FORMAT;

  const fields = new Map<string, CompiledField>();
  for (const name of Object.keys(merged.fields ?? {}).sort()) {
    const fieldConfig = merged.fields?.[name];
    if (fieldConfig) {
      fields.set(name, compileField(name, fieldConfig));
    }
  }

  return Object.freeze({
    hardcodedFields: HARDCODED_FIELDS,
    fields,
    validation: Object.freeze({
      requiredFields: Object.freeze([...(validation.required_fields ?? HARDCODED_FIELDS)]),
      idFormat: compileRegex(idFormatSource, 'invalid id_format'),
      idFormatSource,
      statusValues: Object.freeze([...(validation.status_values ?? DEFAULT_STATUS_VALUES)]),
      strict: validation.strict ?? false,
    }),
    statusFolders: Object.freeze({ ...merged.status_folders }),
    workFolder: merged.work_folder ?? DEFAULT_WORK_FOLDER,
    ignoredPaths: Object.freeze([...(merged.ignored_paths ?? [])]),
  });
}

/**
 * Load, validate and compile the schema for a workspace.
 */
export async function loadSchema(workspaceDir: string): Promise<Schema> {
  const config = await loadConfig(workspaceDir);
  validateConfig(config);
  return compileSchema(config);
}

/**
 * Directory name of the "doing" status folder, if configured.
 */
export function getDoingFolder(schema: Schema): string | undefined {
  return schema.statusFolders['doing'];
}
