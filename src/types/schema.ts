import { z } from 'zod';

export const FIELD_TYPES = ['string', 'date', 'email', 'url', 'number', 'array', 'enum'] as const;
export const ARRAY_ITEM_TYPES = ['string', 'number', 'enum'] as const;

export const FieldTypeSchema = z.enum(FIELD_TYPES);
export const ArrayItemTypeSchema = z.enum(ARRAY_ITEM_TYPES);

// One configurable front-matter field
export const FieldConfigSchema = z.object({
  type: FieldTypeSchema,
  required: z.boolean().optional(),
  default: z.unknown().optional(),
  format: z.string().optional(),
  allowed_values: z.array(z.string()).optional(),
  description: z.string().optional(),
  display_name: z.string().optional(),
  category: z.string().optional(),
  deprecated: z.boolean().optional(),
  min_length: z.number().int().optional(),
  max_length: z.number().int().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  min_date: z.string().optional(),
  max_date: z.string().optional(),
  item_type: ArrayItemTypeSchema.optional(),
  unique: z.boolean().optional(),
  schemes: z.array(z.string()).optional(),
  case_sensitive: z.boolean().optional(),
});

export const ValidationSettingsSchema = z.object({
  required_fields: z.array(z.string()).optional(),
  id_format: z.string().optional(),
  status_values: z.array(z.string()).optional(),
  strict: z.boolean().optional(),
});

// Root configuration file (worktrack.yml). Keys owned by other tools
// (templates, commit, release...) pass through untouched.
export const WorktrackConfigSchema = z
  .object({
    version: z.union([z.string(), z.number()]).optional(),
    work_folder: z.string().optional(),
    status_folders: z.record(z.string()).optional(),
    validation: ValidationSettingsSchema.optional(),
    ignored_paths: z.array(z.string()).optional(),
    fields: z.record(FieldConfigSchema).optional(),
  })
  .passthrough();

// Inferred types
export type FieldType = z.infer<typeof FieldTypeSchema>;
export type ArrayItemType = z.infer<typeof ArrayItemTypeSchema>;
export type FieldConfig = z.infer<typeof FieldConfigSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type WorktrackConfig = z.infer<typeof WorktrackConfigSchema>;

/**
 * A date bound after compilation: relative tokens stay symbolic so they are
 * evaluated against the clock at validation time.
 */
export type DateBound =
  | { kind: 'today' }
  | { kind: 'future' }
  | { kind: 'absolute'; date: Date; source: string };

/**
 * Compiled form of a date format pattern (see local-date.ts).
 */
export interface DatePattern {
  readonly source: string;
  readonly regex: RegExp;
  /** Token names in capture-group order */
  readonly groups: readonly DateToken[];
  readonly segments: readonly DateSegment[];
}

export type DateToken = 'YYYY' | 'MM' | 'DD' | 'HH' | 'mm' | 'ss';

export type DateSegment =
  | { kind: 'token'; token: DateToken }
  | { kind: 'literal'; text: string };

/**
 * A schema entry with its patterns compiled once at load time.
 */
export interface CompiledField {
  readonly name: string;
  readonly type: FieldType;
  readonly config: FieldConfig;
  /** Regex for string `format` (null when unset) */
  readonly pattern: RegExp | null;
  /** Effective date pattern (`YYYY-MM-DD` when `format` is empty) */
  readonly datePattern: DatePattern;
  readonly caseSensitive: boolean;
  readonly minDate: DateBound | null;
  readonly maxDate: DateBound | null;
}

export interface CompiledValidation {
  readonly requiredFields: readonly string[];
  readonly idFormat: RegExp;
  readonly idFormatSource: string;
  readonly statusValues: readonly string[];
  readonly strict: boolean;
}

/**
 * The immutable schema every validator, resolver and fixer receives.
 */
export interface Schema {
  readonly hardcodedFields: readonly string[];
  readonly fields: ReadonlyMap<string, CompiledField>;
  readonly validation: CompiledValidation;
  readonly statusFolders: Readonly<Record<string, string>>;
  readonly workFolder: string;
  readonly ignoredPaths: readonly string[];
}
