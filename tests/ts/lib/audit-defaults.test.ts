import { describe, it, expect } from 'vitest';
import { applyFieldDefaults, hasDefault, resolveDefaultValue } from '../../../src/lib/audit/defaults.js';
import { compileField, compileSchema } from '../../../src/lib/schema.js';
import { createEmptyWorkItem } from '../../../src/lib/frontmatter.js';
import { ConfigurationError } from '../../../src/lib/errors.js';
import { NOW } from '../fixtures/setup.js';

describe('audit defaults', () => {
  describe('resolveDefaultValue', () => {
    it('should turn scalar string defaults into strings', () => {
      expect(resolveDefaultValue(compileField('area', { type: 'string', default: 42 }))).toEqual({
        kind: 'string',
        value: '42',
      });
    });

    it('should resolve today in the field pattern', () => {
      const iso = compileField('start', { type: 'date', default: 'today' });
      const european = compileField('start', { type: 'date', format: 'DD.MM.YYYY', default: 'today' });

      expect(resolveDefaultValue(iso, NOW)).toEqual({ kind: 'string', value: '2026-03-15' });
      expect(resolveDefaultValue(european, NOW)).toEqual({ kind: 'string', value: '15.03.2026' });
    });

    it('should coerce numeric strings for number fields', () => {
      expect(resolveDefaultValue(compileField('estimate', { type: 'number', default: '3.5' }))).toEqual({
        kind: 'number',
        value: 3.5,
      });
    });

    it('should wrap a scalar default for array fields', () => {
      expect(resolveDefaultValue(compileField('tags', { type: 'array', item_type: 'string', default: 'ci' }))).toEqual({
        kind: 'sequence',
        items: [{ kind: 'string', value: 'ci' }],
      });
    });

    it('should allow an empty email placeholder', () => {
      expect(resolveDefaultValue(compileField('assignee', { type: 'email', default: '' }))).toEqual({
        kind: 'string',
        value: '',
      });
    });

    it('should reject defaults the field cannot hold', () => {
      expect(() => resolveDefaultValue(compileField('due', { type: 'date', default: '2026-13-01' }))).toThrow(
        new ConfigurationError(
          "failed to resolve default value for field 'due': invalid date default value '2026-13-01' (expected format: YYYY-MM-DD)"
        )
      );
      expect(() => resolveDefaultValue(compileField('estimate', { type: 'number', default: 'lots' }))).toThrow(
        new ConfigurationError("failed to resolve default value for field 'estimate': number default must be numeric, got string")
      );
      expect(() =>
        resolveDefaultValue(compileField('priority', { type: 'enum', allowed_values: ['low', 'high'], default: 'urgent' }))
      ).toThrow(
        new ConfigurationError(
          "failed to resolve default value for field 'priority': enum default 'urgent' is not in allowed values: low, high"
        )
      );
      expect(() => resolveDefaultValue(compileField('assignee', { type: 'email', default: 'nobody' }))).toThrow(
        new ConfigurationError("failed to resolve default value for field 'assignee': invalid email default value: nobody")
      );
    });

    it('should treat a null default as no default', () => {
      expect(hasDefault(compileField('area', { type: 'string', default: null }))).toBe(false);
      expect(hasDefault(compileField('area', { type: 'string', default: '' }))).toBe(true);
    });
  });

  describe('applyFieldDefaults', () => {
    const schema = compileSchema({
      fields: {
        priority: { type: 'enum', allowed_values: ['low', 'medium', 'high'], default: 'medium' },
        area: { type: 'string', default: 'core' },
        notes: { type: 'string', default: '' },
        estimate: { type: 'number' },
      },
    });

    it('should fill absent and empty fields and report them sorted', () => {
      const item = createEmptyWorkItem();
      item.fields['area'] = { kind: 'null' };

      expect(applyFieldDefaults(item, schema, NOW)).toEqual(['area', 'notes', 'priority']);
      expect(item.fields).toEqual({
        area: { kind: 'string', value: 'core' },
        notes: { kind: 'string', value: '' },
        priority: { kind: 'string', value: 'medium' },
      });
    });

    it('should never overwrite a non-empty value', () => {
      const item = createEmptyWorkItem();
      item.fields['priority'] = { kind: 'string', value: 'high' };
      item.fields['area'] = { kind: 'string', value: 'docs' };
      item.fields['notes'] = { kind: 'string', value: 'keep me' };

      expect(applyFieldDefaults(item, schema, NOW)).toEqual([]);
      expect(item.fields['priority']).toEqual({ kind: 'string', value: 'high' });
      expect(item.fields['area']).toEqual({ kind: 'string', value: 'docs' });
    });

    it('should skip an empty default over an existing empty value', () => {
      const item = createEmptyWorkItem();
      item.fields['notes'] = { kind: 'string', value: '' };

      expect(applyFieldDefaults(item, schema, NOW)).toEqual(['area', 'priority']);
    });

    it('should never apply defaults to hardcoded fields', () => {
      const withHardcoded = compileSchema({
        fields: {
          status: { type: 'string', default: 'todo' },
          area: { type: 'string', default: 'core' },
        },
      });
      const item = createEmptyWorkItem();

      expect(applyFieldDefaults(item, withHardcoded, NOW)).toEqual(['area']);
      expect(item.status).toBe('');
      expect(item.fields['status']).toBeUndefined();
    });
  });
});
