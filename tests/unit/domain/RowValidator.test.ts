import { describe, it, expect } from 'vitest';
import { RowValidator } from '../../../src/domain/services/RowValidator.js';
import { SchemaConverter } from '../../../src/domain/services/SchemaConverter.js';
import { formatRow } from '../../../src/domain/services/OutputFormatter.js';
import { createRawRow, type RawCell } from '../../../src/domain/model/Record.js';
import type { DictionaryField } from '../../../src/domain/model/DataDictionary.js';
import type { FieldError, RowResult, ValidatedRow } from '../../../src/domain/model/ValidationResult.js';

function schemaOf(fields: DictionaryField[]) {
  return new SchemaConverter().convert(fields);
}

function errorsOf(result: RowResult): readonly FieldError[] {
  return result.status === 'errored' ? result.rowErrors.errors : [];
}

function rowOf(result: RowResult): ValidatedRow {
  if (result.status !== 'valid') throw new Error('expected a valid row');
  return result.row;
}

describe('RowValidator', () => {
  const samples = schemaOf([
    { name: 'sample_id', type: 'string', constraints: { required: true } },
    { name: 'collection_date', type: 'datetime' },
    { name: 'latitude', type: 'number' },
  ]);
  const validator = new RowValidator(samples);

  it('should coerce a valid row and render it in schema order', () => {
    const result = validator.validate(
      createRawRow({ latitude: '45.123', sample_id: 'S1', collection_date: '2024-01-15' }),
      1,
    );

    const row = rowOf(result);
    expect(row.rowIndex).toBe(1);
    expect(row.fields.keys()).toEqual(['sample_id', 'collection_date', 'latitude']);
    expect(formatRow(samples, row)).toEqual(['S1', '2024-01-15', '45.123']);
  });

  it('should report one error per failing field, in field order', () => {
    const raw = createRawRow({ sample_id: '', collection_date: 'invalid-date', latitude: 'not-a-number' });
    const result = validator.validate(raw, 2);

    expect(result.status).toBe('errored');
    expect(errorsOf(result).map((e) => [e.fieldName, e.kind])).toEqual([
      ['sample_id', 'MissingRequired'],
      ['collection_date', 'FormatInvalid'],
      ['latitude', 'TypeMismatch'],
    ]);
    expect(errorsOf(result)[0]!.message).toBe("Field 'sample_id' is required");
    expect(errorsOf(result)[2]!).toEqual({
      rowIndex: 2,
      fieldName: 'latitude',
      kind: 'TypeMismatch',
      message: 'expected number, got string "not-a-number"',
      value: 'not-a-number',
    });
    if (result.status === 'errored') {
      expect(result.rowErrors.raw).toBe(raw);
    }
  });

  it('should treat a missing column like an empty cell', () => {
    const result = validator.validate(createRawRow({ latitude: '1' }), 1);
    expect(errorsOf(result).map((e) => e.kind)).toEqual(['MissingRequired']);
  });

  it('should mark empty optional cells as absent', () => {
    const row = rowOf(validator.validate(createRawRow({ sample_id: 'S2', collection_date: ' ' }), 1));
    expect(row.fields.get('collection_date')).toEqual({ kind: 'absent' });
    expect(row.fields.get('latitude')).toEqual({ kind: 'absent' });
    expect(formatRow(samples, row)).toEqual(['S2', '', '']);
  });

  it('should resolve headers through field titles', () => {
    const schema = schemaOf([{ name: 'sample_id', title: 'Sample ID *', type: 'string' }]);
    const result = new RowValidator(schema).validate(createRawRow({ 'Sample ID*': 'S9' }), 1);
    expect(rowOf(result).fields.get('sample_id')).toEqual({ kind: 'string', value: 'S9' });
  });

  describe('unknown columns', () => {
    const raw = createRawRow({ sample_id: 'S1', notes: 'extra' });

    it('should ignore unknown columns by default', () => {
      const row = rowOf(validator.validate(raw, 1));
      expect(row.fields.has('notes')).toBe(false);
    });

    it('should report unknown columns in strict mode', () => {
      const result = new RowValidator(samples, { strict: true }).validate(raw, 4);
      expect(errorsOf(result)).toEqual([
        {
          rowIndex: 4,
          fieldName: 'notes',
          kind: 'UnknownField',
          message: "Unknown field 'notes' is not allowed in strict mode",
          value: 'extra',
        },
      ]);
    });
  });

  describe('constraints', () => {
    const schema = schemaOf([
      { name: 'depth', type: 'integer', constraints: { minimum: 0, maximum: 100 } },
      { name: 'code', type: 'string', constraints: { minLength: 2, maxLength: 4, pattern: '^[A-Z]+$' } },
      { name: 'habitat', type: 'string', constraints: { enum: ['Marine', 'Freshwater'] } },
      { name: 'replicate', type: 'integer', constraints: { enum: [1, 2, 3] } },
      { name: 'tags', type: 'array', constraints: { maxLength: 2 } },
    ]);
    const constrained = new RowValidator(schema);

    function kindsFor(cells: Record<string, RawCell>): string[] {
      return errorsOf(constrained.validate(createRawRow(cells), 1)).map((e) => `${e.fieldName}:${e.kind}`);
    }

    it('should check numeric bounds inclusively', () => {
      expect(kindsFor({ depth: '0' })).toEqual([]);
      expect(kindsFor({ depth: '100' })).toEqual([]);
      expect(kindsFor({ depth: '101' })).toEqual(['depth:OutOfRange']);
      expect(kindsFor({ depth: '-1' })).toEqual(['depth:OutOfRange']);
    });

    it('should describe the violated bound', () => {
      const result = constrained.validate(createRawRow({ depth: '150' }), 1);
      expect(errorsOf(result)[0]!.message).toBe("Field 'depth' must be at most 100, got 150");
    });

    it('should check lengths before the pattern and report only the first failure', () => {
      expect(kindsFor({ code: 'A' })).toEqual(['code:FormatInvalid']);
      expect(kindsFor({ code: 'ABCDE' })).toEqual(['code:FormatInvalid']);
      expect(kindsFor({ code: 'ab' })).toEqual(['code:PatternMismatch']);
      expect(kindsFor({ code: 'ABC' })).toEqual([]);
    });

    it('should report the pattern source in the message', () => {
      const result = constrained.validate(createRawRow({ code: 'abc' }), 1);
      expect(errorsOf(result)[0]!.message).toBe("Field 'code' does not match pattern ^[A-Z]+$");
    });

    it('should count array items against length limits', () => {
      expect(kindsFor({ tags: 'a;b' })).toEqual([]);
      expect(kindsFor({ tags: 'a;b;c' })).toEqual(['tags:FormatInvalid']);
    });

    it('should match enums case-insensitively and keep the listed spelling', () => {
      const row = rowOf(constrained.validate(createRawRow({ habitat: 'marine' }), 1));
      expect(row.fields.get('habitat')).toEqual({ kind: 'string', value: 'Marine' });
      expect(kindsFor({ habitat: 'Desert' })).toEqual(['habitat:FormatInvalid']);
    });

    it('should match numeric enums by value', () => {
      expect(kindsFor({ replicate: '2' })).toEqual([]);
      expect(kindsFor({ replicate: '4' })).toEqual(['replicate:FormatInvalid']);
    });

    it('should name the allowed values', () => {
      const result = constrained.validate(createRawRow({ habitat: 'Desert' }), 1);
      expect(errorsOf(result)[0]!.message).toBe("Field 'habitat' must be one of: Marine, Freshwater");
    });
  });

  describe('formats', () => {
    const schema = schemaOf([
      { name: 'contact', type: 'string', format: 'email' },
      { name: 'link', type: 'string', format: 'uri' },
    ]);
    const formatted = new RowValidator(schema);

    it('should accept and lowercase valid emails', () => {
      const row = rowOf(formatted.validate(createRawRow({ contact: ' Lab@Example.org ' }), 1));
      expect(row.fields.get('contact')).toEqual({ kind: 'string', value: 'lab@example.org' });
    });

    it('should reject malformed emails and URIs', () => {
      const result = formatted.validate(createRawRow({ contact: 'not-an-email', link: 'no scheme' }), 1);
      expect(errorsOf(result).map((e) => e.message)).toEqual([
        "Field 'contact' must be a valid email",
        "Field 'link' must be a valid URI",
      ]);
    });

    it('should accept URIs with a scheme', () => {
      expect(formatted.validate(createRawRow({ link: 'https://example.org/a' }), 1).status).toBe('valid');
    });
  });

  it('should fail at construction on an invalid pattern', () => {
    const schema = schemaOf([{ name: 'code', type: 'string', constraints: { pattern: '([' } }]);
    expect(() => new RowValidator(schema)).toThrow("Invalid pattern for field 'code'");
  });
});
