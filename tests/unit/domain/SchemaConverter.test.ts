import { describe, it, expect } from 'vitest';
import { SchemaConverter } from '../../../src/domain/services/SchemaConverter.js';
import { SchemaConversionError } from '../../../src/domain/model/errors.js';
import type { DictionaryField } from '../../../src/domain/model/DataDictionary.js';

describe('SchemaConverter', () => {
  describe('mapKind', () => {
    it.each([
      ['integer', 'integer'],
      ['number', 'number'],
      ['float', 'number'],
      ['boolean', 'boolean'],
      ['datetime', 'datetime'],
      ['array', 'array'],
      ['object', 'object'],
      ['string', 'string'],
      [' Integer ', 'integer'],
      ['geojson', 'string'],
      ['any', 'string'],
      [undefined, 'string'],
    ])('should map %s to %s', (label, kind) => {
      expect(SchemaConverter.mapKind(label)).toBe(kind);
    });
  });

  describe('convert', () => {
    const converter = new SchemaConverter();

    it('should keep dictionary order and map types', () => {
      const schema = converter.convert([
        { name: 'sample_id', type: 'string', constraints: { required: true } },
        { name: 'collection_date', type: 'datetime' },
        { name: 'latitude', type: 'number' },
      ]);

      expect(schema.names).toEqual(['sample_id', 'collection_date', 'latitude']);
      expect(schema.fields.map((f) => f.kind)).toEqual(['string', 'datetime', 'number']);
      expect(schema.fields.map((f) => f.required)).toEqual([true, false, false]);
    });

    it('should give datetime fields the date-time format whatever the dictionary says', () => {
      const schema = converter.convert([{ name: 'when', type: 'datetime', format: 'default' }]);
      expect(schema.get('when')?.format).toBe('date-time');
    });

    it('should keep explicit formats and drop the default one', () => {
      const schema = converter.convert([
        { name: 'contact', type: 'string', format: 'email' },
        { name: 'notes', type: 'string', format: 'default' },
      ]);
      expect(schema.get('contact')?.format).toBe('email');
      expect(schema.get('notes')?.format).toBeUndefined();
    });

    it('should copy constraints and leave out the required flag', () => {
      const schema = converter.convert([
        {
          name: 'depth',
          type: 'integer',
          constraints: { required: true, minimum: 0, maximum: 500 },
        },
        { name: 'free', type: 'string', constraints: { required: false } },
      ]);
      expect(schema.get('depth')?.constraints).toEqual({ minimum: 0, maximum: 500 });
      expect(schema.get('free')?.constraints).toBeUndefined();
    });

    it('should carry title and description', () => {
      const schema = converter.convert([{ name: 'site', title: 'Site Name', description: 'Where it was taken' }]);
      const field = schema.get('site');
      expect(field?.title).toBe('Site Name');
      expect(field?.description).toBe('Where it was taken');
      expect(field?.kind).toBe('string');
    });

    it('should return an empty schema for an empty dictionary', () => {
      expect(converter.convert([]).size).toBe(0);
    });
  });

  describe('asterisk convention', () => {
    const fields: DictionaryField[] = [
      { name: 'sample_id*', type: 'string' },
      { name: 'site', title: 'Site *', type: 'string' },
      { name: 'notes', type: 'string' },
    ];

    it('should mark fields whose name or title ends with an asterisk as required', () => {
      const schema = new SchemaConverter().convert(fields);
      expect(schema.fields.map((f) => f.required)).toEqual([true, true, false]);
    });

    it('should ignore asterisks when the convention is turned off', () => {
      const schema = new SchemaConverter({ asteriskMarksRequired: false }).convert(fields);
      expect(schema.fields.map((f) => f.required)).toEqual([false, false, false]);
    });
  });

  describe('duplicates', () => {
    it('should list every duplicated name with its positions', () => {
      const converter = new SchemaConverter();
      expect(() =>
        converter.convert([
          { name: 'site', type: 'string' },
          { name: 'depth', type: 'number' },
          { name: 'site', type: 'string' },
        ]),
      ).toThrow("Data dictionary contains duplicate fields:\n  • Name 'site' appears at positions: 1, 3");
    });

    it('should compare titles after whitespace normalization', () => {
      const converter = new SchemaConverter();
      let caught: unknown;
      try {
        converter.convert([
          { name: 'a', title: 'Sample  ID' },
          { name: 'b', title: ' Sample ID' },
        ]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaConversionError);
      if (caught instanceof SchemaConversionError) {
        expect(caught.duplicates).toEqual([{ attribute: 'title', value: 'Sample ID', positions: [1, 2] }]);
      }
    });
  });

  describe('convertDictionary', () => {
    it('should carry identifier and title into the metadata', () => {
      const schema = new SchemaConverter().convertDictionary({
        identifier: 'dd-1',
        title: 'Samples',
        fields: [{ name: 'sample_id' }],
      });
      expect(schema.metadata).toEqual({ identifier: 'dd-1', title: 'Samples' });
    });
  });
});
