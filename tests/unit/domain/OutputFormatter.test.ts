import { describe, it, expect } from 'vitest';
import { formatHeader, formatTable, formatValue } from '../../../src/domain/services/OutputFormatter.js';
import { Schema } from '../../../src/domain/model/Schema.js';
import { Kind, createFieldDescriptor } from '../../../src/domain/model/FieldDescriptor.js';
import { OrderedRecord } from '../../../src/domain/model/OrderedRecord.js';
import { coerce } from '../../../src/domain/services/TypeCoercer.js';
import { ABSENT, type CoercedValue } from '../../../src/domain/model/CoercedValue.js';

describe('OutputFormatter', () => {
  const schema = new Schema([
    createFieldDescriptor({ name: 'id', kind: Kind.INTEGER }),
    createFieldDescriptor({ name: 'taken_at', kind: Kind.DATE_TIME }),
    createFieldDescriptor({ name: 'tags', kind: Kind.ARRAY }),
  ]);

  describe('formatValue', () => {
    it.each<[CoercedValue, string]>([
      [ABSENT, ''],
      [{ kind: 'integer', value: 42 }, '42'],
      [{ kind: 'number', value: 45.123 }, '45.123'],
      [{ kind: 'number', value: -0 }, '0'],
      [{ kind: 'number', value: 1e-7 }, '0.0000001'],
      [{ kind: 'number', value: -1.5e-7 }, '-0.00000015'],
      [{ kind: 'number', value: 1e21 }, '1000000000000000000000'],
      [{ kind: 'number', value: 1.2345e25 }, '12345000000000000000000000'],
      [{ kind: 'boolean', value: false }, 'false'],
      [{ kind: 'datetime', value: new Date('2024-01-15T00:00:00Z'), hasTime: false }, '2024-01-15'],
      [{ kind: 'datetime', value: new Date('2024-01-15T10:30:00Z'), hasTime: true }, '2024-01-15T10:30:00.000Z'],
      [{ kind: 'array', value: ['a', 1] }, '["a",1]'],
      [{ kind: 'object', value: { site: 'A' } }, '{"site":"A"}'],
      [{ kind: 'string', value: 'say "hi"' }, 'say "hi"'],
    ])('should render %o as %s', (value, expected) => {
      expect(formatValue(value)).toBe(expected);
    });
  });

  it('should render coerced scientific text in plain decimal digits', () => {
    const cases: [string, string][] = [
      ['0.0000001', '0.0000001'],
      ['1.5e-7', '0.00000015'],
      ['1000000000000000000000', '1000000000000000000000'],
    ];
    for (const [text, expected] of cases) {
      const result = coerce(text, Kind.NUMBER);
      expect(result.ok ? formatValue(result.value) : null).toBe(expected);
    }
  });

  it('should use field names as the header', () => {
    expect(formatHeader(schema)).toEqual(['id', 'taken_at', 'tags']);
  });

  it('should render rows in schema order whatever the record order', () => {
    const fields = OrderedRecord.from<CoercedValue>([
      ['tags', { kind: 'array', value: ['x'] }],
      ['id', { kind: 'integer', value: 7 }],
    ]);

    expect(formatTable(schema, [{ rowIndex: 1, fields }])).toEqual([
      ['id', 'taken_at', 'tags'],
      ['7', '', '["x"]'],
    ]);
  });
});
