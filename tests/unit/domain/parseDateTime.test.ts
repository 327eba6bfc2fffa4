import { describe, it, expect } from 'vitest';
import { hasTimeOfDay, parseDateText, parseSerialDate } from '../../../src/domain/services/parseDateTime.js';

describe('parseDateText', () => {
  it('should read an ISO date as midnight UTC', () => {
    const parsed = parseDateText('2024-01-15');
    expect(parsed?.value.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parsed?.hasTime).toBe(false);
    expect(parsed?.format).toBe('iso-date');
  });

  it('should read ISO date-times with either separator and without offset as UTC', () => {
    expect(parseDateText('2024-01-15T10:30:00Z')?.value.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parseDateText('2024-01-15 10:30')?.value.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parseDateText('2024-01-15T10:30:00.5Z')?.value.toISOString()).toBe('2024-01-15T10:30:00.500Z');
    expect(parseDateText('2024-01-15T10:30')?.hasTime).toBe(true);
  });

  it('should apply the UTC offset of a date-time', () => {
    expect(parseDateText('2024-01-15T10:30:00+02:00')?.value.toISOString()).toBe('2024-01-15T08:30:00.000Z');
    expect(parseDateText('2024-01-15T10:30:00-0130')?.value.toISOString()).toBe('2024-01-15T12:00:00.000Z');
  });

  it('should read slash and dash day orders', () => {
    expect(parseDateText('2024/1/15')?.value.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parseDateText('2024/1/15')?.format).toBe('year-slash-month-day');
    expect(parseDateText('01/15/2024')?.value.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parseDateText('01/15/2024')?.format).toBe('month-day-year');
    expect(parseDateText('15-01-2024')?.value.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parseDateText('15-01-2024')?.format).toBe('day-month-year');
  });

  it('should reject calendar-invalid dates instead of rolling them over', () => {
    expect(parseDateText('2024-02-30')).toBeNull();
    expect(parseDateText('2023-02-29')).toBeNull();
    expect(parseDateText('2024-02-29')?.value.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(parseDateText('13/01/2024')).toBeNull();
    expect(parseDateText('2024-01-15T24:00')).toBeNull();
  });

  it('should return null for unrecognized text', () => {
    expect(parseDateText('invalid-date')).toBeNull();
    expect(parseDateText('15 Jan 2024')).toBeNull();
  });
});

describe('parseSerialDate', () => {
  it('should count days from 1899-12-30', () => {
    const parsed = parseSerialDate(45306);
    expect(parsed?.value.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parsed?.hasTime).toBe(false);
    expect(parsed?.format).toBe('spreadsheet-serial');
  });

  it('should read the fraction as time of day', () => {
    const parsed = parseSerialDate(45306.5);
    expect(parsed?.value.toISOString()).toBe('2024-01-15T12:00:00.000Z');
    expect(parsed?.hasTime).toBe(true);
  });

  it('should roll a fraction that rounds to a full day into the next day', () => {
    const parsed = parseSerialDate(0.999999999);
    expect(parsed?.value.toISOString()).toBe('1899-12-31T00:00:00.000Z');
    expect(parsed?.hasTime).toBe(false);
  });

  it('should reject serials outside the supported range', () => {
    expect(parseSerialDate(-1)).toBeNull();
    expect(parseSerialDate(Number.NaN)).toBeNull();
    expect(parseSerialDate(3_000_000)).toBeNull();
  });
});

describe('hasTimeOfDay', () => {
  it('should be false only at UTC midnight', () => {
    expect(hasTimeOfDay(new Date('2024-01-15T00:00:00Z'))).toBe(false);
    expect(hasTimeOfDay(new Date('2024-01-15T00:00:01Z'))).toBe(true);
  });
});
