const SPACE_GROUPING = /[\s'\u2019]/;
const SPACE_GROUPING_ALL = /[\s'\u2019]/g;
const SPACE_GROUPED = /^(\d{1,3}(?:[\s'\u2019]\d{3})+)(?:[.,](\d+))?$/;
const SCIENTIFIC = /^[+-]?(\d+\.?\d*|\.\d+)[eE][+-]?\d+$/;
const DIGITS_AND_SEPARATORS = /^[\d.,]+$/;

/**
 * Parse spreadsheet-style numeric text.
 *
 * Both `.` and `,` are recognized:
 * - both present: the last one is the decimal separator and may appear once;
 *   the other one groups thousands (`1.234,56`, `1,234.56`)
 * - one of them, once: decimal separator (`45.123`, `1,5`, `1.234` → 1.234)
 * - one of them, more than once: thousands grouping (`1,234,567`)
 *
 * Spaces (no-break spaces included) and apostrophes only ever group thousands
 * (`1 234,5`, `1'234'567`), and then a single `.` or `,` is the decimal separator.
 *
 * Grouped digits must form groups of exactly three after a leading group of one
 * to three. Anything else left over makes the text unparseable.
 *
 * @returns the parsed number, or `null` when the text is not a number.
 */
export function parseLocaleNumber(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;

  if (SCIENTIFIC.test(trimmed)) {
    return finiteOrNull(Number(trimmed));
  }

  let sign = '';
  let body = trimmed;
  if (body.startsWith('-') || body.startsWith('+')) {
    sign = body.startsWith('-') ? '-' : '';
    body = body.slice(1);
  }

  const canonical = SPACE_GROUPING.test(body) ? fromSpaceGrouped(body) : fromSeparators(body);
  if (canonical === null) return null;
  return finiteOrNull(Number(`${sign}${canonical}`));
}

function fromSpaceGrouped(body: string): string | null {
  const match = SPACE_GROUPED.exec(body);
  if (!match) return null;
  const [, integerPart = '', fraction] = match;
  const digits = integerPart.replace(SPACE_GROUPING_ALL, '');
  return fraction === undefined ? digits : `${digits}.${fraction}`;
}

function fromSeparators(body: string): string | null {
  if (!DIGITS_AND_SEPARATORS.test(body) || !/\d/.test(body)) return null;
  return toCanonical(body);
}

function toCanonical(body: string): string | null {
  const dots = countOf(body, '.');
  const commas = countOf(body, ',');

  if (dots === 0 && commas === 0) return body;

  if (dots > 0 && commas > 0) {
    const decimal = body.lastIndexOf('.') > body.lastIndexOf(',') ? '.' : ',';
    const grouping = decimal === '.' ? ',' : '.';
    if (countOf(body, decimal) !== 1) return null;
    const [integerPart = '', fraction = ''] = body.split(decimal);
    const digits = ungroup(integerPart, grouping);
    if (digits === null || fraction === '') return null;
    return `${digits}.${fraction}`;
  }

  const separator = dots > 0 ? '.' : ',';
  const count = dots > 0 ? dots : commas;

  if (count === 1) {
    const [integerPart = '', fraction = ''] = body.split(separator);
    if (fraction === '') return null;
    return `${integerPart === '' ? '0' : integerPart}.${fraction}`;
  }

  return ungroup(body, separator);
}

function ungroup(integerPart: string, grouping: string): string | null {
  if (!integerPart.includes(grouping)) {
    return integerPart === '' ? null : integerPart;
  }
  const groups = integerPart.split(grouping);
  const [lead = '', ...rest] = groups;
  if (lead.length < 1 || lead.length > 3 || rest.some((g) => g.length !== 3)) return null;
  return groups.join('');
}

function countOf(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}
