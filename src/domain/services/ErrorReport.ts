import { formatFieldError, type RowErrors, type ValidationOutcome } from '../model/ValidationResult.js';
import { stringifyCell } from './TypeCoercer.js';

const RULE = '=============================';

/**
 * Render the human-readable error report for an outcome.
 *
 * Lists every failing row with its raw cells and its errors, in input order.
 */
export function renderErrorReport(outcome: ValidationOutcome, generatedAt: Date): string {
  const lines = [
    RULE,
    `Generated at: ${generatedAt.toISOString()}`,
    '',
    `Total rows with errors: ${String(outcome.rowErrors.length)}`,
  ];

  for (const entry of outcome.rowErrors) {
    lines.push('', ...renderRow(entry));
  }

  return lines.join('\n');
}

function renderRow(entry: RowErrors): string[] {
  return [
    `Row ${String(entry.rowIndex)}: ${String(entry.errors.length)} error(s)`,
    `Row data: ${JSON.stringify(rawRowToJson(entry), null, 2)}`,
    'Errors:',
    ...entry.errors.map((error) => `  - ${formatFieldError(error)}`),
  ];
}

function rawRowToJson(entry: RowErrors): Record<string, string | number | boolean | null> {
  const data: Record<string, string | number | boolean | null> = {};
  for (const [header, value] of entry.raw.entries()) {
    if (value === null || value === undefined) {
      data[header] = null;
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      data[header] = value;
    } else {
      data[header] = stringifyCell(value);
    }
  }
  return data;
}
