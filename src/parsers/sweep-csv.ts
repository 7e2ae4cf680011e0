import { parse } from 'csv-parse/sync';
import { readFileSync } from 'node:fs';
import { validateOverrides, type AssumptionOverrides } from '../config/schema.js';

/**
 * One variant of the base assumptions, from one CSV row.
 */
export interface SweepRow {
  row: number; // 1-based data row
  label: string;
  overrides: AssumptionOverrides;
}

export interface SweepRowError {
  row: number;
  label: string;
  issues: string[];
}

export interface SweepFile {
  rows: SweepRow[];
  errors: SweepRowError[];
}

const RENT_OUT_PREFIX = 'rentOut.';

/**
 * Parse a sweep CSV file.
 *
 * Format: comma-delimited with a header row. `label` names the row; any other
 * column is an assumption field in decimals (`mortgageRate` = 0.065), with
 * rent-out fields prefixed (`rentOut.yearsOccupied`). Empty cells keep the
 * base value.
 */
export function parseSweepCsv(filePath: string): SweepFile {
  const raw = readFileSync(filePath, 'utf-8');
  return parseSweepCsvString(raw);
}

export function parseSweepCsvString(raw: string): SweepFile {
  const records = parse(raw, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as Record<string, string>[];

  const file: SweepFile = { rows: [], errors: [] };

  records.forEach((record, index) => {
    const row = index + 1;
    const label = record.label && record.label.length > 0 ? record.label : `Row ${row}`;
    const result = validateOverrides(toOverrides(record));

    if (result.ok) {
      file.rows.push({ row, label, overrides: result.value });
    } else {
      file.errors.push({ row, label, issues: result.issues });
    }
  });

  return file;
}

function toOverrides(record: Record<string, string>): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const rentOut: Record<string, unknown> = {};

  for (const [column, cell] of Object.entries(record)) {
    if (column === 'label' || cell === '') continue;

    if (column.startsWith(RENT_OUT_PREFIX)) {
      rentOut[column.slice(RENT_OUT_PREFIX.length)] = Number(cell);
    } else if (column === 'propertyType') {
      overrides[column] = cell.toLowerCase();
    } else {
      overrides[column] = Number(cell);
    }
  }

  if (Object.keys(rentOut).length > 0) overrides.rentOut = rentOut;
  return overrides;
}
