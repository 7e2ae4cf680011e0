import { describe, expect, it } from 'vitest';
import { parseSweepCsvString } from '../src/parsers/sweep-csv.js';

const CSV = `label,mortgageRate,horizonYears,propertyType,rentOut.yearsOccupied
Low rate,0.05,10,,
Condo rental,,12,Condo,4
,0.08,,,
Bad rate,abc,,,
`;

describe('parseSweepCsvString', () => {
  const file = parseSweepCsvString(CSV);

  it('parses every valid row', () => {
    expect(file.rows).toHaveLength(3);
  });

  it('empty cells keep the base value', () => {
    expect(file.rows[0]).toEqual({
      row: 1,
      label: 'Low rate',
      overrides: { mortgageRate: 0.05, horizonYears: 10 },
    });
  });

  it('nests rent-out columns and normalizes the property type', () => {
    expect(file.rows[1].overrides).toEqual({
      horizonYears: 12,
      propertyType: 'condo',
      rentOut: { yearsOccupied: 4 },
    });
  });

  it('labels unnamed rows by position', () => {
    expect(file.rows[2].label).toBe('Row 3');
  });

  it('collects invalid rows with their issues', () => {
    expect(file.errors).toEqual([
      { row: 4, label: 'Bad rate', issues: ['mortgageRate: Expected number, received nan'] },
    ]);
  });

  it('rejects unknown columns', () => {
    const result = parseSweepCsvString('label,mortgagerate\nTypo,0.05\n');
    expect(result.rows).toEqual([]);
    expect(result.errors[0].issues).toEqual(["Unrecognized key(s) in object: 'mortgagerate'"]);
  });

  it('handles a byte-order mark and blank lines', () => {
    const result = parseSweepCsvString('\uFEFFlabel,homePrice\n\nCheap,500000\n');
    expect(result.rows).toEqual([{ row: 1, label: 'Cheap', overrides: { homePrice: 500_000 } }]);
  });
});
