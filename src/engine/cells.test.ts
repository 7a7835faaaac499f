import { describe, expect, it } from 'vitest';
import type { FinancialRecord } from '../domain/dataset';
import { readFigure, toCellValue } from './cells';

describe('Cell normalisation', () => {
  it.each([
    [42, 42],
    ['1,234,567', 1234567],
    [' -12.5 ', -12.5],
    ['7.5%', 0.075],
    ['', null],
    ['   ', null],
    [null, null],
    [undefined, null],
    ['12,34', '12,34'],
    ['N/A', 'N/A'],
    [true, 'true'],
  ])('maps %j to %j', (raw, expected) => {
    expect(toCellValue(raw)).toEqual(expected);
  });

  it('keeps non-finite numbers as text', () => {
    expect(toCellValue(Number.NaN)).toBe('NaN');
  });
});

describe('readFigure', () => {
  const record: FinancialRecord = { bank: 'A', row: 2, cells: { Loans: 10, Notes: 'text', Blank: null } };

  it('returns numbers as ok', () => {
    expect(readFigure(record, 'Loans')).toEqual({ status: 'ok', value: 10 });
  });

  it('distinguishes absent, blank and text cells', () => {
    expect(readFigure(record, 'Deposits')).toEqual({ status: 'missing', reason: 'absent-column' });
    expect(readFigure(record, 'Blank')).toEqual({ status: 'missing', reason: 'blank-cell' });
    expect(readFigure(record, 'Notes')).toEqual({ status: 'missing', reason: 'non-numeric' });
  });
});
