import type { CellValue, FinancialRecord } from '../domain/dataset';
import type { MissingReason } from '../domain/stress';

const NUMERIC_TEXT = /^[-+]?(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/;
const PERCENT_TEXT = /^([-+]?\d+(\.\d+)?)\s*%$/;

/**
 * Normalises a raw sheet cell. Plain numeric text (with optional thousands
 * separators) and percentage text ("12.5%" -> 0.125) become numbers; any other
 * text is kept so that it can be reported as non-numeric later.
 */
export const toCellValue = (raw: unknown): CellValue => {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : String(raw);
  if (raw instanceof Date) return raw.toISOString();
  const text = String(raw);
  const trimmed = text.trim();
  if (trimmed === '') return null;
  if (NUMERIC_TEXT.test(trimmed)) return Number(trimmed.replace(/,/g, ''));
  const pct = PERCENT_TEXT.exec(trimmed);
  if (pct) return Number(pct[1]) / 100;
  return text;
};

export type FigureRead = { status: 'ok'; value: number } | { status: 'missing'; reason: MissingReason };

export const readFigure = (record: FinancialRecord, column: string): FigureRead => {
  if (!Object.prototype.hasOwnProperty.call(record.cells, column)) {
    return { status: 'missing', reason: 'absent-column' };
  }
  const value = record.cells[column];
  if (value === null) return { status: 'missing', reason: 'blank-cell' };
  if (typeof value === 'string') return { status: 'missing', reason: 'non-numeric' };
  return { status: 'ok', value };
};
