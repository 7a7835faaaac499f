import * as XLSX from 'xlsx';
import { RATIO_FIELDS } from '../config/ratioCatalog';
import type { CellValue, Dataset, FinancialRecord } from '../domain/dataset';
import { KeyColumn } from '../domain/enums';
import { DataLoadError } from '../domain/errors';
import { toCellValue } from './cells';

/** Reads the raw bytes behind a path; the browser build uses `fetch`. */
export type WorkbookSource = (path: string) => Promise<ArrayBuffer>;

export const fetchWorkbook: WorkbookSource = async (path) => {
  const response = await fetch(path);
  if (!response.ok) {
    throw new DataLoadError(path, `request failed with status ${response.status}`);
  }
  return response.arrayBuffer();
};

const headerName = (raw: unknown): string => (raw === null || raw === undefined ? '' : String(raw));

const isBlankRow = (row: unknown[]): boolean => row.every((cell) => toCellValue(cell) === null);

const resolveKeyColumn = (headers: string[]): KeyColumn | undefined => {
  if (headers.includes(KeyColumn.Bank)) return KeyColumn.Bank;
  if (headers.includes(KeyColumn.Company)) return KeyColumn.Company;
  return undefined;
};

const findDuplicates = (records: FinancialRecord[]): string[] => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  records.forEach((r) => {
    if (seen.has(r.bank)) dupes.add(r.bank);
    seen.add(r.bank);
  });
  return Array.from(dupes);
};

/**
 * Parses the first sheet of a workbook: one header row, then one row per bank.
 * Header names are matched exactly. The returned dataset is frozen.
 */
export const parseWorkbook = (bytes: ArrayBuffer | Uint8Array, source = 'workbook'): Dataset => {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'array' });
  } catch (err) {
    throw new DataLoadError(source, 'file is not a readable spreadsheet', { cause: err });
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new DataLoadError(source, 'workbook has no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true });
  if (rows.length === 0) {
    throw new DataLoadError(source, 'first sheet has no header row');
  }

  const rawHeaders = rows[0].map(headerName);
  // First occurrence of a header wins; unnamed columns are ignored.
  const columnIndex = new Map<string, number>();
  rawHeaders.forEach((name, idx) => {
    if (name !== '' && !columnIndex.has(name)) columnIndex.set(name, idx);
  });
  const columns = Array.from(columnIndex.keys());

  const keyColumn = resolveKeyColumn(columns);
  const missing: string[] = RATIO_FIELDS.filter((field) => !columnIndex.has(field));
  if (keyColumn === undefined) missing.unshift(`${KeyColumn.Bank} (or ${KeyColumn.Company})`);
  if (keyColumn === undefined || missing.length > 0) {
    throw new DataLoadError(source, `missing required columns: ${missing.join(', ')}`);
  }
  const keyIndex = columnIndex.get(keyColumn) ?? 0;

  const records: FinancialRecord[] = [];
  rows.slice(1).forEach((row, offset) => {
    if (isBlankRow(row)) return;
    const rowNumber = offset + 2;
    const key = toCellValue(row[keyIndex]);
    if (key === null) {
      throw new DataLoadError(source, `row ${rowNumber} has no value in the ${keyColumn} column`);
    }
    const cells: Record<string, CellValue> = {};
    columnIndex.forEach((idx, name) => {
      cells[name] = toCellValue(row[idx]);
    });
    records.push(Object.freeze({ bank: String(key).trim(), row: rowNumber, cells: Object.freeze(cells) }));
  });

  if (records.length === 0) {
    throw new DataLoadError(source, 'first sheet has no bank rows');
  }

  return Object.freeze({
    keyColumn,
    columns: Object.freeze(columns),
    records: Object.freeze(records),
    duplicateBanks: Object.freeze(findDuplicates(records)),
  });
};

export const loadDataset = async (path: string, readSource: WorkbookSource = fetchWorkbook): Promise<Dataset> => {
  let bytes: ArrayBuffer;
  try {
    bytes = await readSource(path);
  } catch (err) {
    if (err instanceof DataLoadError) throw err;
    throw new DataLoadError(path, 'file is missing or unreadable', { cause: err });
  }
  return parseWorkbook(bytes, path);
};

/** Distinct bank names in sheet order. */
export const listBanks = (dataset: Dataset): string[] => Array.from(new Set(dataset.records.map((r) => r.bank)));

/** First row for each bank name. */
export const indexRecords = (dataset: Dataset): Map<string, FinancialRecord> => {
  const index = new Map<string, FinancialRecord>();
  dataset.records.forEach((r) => {
    if (!index.has(r.bank)) index.set(r.bank, r);
  });
  return index;
};

export const findRecord = (dataset: Dataset, bank: string): FinancialRecord | undefined =>
  dataset.records.find((r) => r.bank === bank);
