import * as XLSX from 'xlsx';
import type { Dataset } from '../domain/dataset';
import { FinancialField } from '../domain/enums';
import { parseWorkbook } from '../engine/loader';

export type SheetRow = Record<string, string | number | null>;

/** Builds an in-memory xlsx file whose first sheet holds `rows` under `headers`. */
export const buildWorkbook = (headers: string[], rows: SheetRow[], extraSheets: string[] = []): ArrayBuffer => {
  const aoa = [headers, ...rows.map((row) => headers.map((h) => row[h] ?? null))];
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(aoa), 'Line items');
  extraSheets.forEach((name) => {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Bank'], ['Ignored Bank']]), name);
  });
  return XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
};

export const RATIO_HEADERS: string[] = [
  'Bank',
  FinancialField.CoreDeposits,
  FinancialField.TotalDeposits,
  FinancialField.NonPerformingAssets,
  FinancialField.Loans,
  FinancialField.CashAndEquivalents,
  FinancialField.TotalAssets,
  FinancialField.Tier1Capital,
  FinancialField.Tier2Capital,
  FinancialField.RiskWeightedAssets,
  FinancialField.TotalLiabilities,
];

export const bankRow = (bank: string, overrides: SheetRow = {}): SheetRow => ({
  Bank: bank,
  [FinancialField.CoreDeposits]: 80,
  [FinancialField.TotalDeposits]: 100,
  [FinancialField.NonPerformingAssets]: 3,
  [FinancialField.Loans]: 60,
  [FinancialField.CashAndEquivalents]: 20,
  [FinancialField.TotalAssets]: 200,
  [FinancialField.Tier1Capital]: 12,
  [FinancialField.Tier2Capital]: 4,
  [FinancialField.RiskWeightedAssets]: 128,
  [FinancialField.TotalLiabilities]: 180,
  ...overrides,
});

export const datasetOf = (rows: SheetRow[], extraHeaders: string[] = []): Dataset =>
  parseWorkbook(buildWorkbook([...RATIO_HEADERS, ...extraHeaders], rows), 'test.xlsx');

/** Five banks A..E with identical default figures. */
export const alphabetDataset = (): Dataset => datasetOf(['C', 'A', 'E', 'B', 'D'].map((b) => bankRow(b)));
