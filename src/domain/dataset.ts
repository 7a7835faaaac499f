import { KeyColumn } from './enums';

/** Raw spreadsheet cell after parsing: numeric, free text, or blank. */
export type CellValue = number | string | null;

export interface FinancialRecord {
  readonly bank: string;
  /** 1-based spreadsheet row, for messages. */
  readonly row: number;
  readonly cells: Readonly<Record<string, CellValue>>;
}

export interface Dataset {
  readonly keyColumn: KeyColumn;
  readonly columns: readonly string[];
  readonly records: readonly FinancialRecord[];
  /** Bank names that occur on more than one row; lookups use the first row. */
  readonly duplicateBanks: readonly string[];
}
