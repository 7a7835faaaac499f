import { BenchmarkTable } from './benchmarks';
import { FinancialField } from './enums';

export interface SummaryFieldConfig {
  column: string;
  label: string;
  format: 'percent-points' | 'number' | 'years';
}

export interface AnalyticsConfig {
  /** Workbook fetched on start-up; an upload replaces it for the session. */
  dataFile: string;
  defaultPeerCount: number;
  benchmarks: BenchmarkTable;
  keyFinancials: FinancialField[];
  summaryFields: SummaryFieldConfig[];
}
