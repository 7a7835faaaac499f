import { StressMetricId } from './enums';
import { PeerAverage } from './ratios';

export interface StressMetricDefinition {
  id: StressMetricId;
  label: string;
  /** Accepted header names, first match wins. */
  columns: string[];
}

export type MissingReason = 'absent-column' | 'blank-cell' | 'non-numeric';

export type StressFigure = { status: 'ok'; value: number } | { status: 'missing'; reason: MissingReason };

export type StressMetrics = Record<StressMetricId, StressFigure>;

export interface StressMetricSummary {
  metric: StressMetricId;
  values: ReadonlyMap<string, StressFigure>;
  average: PeerAverage;
}
