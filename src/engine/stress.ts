import { STRESS_METRICS } from '../config/stressMetrics';
import type { Benchmark, BenchmarkStatus } from '../domain/benchmarks';
import type { FinancialRecord } from '../domain/dataset';
import { StressMetricId } from '../domain/enums';
import type { PeerSet } from '../domain/peers';
import type { StressFigure, StressMetricDefinition, StressMetrics, StressMetricSummary } from '../domain/stress';
import { averageOutcomes } from './averages';
import { readFigure } from './cells';

const extractFigure = (record: FinancialRecord, definition: StressMetricDefinition): StressFigure => {
  const column = definition.columns.find((c) => Object.prototype.hasOwnProperty.call(record.cells, c));
  if (column === undefined) return { status: 'missing', reason: 'absent-column' };
  return readFigure(record, column);
};

/** Capital figures of one bank; absent or unusable cells stay `missing`, never zero. */
export const extractStressMetrics = (
  record: FinancialRecord,
  metrics: Record<StressMetricId, StressMetricDefinition> = STRESS_METRICS
): StressMetrics => ({
  [StressMetricId.Cet1]: extractFigure(record, metrics[StressMetricId.Cet1]),
  [StressMetricId.Tier1]: extractFigure(record, metrics[StressMetricId.Tier1]),
  [StressMetricId.TotalCapital]: extractFigure(record, metrics[StressMetricId.TotalCapital]),
  [StressMetricId.Leverage]: extractFigure(record, metrics[StressMetricId.Leverage]),
  [StressMetricId.SupplementaryTier1]: extractFigure(record, metrics[StressMetricId.SupplementaryTier1]),
});

export const summariseStressMetric = (
  peerSet: PeerSet,
  metricId: StressMetricId,
  metrics: Record<StressMetricId, StressMetricDefinition> = STRESS_METRICS
): StressMetricSummary => {
  const values = new Map<string, StressFigure>();
  peerSet.records.forEach((record) => {
    values.set(record.bank, extractFigure(record, metrics[metricId]));
  });
  return { metric: metricId, values, average: averageOutcomes(values) };
};

export const compareToBenchmark = (value: number | undefined, benchmark: Benchmark): BenchmarkStatus => {
  if (value === undefined || !Number.isFinite(value)) return 'unknown';
  if (benchmark.direction === 'min') return value >= benchmark.value ? 'meets' : 'breach';
  return value <= benchmark.value ? 'meets' : 'breach';
};
