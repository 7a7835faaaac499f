import { StressMetricId } from '../domain/enums';
import { StressMetricDefinition } from '../domain/stress';

export const STRESS_METRICS: Record<StressMetricId, StressMetricDefinition> = {
  [StressMetricId.Cet1]: {
    id: StressMetricId.Cet1,
    label: 'Common Equity Tier 1 Capital',
    columns: ['CET1_ratio', 'CET1 Ratio'],
  },
  [StressMetricId.Tier1]: {
    id: StressMetricId.Tier1,
    label: 'Tier 1 Capital Ratio',
    columns: ['Tier1_ratio', 'Tier 1 Capital Ratio'],
  },
  [StressMetricId.TotalCapital]: {
    id: StressMetricId.TotalCapital,
    label: 'Total Capital',
    columns: ['Total_capital_ratio', 'Total Capital Ratio'],
  },
  [StressMetricId.Leverage]: {
    id: StressMetricId.Leverage,
    label: 'Leverage Ratio',
    columns: ['Leverage_ratio', 'Leverage Ratio'],
  },
  [StressMetricId.SupplementaryTier1]: {
    id: StressMetricId.SupplementaryTier1,
    label: 'Supplementary Tier 1',
    columns: ['Supp_Tier1_ratio', 'Supplementary Tier 1'],
  },
};

export const STRESS_METRIC_IDS = Object.values(StressMetricId);

/** Shown as gauges against the benchmark table. */
export const GAUGE_STRESS_METRICS: StressMetricId[] = [
  StressMetricId.Cet1,
  StressMetricId.Tier1,
  StressMetricId.TotalCapital,
  StressMetricId.Leverage,
];
