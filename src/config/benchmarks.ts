import { BenchmarkTable } from '../domain/benchmarks';
import { RatioId, StressMetricId } from '../domain/enums';

// Capital minima follow the Basel III floors (before buffers); the balance-sheet
// ratios are house thresholds for the peer view.
export const defaultBenchmarks: BenchmarkTable = {
  stress: {
    [StressMetricId.Cet1]: { value: 0.045, direction: 'min' },
    [StressMetricId.Tier1]: { value: 0.06, direction: 'min' },
    [StressMetricId.TotalCapital]: { value: 0.08, direction: 'min' },
    [StressMetricId.Leverage]: { value: 0.04, direction: 'min' },
    [StressMetricId.SupplementaryTier1]: { value: 0.03, direction: 'min' },
  },
  ratios: {
    [RatioId.CoreDeposits]: { value: 0.7, direction: 'min' },
    [RatioId.Npa]: { value: 0.03, direction: 'max' },
    [RatioId.Liquidity]: { value: 0.1, direction: 'min' },
    [RatioId.CapitalAdequacy]: { value: 0.105, direction: 'min' },
    [RatioId.Solvency]: { value: 0.92, direction: 'max' },
    [RatioId.LoanDeposit]: { value: 0.9, direction: 'max' },
  },
};
