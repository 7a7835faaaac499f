import { RatioId, StressMetricId } from './enums';

export interface Benchmark {
  value: number;
  /** `min`: a bank should be at or above the value; `max`: at or below. */
  direction: 'min' | 'max';
}

export interface BenchmarkTable {
  ratios: Record<RatioId, Benchmark>;
  stress: Record<StressMetricId, Benchmark>;
}

export type BenchmarkStatus = 'meets' | 'breach' | 'unknown';
