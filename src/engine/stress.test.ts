import { describe, expect, it } from 'vitest';
import { defaultBenchmarks } from '../config/benchmarks';
import { StressMetricId } from '../domain/enums';
import { bankRow, datasetOf } from '../test/workbooks';
import { selectPeers } from './peers';
import { compareToBenchmark, extractStressMetrics, summariseStressMetric } from './stress';

describe('Stress-metric extractor', () => {
  it('reads column codes and marks absent metrics as missing', () => {
    const dataset = datasetOf(
      [bankRow('A', { CET1_ratio: 0.121, Tier1_ratio: 0.135, Total_capital_ratio: null, Leverage_ratio: 'n/a' })],
      ['CET1_ratio', 'Tier1_ratio', 'Total_capital_ratio', 'Leverage_ratio']
    );
    const metrics = extractStressMetrics(dataset.records[0]);

    expect(metrics).toEqual({
      [StressMetricId.Cet1]: { status: 'ok', value: 0.121 },
      [StressMetricId.Tier1]: { status: 'ok', value: 0.135 },
      [StressMetricId.TotalCapital]: { status: 'missing', reason: 'blank-cell' },
      [StressMetricId.Leverage]: { status: 'missing', reason: 'non-numeric' },
      [StressMetricId.SupplementaryTier1]: { status: 'missing', reason: 'absent-column' },
    });
  });

  it('accepts display-name headers', () => {
    const dataset = datasetOf([bankRow('A', { 'CET1 Ratio': 0.09 })], ['CET1 Ratio']);
    expect(extractStressMetrics(dataset.records[0])[StressMetricId.Cet1]).toEqual({ status: 'ok', value: 0.09 });
  });

  it('averages a metric across the banks that report it', () => {
    const dataset = datasetOf(
      [bankRow('A', { Leverage_ratio: 0.05 }), bankRow('B', { Leverage_ratio: 0.07 }), bankRow('C')],
      ['Leverage_ratio']
    );
    const summary = summariseStressMetric(selectPeers(dataset, 'A', { kind: 'whole-market' }), StressMetricId.Leverage);

    expect(summary.values.get('C')).toEqual({ status: 'missing', reason: 'blank-cell' });
    expect(summary.average.kind).toBe('partial');
    if (summary.average.kind !== 'partial') return;
    expect(summary.average.value).toBeCloseTo(0.06, 9);
    expect(summary.average.excluded).toEqual(['C']);
  });

  it('has no average when no bank reports the metric', () => {
    const dataset = datasetOf([bankRow('A'), bankRow('B')]);
    const summary = summariseStressMetric(selectPeers(dataset, 'A', { kind: 'whole-market' }), StressMetricId.Cet1);
    expect(summary.average).toEqual({ kind: 'unavailable', total: 2, excluded: ['A', 'B'] });
  });
});

describe('Benchmark comparison', () => {
  it('treats min benchmarks as floors', () => {
    const cet1 = defaultBenchmarks.stress[StressMetricId.Cet1];
    expect(compareToBenchmark(0.045, cet1)).toBe('meets');
    expect(compareToBenchmark(0.04, cet1)).toBe('breach');
  });

  it('treats max benchmarks as ceilings', () => {
    const ceiling = { value: 0.03, direction: 'max' as const };
    expect(compareToBenchmark(0.02, ceiling)).toBe('meets');
    expect(compareToBenchmark(0.05, ceiling)).toBe('breach');
  });

  it('reports unknown for a missing value', () => {
    expect(compareToBenchmark(undefined, defaultBenchmarks.stress[StressMetricId.Leverage])).toBe('unknown');
  });
});
