import { RATIO_CATALOG } from '../config/ratioCatalog';
import { STRESS_METRICS } from '../config/stressMetrics';
import type { BenchmarkStatus, BenchmarkTable } from '../domain/benchmarks';
import type { AnalyticsConfig } from '../domain/config';
import type { Dataset, FinancialRecord } from '../domain/dataset';
import { RatioId, StressMetricId } from '../domain/enums';
import type { PeerSet } from '../domain/peers';
import type { PeerAverage, PeerComparison, RatioComputation, RatioOutcome } from '../domain/ratios';
import type { StressMetrics, StressMetricSummary } from '../domain/stress';
import { type AnalyticsEvent, createEvent } from '../engine/events';
import { fetchWorkbook, listBanks, loadDataset, parseWorkbook, type WorkbookSource } from '../engine/loader';
import { selectPeers } from '../engine/peers';
import { comparePeer, computeKeyMetrics, computeRatio, describeIssue } from '../engine/ratios';
import { parseSelection, type Selection, toPeerCriteria } from '../engine/selection';
import { compareToBenchmark, extractStressMetrics, summariseStressMetric } from '../engine/stress';

export interface LoadResult {
  dataset: Dataset;
  events: AnalyticsEvent[];
}

export interface AnalysisResult {
  selection: Selection;
  peerSet: PeerSet;
  record: FinancialRecord;
  ratio: RatioComputation;
  peerComparison: PeerComparison;
  keyMetrics: Record<RatioId, RatioOutcome>;
  keyMetricStatus: Record<RatioId, BenchmarkStatus>;
  stressMetrics: StressMetrics;
  stressStatus: Record<StressMetricId, BenchmarkStatus>;
  stressSummary: StressMetricSummary;
  events: AnalyticsEvent[];
}

const okValue = (outcome: { status: string; value?: number }): number | undefined =>
  outcome.status === 'ok' ? outcome.value : undefined;

const rateKeyMetrics = (
  metrics: Record<RatioId, RatioOutcome>,
  benchmarks: BenchmarkTable
): Record<RatioId, BenchmarkStatus> => {
  const rate = (id: RatioId) => compareToBenchmark(okValue(metrics[id]), benchmarks.ratios[id]);
  return {
    [RatioId.CoreDeposits]: rate(RatioId.CoreDeposits),
    [RatioId.Npa]: rate(RatioId.Npa),
    [RatioId.Liquidity]: rate(RatioId.Liquidity),
    [RatioId.CapitalAdequacy]: rate(RatioId.CapitalAdequacy),
    [RatioId.Solvency]: rate(RatioId.Solvency),
    [RatioId.LoanDeposit]: rate(RatioId.LoanDeposit),
  };
};

const rateStressMetrics = (
  metrics: StressMetrics,
  benchmarks: BenchmarkTable
): Record<StressMetricId, BenchmarkStatus> => {
  const rate = (id: StressMetricId) => compareToBenchmark(okValue(metrics[id]), benchmarks.stress[id]);
  return {
    [StressMetricId.Cet1]: rate(StressMetricId.Cet1),
    [StressMetricId.Tier1]: rate(StressMetricId.Tier1),
    [StressMetricId.TotalCapital]: rate(StressMetricId.TotalCapital),
    [StressMetricId.Leverage]: rate(StressMetricId.Leverage),
    [StressMetricId.SupplementaryTier1]: rate(StressMetricId.SupplementaryTier1),
  };
};

export const describeAverage = (average: PeerAverage): string => {
  switch (average.kind) {
    case 'complete':
      return `average of ${average.contributors} banks`;
    case 'partial':
      return `partial average (${average.contributors} of ${average.total} banks)`;
    case 'unavailable':
      return 'no bank has a usable value';
  }
};

/**
 * Owns the configuration for a session and turns a dataset plus a raw UI
 * selection into everything the panels render. Holds no dataset of its own.
 */
export class AnalyticsController {
  private config: AnalyticsConfig;
  private readSource: WorkbookSource;

  constructor(config: AnalyticsConfig, readSource: WorkbookSource = fetchWorkbook) {
    this.config = config;
    this.readSource = readSource;
  }

  getConfig(): AnalyticsConfig {
    return this.config;
  }

  setConfig(config: AnalyticsConfig) {
    this.config = config;
  }

  async load(): Promise<LoadResult> {
    const dataset = await loadDataset(this.config.dataFile, this.readSource);
    return { dataset, events: this.describeDataset(dataset, this.config.dataFile) };
  }

  loadUpload(bytes: ArrayBuffer, fileName: string): LoadResult {
    const dataset = parseWorkbook(bytes, fileName);
    return { dataset, events: this.describeDataset(dataset, fileName) };
  }

  analyse(dataset: Dataset, input: unknown): AnalysisResult {
    const selection = parseSelection(input);
    const peerSet = selectPeers(dataset, selection.targetBank, toPeerCriteria(selection));
    const record = peerSet.targetRecord;
    const { benchmarks } = this.config;

    const ratio = computeRatio(peerSet, selection.ratioId);
    const keyMetrics = computeKeyMetrics(record);
    const stressMetrics = extractStressMetrics(record);

    const keyMetricStatus = rateKeyMetrics(keyMetrics, benchmarks);
    const stressStatus = rateStressMetrics(stressMetrics, benchmarks);

    const stressSummary = summariseStressMetric(peerSet, selection.stressMetricId);

    const events: AnalyticsEvent[] = [
      createEvent('info', `Peer set for ${selection.targetBank}: ${peerSet.banks.join(', ')}`),
    ];
    const definition = RATIO_CATALOG[selection.ratioId];
    ratio.values.forEach((outcome, bank) => {
      if (outcome.status === 'error') {
        events.push(createEvent('warning', `${definition.label} undefined for ${bank}: ${describeIssue(outcome)}`));
      }
    });
    if (ratio.average.kind !== 'complete') {
      events.push(createEvent('warning', `${definition.label}: ${describeAverage(ratio.average)}`));
    }
    if (stressSummary.average.kind === 'unavailable') {
      events.push(
        createEvent('warning', `${STRESS_METRICS[selection.stressMetricId].label}: no bank in the peer set reports it`)
      );
    }

    return {
      selection,
      peerSet,
      record,
      ratio,
      peerComparison: comparePeer(peerSet, selection.ratioId),
      keyMetrics,
      keyMetricStatus,
      stressMetrics,
      stressStatus,
      stressSummary,
      events,
    };
  }

  private describeDataset(dataset: Dataset, source: string): AnalyticsEvent[] {
    const events = [createEvent('info', `Loaded ${listBanks(dataset).length} banks from ${source}`)];
    if (dataset.duplicateBanks.length > 0) {
      events.push(
        createEvent('warning', `Duplicate bank names (first row used): ${dataset.duplicateBanks.join(', ')}`)
      );
    }
    return events;
  }
}
