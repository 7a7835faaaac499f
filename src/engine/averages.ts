import type { PeerAverage, RatioOutcome } from '../domain/ratios';
import type { StressFigure } from '../domain/stress';

/** Arithmetic mean of the `ok` entries; every other entry is listed as excluded. */
export const averageOutcomes = (values: ReadonlyMap<string, RatioOutcome | StressFigure>): PeerAverage => {
  let sum = 0;
  let contributors = 0;
  const excluded: string[] = [];
  values.forEach((outcome, bank) => {
    if (outcome.status === 'ok') {
      sum += outcome.value;
      contributors += 1;
    } else {
      excluded.push(bank);
    }
  });

  const total = values.size;
  if (contributors === 0) return { kind: 'unavailable', total, excluded };
  const value = sum / contributors;
  if (excluded.length === 0) return { kind: 'complete', value, contributors };
  return { kind: 'partial', value, contributors, total, excluded };
};

export const averageValue = (average: PeerAverage): number | undefined =>
  average.kind === 'unavailable' ? undefined : average.value;
