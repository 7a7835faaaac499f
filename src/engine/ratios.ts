import { RATIO_CATALOG } from '../config/ratioCatalog';
import type { FinancialRecord } from '../domain/dataset';
import { type FinancialField, RatioId } from '../domain/enums';
import type { PeerSet } from '../domain/peers';
import type {
  ComputationIssue,
  PeerComparison,
  RatioComputation,
  RatioDefinition,
  RatioOutcome,
} from '../domain/ratios';
import type { MissingReason } from '../domain/stress';
import { averageOutcomes } from './averages';
import { readFigure } from './cells';

const ISSUE_FOR_MISSING: Record<MissingReason, ComputationIssue> = {
  'absent-column': 'missing-operand',
  'blank-cell': 'missing-operand',
  'non-numeric': 'non-numeric-operand',
};

const fail = (issue: ComputationIssue, field: FinancialField): RatioOutcome => ({ status: 'error', issue, field });

export const computeRatioForRecord = (record: FinancialRecord, definition: RatioDefinition): RatioOutcome => {
  let numerator = 0;
  for (const field of definition.numerator) {
    const read = readFigure(record, field);
    if (read.status !== 'ok') return fail(ISSUE_FOR_MISSING[read.reason], field);
    numerator += read.value;
  }

  const denominator = readFigure(record, definition.denominator);
  if (denominator.status !== 'ok') return fail(ISSUE_FOR_MISSING[denominator.reason], definition.denominator);
  if (denominator.value === 0) return fail('zero-denominator', definition.denominator);

  return { status: 'ok', value: numerator / denominator.value };
};

export const describeIssue = (outcome: Extract<RatioOutcome, { status: 'error' }>): string => {
  switch (outcome.issue) {
    case 'zero-denominator':
      return `${outcome.field} is zero`;
    case 'missing-operand':
      return `${outcome.field} is missing`;
    case 'non-numeric-operand':
      return `${outcome.field} is not numeric`;
  }
};

/**
 * Evaluates one catalog ratio for every member of the peer set. A bank whose
 * operands are unusable gets an `error` outcome and is left out of the average.
 */
export const computeRatio = (
  peerSet: PeerSet,
  ratioId: RatioId,
  catalog: Record<RatioId, RatioDefinition> = RATIO_CATALOG
): RatioComputation => {
  const definition = catalog[ratioId];
  const values = new Map<string, RatioOutcome>();
  peerSet.records.forEach((record) => {
    values.set(record.bank, computeRatioForRecord(record, definition));
  });
  return { ratio: ratioId, values, average: averageOutcomes(values) };
};

export const computeKeyMetrics = (
  record: FinancialRecord,
  catalog: Record<RatioId, RatioDefinition> = RATIO_CATALOG
): Record<RatioId, RatioOutcome> => ({
  [RatioId.CoreDeposits]: computeRatioForRecord(record, catalog[RatioId.CoreDeposits]),
  [RatioId.Npa]: computeRatioForRecord(record, catalog[RatioId.Npa]),
  [RatioId.Liquidity]: computeRatioForRecord(record, catalog[RatioId.Liquidity]),
  [RatioId.CapitalAdequacy]: computeRatioForRecord(record, catalog[RatioId.CapitalAdequacy]),
  [RatioId.Solvency]: computeRatioForRecord(record, catalog[RatioId.Solvency]),
  [RatioId.LoanDeposit]: computeRatioForRecord(record, catalog[RatioId.LoanDeposit]),
});

/** The target's ratio against the mean of the other members. */
export const comparePeer = (
  peerSet: PeerSet,
  ratioId: RatioId,
  catalog: Record<RatioId, RatioDefinition> = RATIO_CATALOG
): PeerComparison => {
  const { values } = computeRatio(peerSet, ratioId, catalog);
  const others = new Map(Array.from(values).filter(([bank]) => bank !== peerSet.target));
  const bankValue = computeRatioForRecord(peerSet.targetRecord, catalog[ratioId]);
  return { ratio: ratioId, bank: peerSet.target, bankValue, peerAverage: averageOutcomes(others) };
};
