import { FinancialField, RatioId } from './enums';

export interface RatioDefinition {
  id: RatioId;
  label: string;
  shortLabel: string;
  /** Summed to form the numerator. */
  numerator: FinancialField[];
  denominator: FinancialField;
  description: string;
}

export type ComputationIssue = 'missing-operand' | 'non-numeric-operand' | 'zero-denominator';

export type RatioOutcome =
  | { status: 'ok'; value: number }
  | { status: 'error'; issue: ComputationIssue; field: FinancialField };

/**
 * Mean of the defined per-bank values. `partial` names the banks left out;
 * `unavailable` means no bank had a defined value.
 */
export type PeerAverage =
  | { kind: 'complete'; value: number; contributors: number }
  | { kind: 'partial'; value: number; contributors: number; total: number; excluded: string[] }
  | { kind: 'unavailable'; total: number; excluded: string[] };

export interface RatioComputation {
  ratio: RatioId;
  values: ReadonlyMap<string, RatioOutcome>;
  average: PeerAverage;
}

export interface PeerComparison {
  ratio: RatioId;
  bank: string;
  bankValue: RatioOutcome;
  /** Average over the peer set without the selected bank. */
  peerAverage: PeerAverage;
}
