import { FinancialRecord } from './dataset';

export interface AdjacentByNameCriteria {
  kind: 'adjacent-by-name';
  peerCount: number;
}

export interface WholeMarketCriteria {
  kind: 'whole-market';
}

export type PeerCriteria = AdjacentByNameCriteria | WholeMarketCriteria;

export interface PeerSet {
  target: string;
  criteria: PeerCriteria;
  /** Member names in sorted order, target included. */
  banks: string[];
  records: FinancialRecord[];
  /** First row for the target name. */
  targetRecord: FinancialRecord;
}
