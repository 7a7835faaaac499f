import type { Dataset } from '../domain/dataset';
import { BankNotFoundError, InvalidPeerCountError } from '../domain/errors';
import type { AdjacentByNameCriteria, PeerCriteria, PeerSet } from '../domain/peers';
import { indexRecords } from './loader';

/** Code-unit order, so the result does not depend on the runtime locale. */
export const sortBankNames = (names: Iterable<string>): string[] => Array.from(new Set(names)).sort();

const adjacentByName = (sorted: string[], target: string, criteria: AdjacentByNameCriteria): string[] => {
  const { peerCount } = criteria;
  if (!Number.isInteger(peerCount) || peerCount < 1 || peerCount >= sorted.length) {
    throw new InvalidPeerCountError(peerCount, sorted.length);
  }
  const idx = sorted.indexOf(target);
  return sorted.slice(Math.max(0, idx - peerCount), Math.min(sorted.length, idx + peerCount + 1));
};

const membersFor = (sorted: string[], target: string, criteria: PeerCriteria): string[] => {
  switch (criteria.kind) {
    case 'adjacent-by-name':
      return adjacentByName(sorted, target, criteria);
    case 'whole-market':
      return sorted;
    default: {
      const unhandled: never = criteria;
      throw new Error(`Unsupported peer criteria ${JSON.stringify(unhandled)}`);
    }
  }
};

/**
 * Builds the comparison group for `target`.
 *
 * With `adjacent-by-name` the group is the target plus up to `peerCount` names on
 * each side of it in sorted order, clipped at both ends of the list.
 */
export const selectPeers = (dataset: Dataset, target: string, criteria: PeerCriteria): PeerSet => {
  const index = indexRecords(dataset);
  const targetRecord = index.get(target);
  if (!targetRecord) {
    throw new BankNotFoundError(target);
  }
  const banks = membersFor(sortBankNames(index.keys()), target, criteria);
  const records = banks.flatMap((bank) => {
    const record = index.get(bank);
    return record ? [record] : [];
  });
  return { target, criteria, banks, records, targetRecord };
};
