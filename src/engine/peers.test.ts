import { describe, expect, it } from 'vitest';
import { BankNotFoundError, InvalidPeerCountError } from '../domain/errors';
import { alphabetDataset, bankRow, datasetOf } from '../test/workbooks';
import { selectPeers, sortBankNames } from './peers';

describe('Peer selector (adjacent by name)', () => {
  const dataset = alphabetDataset();
  const adjacent = (peerCount: number) => ({ kind: 'adjacent-by-name' as const, peerCount });

  it('takes one neighbour on each side of a middle bank', () => {
    expect(selectPeers(dataset, 'C', adjacent(1)).banks).toEqual(['B', 'C', 'D']);
  });

  it('clips at the start of the sorted list without wrapping', () => {
    const peers = selectPeers(dataset, 'A', adjacent(3));
    expect(peers.banks).toEqual(['A', 'B', 'C', 'D']);
    expect(peers.records.map((r) => r.bank)).toEqual(['A', 'B', 'C', 'D']);
  });

  it('clips at the end of the sorted list', () => {
    expect(selectPeers(dataset, 'E', adjacent(2)).banks).toEqual(['C', 'D', 'E']);
  });

  it('always contains the target once and at most 2N+1 banks', () => {
    ['A', 'B', 'C', 'D', 'E'].forEach((target) => {
      [1, 2, 3, 4].forEach((n) => {
        const { banks } = selectPeers(dataset, target, adjacent(n));
        expect(banks).toContain(target);
        expect(banks.length).toBeLessThanOrEqual(2 * n + 1);
        expect(new Set(banks).size).toBe(banks.length);
      });
    });
  });

  it('raises BankNotFoundError for an unknown bank', () => {
    expect(() => selectPeers(dataset, 'Z', adjacent(1))).toThrow(BankNotFoundError);
  });

  it('checks the bank before the peer count', () => {
    expect(() => selectPeers(dataset, 'Z', adjacent(0))).toThrow(BankNotFoundError);
  });

  it.each([0, -1, 5, 9, 1.5])('rejects peer count %s', (n) => {
    expect(() => selectPeers(dataset, 'C', adjacent(n))).toThrow(InvalidPeerCountError);
  });

  it('sorts by code unit, not locale', () => {
    expect(sortBankNames(['beta', 'Alpha', 'alpha', 'Beta'])).toEqual(['Alpha', 'Beta', 'alpha', 'beta']);
  });

  it('counts duplicate names once', () => {
    const dupes = datasetOf([bankRow('A'), bankRow('B'), bankRow('B', { Loans: 1 }), bankRow('C')]);
    const peers = selectPeers(dupes, 'B', adjacent(1));
    expect(peers.banks).toEqual(['A', 'B', 'C']);
    expect(peers.records.find((r) => r.bank === 'B')?.cells.Loans).toBe(60);
    expect(peers.targetRecord.cells.Loans).toBe(60);
    expect(peers.targetRecord.row).toBe(3);
    expect(() => selectPeers(dupes, 'B', adjacent(3))).toThrow(InvalidPeerCountError);
  });
});

describe('Peer selector (whole market)', () => {
  it('returns every bank in sorted order', () => {
    const peers = selectPeers(alphabetDataset(), 'D', { kind: 'whole-market' });
    expect(peers.banks).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(peers.target).toBe('D');
  });
});
