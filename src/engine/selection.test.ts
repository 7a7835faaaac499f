import { describe, expect, it } from 'vitest';
import { RatioId, StressMetricId } from '../domain/enums';
import { InvalidSelectionError } from '../domain/errors';
import { parseSelection, toPeerCriteria } from './selection';

const valid = {
  targetBank: 'Alder Bank',
  peerCount: '2',
  ratioId: RatioId.Npa,
  stressMetricId: StressMetricId.Leverage,
};

describe('Selection parsing', () => {
  it('coerces the peer count and defaults the peer mode', () => {
    const selection = parseSelection(valid);
    expect(selection.peerCount).toBe(2);
    expect(selection.peerMode).toBe('adjacent-by-name');
    expect(toPeerCriteria(selection)).toEqual({ kind: 'adjacent-by-name', peerCount: 2 });
  });

  it('maps whole-market mode to whole-market criteria', () => {
    const selection = parseSelection({ ...valid, peerMode: 'whole-market' });
    expect(toPeerCriteria(selection)).toEqual({ kind: 'whole-market' });
  });

  it('rejects a ratio outside the catalog', () => {
    try {
      parseSelection({ ...valid, ratioId: 'return-on-equity' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSelectionError);
      if (!(err instanceof InvalidSelectionError)) return;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0].startsWith('ratioId: ')).toBe(true);
    }
  });

  it('rejects an empty bank name', () => {
    expect(() => parseSelection({ ...valid, targetBank: '  ' })).toThrow('targetBank: choose a bank');
  });

  it('rejects a non-numeric peer count', () => {
    expect(() => parseSelection({ ...valid, peerCount: 'three' })).toThrow(InvalidSelectionError);
  });
});
