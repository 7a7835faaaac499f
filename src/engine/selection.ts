import { z } from 'zod';
import { RatioId, StressMetricId } from '../domain/enums';
import { InvalidSelectionError } from '../domain/errors';
import type { PeerCriteria } from '../domain/peers';

// Range checks on peerCount belong to the peer selector, which knows the bank count.
export const selectionSchema = z.object({
  targetBank: z.string().trim().min(1, 'choose a bank'),
  peerMode: z.enum(['adjacent-by-name', 'whole-market']).default('adjacent-by-name'),
  peerCount: z.coerce.number().finite(),
  ratioId: z.nativeEnum(RatioId),
  stressMetricId: z.nativeEnum(StressMetricId),
});

export type Selection = z.infer<typeof selectionSchema>;

export const parseSelection = (input: unknown): Selection => {
  const result = selectionSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSelectionError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'selection'}: ${issue.message}`)
    );
  }
  return result.data;
};

export const toPeerCriteria = (selection: Selection): PeerCriteria =>
  selection.peerMode === 'whole-market'
    ? { kind: 'whole-market' }
    : { kind: 'adjacent-by-name', peerCount: selection.peerCount };
