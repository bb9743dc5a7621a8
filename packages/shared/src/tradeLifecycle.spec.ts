import { describe, it, expect } from 'vitest';

import {
  allowedStatuses,
  canTransition,
  isClosedTier,
  isReviewTier,
  stageOf,
  visibleStages,
} from './tradeLifecycle';
import type { TradeState } from './types/journal';
import { TRADE_STATES } from './vocab';

describe('allowedStatuses', () => {
  it('lists forward targets first, then walk-back targets', () => {
    expect(allowedStatuses('open')).toEqual(['open', 'closed', 'cancelled', 'missed']);
    expect(allowedStatuses('closed')).toEqual(['closed', 'reviewed', 'open']);
    expect(allowedStatuses('reviewed')).toEqual(['reviewed', 'closed']);
    expect(allowedStatuses('cancelled')).toEqual(['cancelled', 'open']);
    expect(allowedStatuses('missed')).toEqual(['missed', 'open']);
  });

  it('falls back to open for unknown states', () => {
    expect(allowedStatuses('archived')).toEqual(['open']);
    expect(allowedStatuses('')).toEqual(['open']);
  });

  it('always contains the current state and never duplicates', () => {
    for (const state of TRADE_STATES) {
      const allowed = allowedStatuses(state);
      expect(allowed).toContain(state);
      expect(new Set(allowed).size).toBe(allowed.length);
    }
  });
});

describe('canTransition', () => {
  const legal: Record<TradeState, TradeState[]> = {
    open: ['open', 'closed', 'cancelled', 'missed'],
    closed: ['closed', 'reviewed', 'open'],
    reviewed: ['reviewed', 'closed'],
    cancelled: ['cancelled', 'open'],
    missed: ['missed', 'open'],
  };

  for (const from of TRADE_STATES) {
    for (const to of TRADE_STATES) {
      const expected = legal[from].includes(to);
      it(`${from} -> ${to} is ${expected ? 'allowed' : 'rejected'}`, () => {
        expect(canTransition(from, to)).toBe(expected);
      });
    }
  }

  it('does not allow skipping straight from open to reviewed', () => {
    expect(canTransition('open', 'reviewed')).toBe(false);
    expect(canTransition('reviewed', 'open')).toBe(false);
  });
});

describe('stages', () => {
  it('maps statuses to form stages', () => {
    expect(stageOf('open')).toBe('open');
    expect(stageOf('cancelled')).toBe('open');
    expect(stageOf('missed')).toBe('open');
    expect(stageOf('closed')).toBe('closed');
    expect(stageOf('reviewed')).toBe('review');
    expect(stageOf('bogus')).toBe('open');
  });

  it('shows every stage up to the target', () => {
    expect(visibleStages('open')).toEqual(['open']);
    expect(visibleStages('missed')).toEqual(['open']);
    expect(visibleStages('closed')).toEqual(['open', 'closed']);
    expect(visibleStages('reviewed')).toEqual(['open', 'closed', 'review']);
  });

  it('classifies tiers', () => {
    expect(isClosedTier('closed')).toBe(true);
    expect(isClosedTier('reviewed')).toBe(true);
    expect(isClosedTier('cancelled')).toBe(false);
    expect(isReviewTier('reviewed')).toBe(true);
    expect(isReviewTier('closed')).toBe(false);
  });
});
