import { describe, it, expect } from 'vitest';

import { isEmotionalProblem, normalizeEmotionalProblems } from './emotions';

describe('normalizeEmotionalProblems', () => {
  it('keeps vocabulary values from a list, first occurrence wins', () => {
    expect(
      normalizeEmotionalProblems(['premature exit', 'boredom', 'fear of entry', 'premature exit'])
    ).toEqual(['premature exit', 'fear of entry']);
  });

  it('reads a stored JSON list', () => {
    expect(normalizeEmotionalProblems('["emotional management"]')).toEqual(['emotional management']);
  });

  it('falls back to comma separated text when the JSON is broken', () => {
    expect(normalizeEmotionalProblems('[fear of entry')).toEqual([]);
    expect(normalizeEmotionalProblems('fear of entry, premature exit')).toEqual([
      'fear of entry',
      'premature exit',
    ]);
  });

  it('returns an empty selection for blanks and other values', () => {
    expect(normalizeEmotionalProblems('')).toEqual([]);
    expect(normalizeEmotionalProblems(null)).toEqual([]);
    expect(normalizeEmotionalProblems(7)).toEqual([]);
  });

  it('recognises vocabulary members', () => {
    expect(isEmotionalProblem('fear of entry')).toBe(true);
    expect(isEmotionalProblem('Fear of entry')).toBe(false);
  });
});
