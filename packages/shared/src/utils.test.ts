import { describe, it, expect } from 'vitest';
import {
  checkLatencyBudget,
  compareMatches,
  cosineSimilarity,
  dedupeOrdered,
  estimateTokens,
  normalizeQuery,
  normalizeScore,
  truncateToTokens,
} from './utils';

describe('estimateTokens', () => {
  it('rounds partial tokens up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('truncateToTokens', () => {
  it('cuts at maxTokens * 4 characters', () => {
    expect(truncateToTokens('abcdefghij', 2)).toBe('abcdefgh');
  });

  it('leaves short text untouched', () => {
    expect(truncateToTokens('abc', 5)).toBe('abc');
  });

  it('never exceeds the token limit', () => {
    const text = 'x'.repeat(1001);
    expect(estimateTokens(truncateToTokens(text, 37))).toBeLessThanOrEqual(37);
  });
});

describe('checkLatencyBudget', () => {
  it('reports a violation over budget', () => {
    expect(checkLatencyBudget(250, 200, 'retrieval')).toEqual({
      exceeded: true,
      violation: 'retrieval: 250ms exceeded budget of 200ms',
    });
  });

  it('accepts latency equal to the budget', () => {
    expect(checkLatencyBudget(200, 200, 'retrieval')).toEqual({ exceeded: false });
  });
});

describe('compareMatches', () => {
  it('sorts by score descending then id ascending', () => {
    const sorted = [
      { chunkId: 'b', score: 0.7 },
      { chunkId: 'c', score: 0.9 },
      { chunkId: 'a', score: 0.7 },
    ].sort(compareMatches);
    expect(sorted.map((m) => m.chunkId)).toEqual(['c', 'a', 'b']);
  });
});

describe('normalizeScore', () => {
  it('clamps into the unit interval', () => {
    expect(normalizeScore(-0.2)).toBe(0);
    expect(normalizeScore(1.3)).toBe(1);
    expect(normalizeScore(0.42)).toBe(0.42);
    expect(normalizeScore(Number.NaN)).toBe(0);
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects mismatched dimensions', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have same dimensions');
  });
});

describe('dedupeOrdered', () => {
  it('keeps first occurrences in order', () => {
    expect(dedupeOrdered(['c2', 'c1', 'c2', 'c3', 'c1'])).toEqual(['c2', 'c1', 'c3']);
  });
});

describe('normalizeQuery', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeQuery('  Limitation   Period\tFOR contracts ')).toBe('limitation period for contracts');
  });
});
