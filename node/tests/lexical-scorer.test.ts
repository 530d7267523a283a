import { describe, it, expect } from 'vitest';
import { lexicalScore } from '@/services/retrieval/lexical-scorer';
import { cosineSimilarity, tokenize } from '@/services/retrieval/vector-utils';

describe('tokenize', () => {
  it('splits on non-alphanumerics and lowercases', () => {
    expect(tokenize('Is staff at Paris friendly?')).toEqual(['is', 'staff', 'at', 'paris', 'friendly']);
    expect(tokenize('  ')).toEqual([]);
  });
});

describe('lexicalScore', () => {
  it('is the share of distinct query tokens found in the text', () => {
    expect(lexicalScore('Is staff at Paris friendly?', 'Staff were very friendly at the Paris park')).toBe(0.8);
    expect(lexicalScore('castle castle queue', 'the castle')).toBe(0.5);
  });

  it('boosts an exact phrase match', () => {
    expect(lexicalScore('friendly staff', 'Very FRIENDLY STAFF everywhere')).toBe(1.5);
    expect(lexicalScore('friendly staff', 'Very FRIENDLY STAFF everywhere', 2)).toBe(2);
  });

  it('does not boost when the tokens are present but not contiguous', () => {
    expect(lexicalScore('staff friendly', 'friendly staff')).toBe(1);
  });

  it('returns 0 for a query without tokens or without overlap', () => {
    expect(lexicalScore('???', 'anything at all')).toBe(0);
    expect(lexicalScore('', 'anything')).toBe(0);
    expect(lexicalScore('rollercoaster', 'a quiet garden')).toBe(0);
  });
});

describe('cosineSimilarity', () => {
  it('handles mismatched and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [3, 4])).toBe(0.6);
  });
});
