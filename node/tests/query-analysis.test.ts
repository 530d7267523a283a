import { describe, it, expect } from 'vitest';
import { extractFilters, filtersToPredicates } from '@/services/filter-extraction';
import { estimateQueryComplexity } from '@/services/query-complexity';

describe('extractFilters', () => {
  it('picks up park and visitor origin mentions', () => {
    expect(extractFilters('How do Australians rate Hong Kong? Visitors from australia')).toEqual({
      branch: 'Hong_Kong',
      location: 'Australia',
    });
    expect(extractFilters('Is Paris crowded in summer?')).toEqual({ branch: 'Paris' });
    expect(extractFilters('Best rides overall?')).toEqual({});
  });

  it('prefers the first listed park when several are mentioned', () => {
    expect(extractFilters('Compare Paris and California')).toEqual({ branch: 'California' });
  });
});

describe('filtersToPredicates', () => {
  it('turns filters into contains predicates', () => {
    expect(filtersToPredicates({ branch: 'Paris', location: 'Australia' })).toEqual([
      { kind: 'contains', attribute: 'branch', value: 'Paris' },
      { kind: 'contains', attribute: 'reviewerLocation', value: 'Australia' },
    ]);
    expect(filtersToPredicates({})).toEqual([]);
  });
});

describe('estimateQueryComplexity', () => {
  it('rates a short factual question as simple', () => {
    expect(estimateQueryComplexity('Are the churros good?')).toEqual({ score: 0, level: 'simple' });
  });

  it('adds weight for comparisons across parks', () => {
    expect(estimateQueryComplexity('Is Paris better than California?')).toEqual({ score: 0.5, level: 'medium' });
  });

  it('caps analytical multi-part questions at complex', () => {
    expect(
      estimateQueryComplexity('Why is Paris worse than Hong Kong? How do queues compare?'),
    ).toEqual({ score: 1, level: 'complex' });
  });
});
