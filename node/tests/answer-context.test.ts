import { describe, it, expect } from 'vitest';
import { buildReviewContext, MAX_CONTEXT_TEXT_CHARS } from '@/services/answer/answer-generator';
import { toChromaWhere } from '@/services/retrieval/chroma-vector-index';
import { makeRecord } from './fixtures';

describe('buildReviewContext', () => {
  it('formats each review with its attributes', () => {
    const context = buildReviewContext([
      makeRecord({ id: 'a', branch: 'Disneyland_Paris', rating: 5, reviewerLocation: 'France', yearMonth: '2019-6', text: 'Magical' }),
      makeRecord({ id: 'b', branch: 'Disneyland_HongKong', rating: 3, reviewerLocation: '', yearMonth: 'missing', text: 'Hot day' }),
    ]);

    expect(context).toBe(
      'Review 1 (Branch: Disneyland_Paris, Rating: 5/5, Location: France, Date: 2019-6):\nMagical\n\n' +
        'Review 2 (Branch: Disneyland_HongKong, Rating: 3/5, Location: unknown, Date: missing):\nHot day',
    );
  });

  it('truncates long review text', () => {
    const context = buildReviewContext([makeRecord({ id: 'a', text: 'x'.repeat(MAX_CONTEXT_TEXT_CHARS + 50) })]);
    expect(context.split('\n')[1]).toHaveLength(MAX_CONTEXT_TEXT_CHARS);
  });

  it('says so when there are no reviews', () => {
    expect(buildReviewContext([])).toBe('No relevant reviews found.');
  });
});

describe('toChromaWhere', () => {
  it('builds equality clauses', () => {
    expect(toChromaWhere(undefined)).toBeUndefined();
    expect(toChromaWhere({})).toBeUndefined();
    expect(toChromaWhere({ branch: 'Disneyland_Paris' })).toEqual({ branch: { $eq: 'Disneyland_Paris' } });
    expect(toChromaWhere({ branch: 'Disneyland_Paris', rating: 5 })).toEqual({
      $and: [{ branch: { $eq: 'Disneyland_Paris' } }, { rating: { $eq: 5 } }],
    });
  });
});
