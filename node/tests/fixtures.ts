import type { ReviewRecord } from '@/types/records';

export function makeRecord(overrides: Partial<ReviewRecord> & { id: string }): ReviewRecord {
  return {
    branch: 'Disneyland_Paris',
    reviewerLocation: 'United Kingdom',
    rating: 4,
    yearMonth: '2019-4',
    text: 'A pleasant day out',
    ...overrides,
  };
}

export const sampleRecords: ReviewRecord[] = [
  makeRecord({ id: 'r1', branch: 'Disneyland_Paris', reviewerLocation: 'France', text: 'Long queues but lovely castle' }),
  makeRecord({ id: 'r2', branch: 'Disneyland_HongKong', reviewerLocation: 'Australia', text: 'Friendly staff and a short wait' }),
  makeRecord({ id: 'r3', branch: 'Disneyland_California', reviewerLocation: 'United States', text: 'Fireworks were amazing' }),
  makeRecord({ id: 'r4', branch: 'Disneyland_Paris', reviewerLocation: 'Australia', rating: 2, text: 'Rides closed and staff unhelpful' }),
  makeRecord({ id: 'r5', branch: 'Disneyland_HongKong', reviewerLocation: 'New Zealand', rating: 5, text: 'Parade was the highlight' }),
];
