// Shared record and predicate types for the review corpus

/** One customer review. Frozen once loaded. */
export interface ReviewRecord {
  readonly id: string;
  readonly branch: string;
  readonly reviewerLocation: string;
  readonly rating: number;
  readonly yearMonth: string;
  readonly text: string;
}

/** Attributes usable as filter predicates. */
export type RecordAttribute = 'branch' | 'reviewerLocation' | 'rating' | 'yearMonth';

export const RECORD_ATTRIBUTES: readonly RecordAttribute[] = [
  'branch',
  'reviewerLocation',
  'rating',
  'yearMonth',
];

export type RecordPredicate =
  | { kind: 'equals'; attribute: RecordAttribute; value: string | number }
  | { kind: 'contains'; attribute: RecordAttribute; value: string };

export interface RecordStoreSummary {
  totalRecords: number;
  branches: string[];
  reviewerLocations: string[];
  ratings: number[];
}
