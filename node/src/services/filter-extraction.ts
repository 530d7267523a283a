// node/src/services/filter-extraction.ts: turn park / origin mentions in a question into record predicates
import type { RecordPredicate } from '@/types/records';

const BRANCH_KEYWORDS: Array<{ keyword: string; branch: string }> = [
  { keyword: 'hong kong', branch: 'Hong_Kong' },
  { keyword: 'california', branch: 'California' },
  { keyword: 'paris', branch: 'Paris' },
];

const LOCATION_KEYWORDS: Array<{ keyword: string; location: string }> = [
  { keyword: 'australia', location: 'Australia' },
];

export interface ExtractedFilters {
  branch?: string;
  location?: string;
}

/** First branch mention wins, in the order listed above. */
export function extractFilters(question: string): ExtractedFilters {
  const q = question.toLowerCase();
  const out: ExtractedFilters = {};
  const branch = BRANCH_KEYWORDS.find((b) => q.includes(b.keyword));
  if (branch) out.branch = branch.branch;
  const location = LOCATION_KEYWORDS.find((l) => q.includes(l.keyword));
  if (location) out.location = location.location;
  return out;
}

export function filtersToPredicates(filters: ExtractedFilters): RecordPredicate[] {
  const predicates: RecordPredicate[] = [];
  if (filters.branch) {
    predicates.push({ kind: 'contains', attribute: 'branch', value: filters.branch });
  }
  if (filters.location) {
    predicates.push({ kind: 'contains', attribute: 'reviewerLocation', value: filters.location });
  }
  return predicates;
}
