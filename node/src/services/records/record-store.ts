// node/src/services/records/record-store.ts: immutable in-memory review collection with predicate filtering
import type {
  RecordAttribute,
  RecordPredicate,
  RecordStoreSummary,
  ReviewRecord,
} from '@/types/records';

/** Lowercase and drop everything that is not a letter or digit. */
export function normalizeAttributeValue(value: string | number | null | undefined): string {
  if (value == null) return '';
  return String(value)
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]/g, '');
}

interface CompiledPredicate {
  attribute: RecordAttribute;
  test: (normalized: string) => boolean;
}

function compilePredicate(predicate: RecordPredicate): CompiledPredicate {
  const needle = normalizeAttributeValue(predicate.value);
  if (predicate.kind === 'equals') {
    return { attribute: predicate.attribute, test: (v) => v === needle };
  }
  return { attribute: predicate.attribute, test: (v) => v.includes(needle) };
}

export class RecordStore {
  private readonly records: ReadonlyArray<ReviewRecord>;
  private readonly byId: ReadonlyMap<string, ReviewRecord>;
  // normalized attribute values, computed once per record
  private readonly normalized: ReadonlyMap<string, Readonly<Record<RecordAttribute, string>>>;

  constructor(records: Iterable<ReviewRecord>) {
    const list: ReviewRecord[] = [];
    const byId = new Map<string, ReviewRecord>();
    const normalized = new Map<string, Readonly<Record<RecordAttribute, string>>>();

    for (const r of records) {
      if (byId.has(r.id)) {
        throw new Error(`Duplicate record id: ${r.id}`);
      }
      const frozen = Object.freeze({ ...r });
      list.push(frozen);
      byId.set(frozen.id, frozen);
      normalized.set(
        frozen.id,
        Object.freeze({
          branch: normalizeAttributeValue(frozen.branch),
          reviewerLocation: normalizeAttributeValue(frozen.reviewerLocation),
          rating: normalizeAttributeValue(frozen.rating),
          yearMonth: normalizeAttributeValue(frozen.yearMonth),
        }),
      );
    }

    this.records = Object.freeze(list);
    this.byId = byId;
    this.normalized = normalized;
  }

  get size(): number {
    return this.records.length;
  }

  get(id: string): ReviewRecord | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  ids(): string[] {
    return this.records.map((r) => r.id);
  }

  /**
   * Ids of records matching every predicate, in store order.
   * `within` restricts the scan to an existing candidate set.
   */
  filter(predicates: readonly RecordPredicate[], within?: readonly string[]): string[] {
    const source = within ? within.filter((id) => this.byId.has(id)) : this.ids();
    if (predicates.length === 0) return [...source];

    const compiled = predicates.map(compilePredicate);
    const out: string[] = [];
    for (const id of source) {
      const values = this.normalized.get(id);
      if (!values) continue;
      if (compiled.every((p) => p.test(values[p.attribute]))) {
        out.push(id);
      }
    }
    return out;
  }

  describe(sampleSize = 10): RecordStoreSummary {
    const branches = new Set<string>();
    const locations = new Set<string>();
    const ratings = new Set<number>();
    for (const r of this.records) {
      if (r.branch) branches.add(r.branch);
      if (r.reviewerLocation) locations.add(r.reviewerLocation);
      ratings.add(r.rating);
    }
    return {
      totalRecords: this.records.length,
      branches: [...branches].sort(),
      reviewerLocations: [...locations].sort().slice(0, sampleSize),
      ratings: [...ratings].sort((a, b) => a - b),
    };
  }

  /** Record attributes flattened for vector index metadata. */
  static toMetadata(record: ReviewRecord): Record<string, string | number> {
    return {
      branch: record.branch,
      reviewer_location: record.reviewerLocation,
      rating: record.rating,
      year_month: record.yearMonth,
    };
  }

  [Symbol.iterator](): Iterator<ReviewRecord> {
    return this.records[Symbol.iterator]();
  }
}
