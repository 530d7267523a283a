// node/src/services/retrieval/record-indexer.ts: embed every record and upsert it into the vector index
import { RecordStore } from '@/services/records/record-store';
import { logger } from '@/services/logger';
import type { VectorIndex, VectorItem } from './vector-index';
import type { Embedder, Embedding } from './vector-utils';

const log = logger.getSubLogger({ name: 'indexer' });

async function embedAll(embedder: Embedder, texts: string[]): Promise<Embedding[]> {
  if (embedder.embedBatch) return embedder.embedBatch(texts);
  const out: Embedding[] = [];
  for (const t of texts) out.push(await embedder.embed(t));
  return out;
}

/** Returns the number of records written. Errors propagate to the caller. */
export async function indexRecords(
  store: RecordStore,
  embedder: Embedder,
  index: VectorIndex,
  batchSize = 256,
): Promise<number> {
  const records = [...store];
  let written = 0;
  for (let start = 0; start < records.length; start += batchSize) {
    const batch = records.slice(start, start + batchSize);
    const vectors = await embedAll(
      embedder,
      batch.map((r) => r.text),
    );
    const items: VectorItem[] = batch.map((r, i) => ({
      id: r.id,
      vector: vectors[i],
      document: r.text,
      metadata: RecordStore.toMetadata(r),
    }));
    await index.upsert(items);
    written += items.length;
    log.debug('indexer:batch', { start, size: items.length });
  }
  log.info('indexer:done', { index: index.name, records: written });
  return written;
}
