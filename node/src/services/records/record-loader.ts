// node/src/services/records/record-loader.ts: reads the review corpus (CSV or JSON) once at startup
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { ReviewRecord } from '@/types/records';
import { logger } from '@/services/logger';

const log = logger.getSubLogger({ name: 'records' });

const cell = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

// Column names follow the published review dataset; camelCase JSON is accepted too.
const rowSchema = z
  .object({
    Review_ID: cell.optional(),
    id: cell.optional(),
    Rating: cell.optional(),
    rating: cell.optional(),
    Year_Month: cell.optional(),
    yearMonth: cell.optional(),
    Reviewer_Location: cell.optional(),
    reviewerLocation: cell.optional(),
    Review_Text: cell.optional(),
    text: cell.optional(),
    Branch: cell.optional(),
    branch: cell.optional(),
  })
  .transform((r) => ({
    id: r.Review_ID ?? r.id ?? '',
    rating: Number(r.Rating ?? r.rating ?? NaN),
    yearMonth: r.Year_Month ?? r.yearMonth ?? 'missing',
    reviewerLocation: r.Reviewer_Location ?? r.reviewerLocation ?? '',
    text: r.Review_Text ?? r.text ?? '',
    branch: r.Branch ?? r.branch ?? '',
  }))
  .pipe(
    z.object({
      id: z.string().min(1),
      rating: z.number().int().min(1).max(5),
      yearMonth: z.string(),
      reviewerLocation: z.string(),
      text: z.string().min(1),
      branch: z.string().min(1),
    }),
  );

export interface LoadRecordsResult {
  records: ReviewRecord[];
  skipped: number;
  encoding: 'utf-8' | 'latin1';
}

/** Decodes as UTF-8, falling back to Latin-1 for legacy exports. */
export function decodeText(buf: Buffer): { text: string; encoding: 'utf-8' | 'latin1' } {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buf);
    return { text: text.replace(/^\uFEFF/, ''), encoding: 'utf-8' };
  } catch {
    log.debug('records:utf8_decode_failed', { fallback: 'latin1' });
    return { text: buf.toString('latin1'), encoding: 'latin1' };
  }
}

/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF or LF.
 * Returns rows as objects keyed by the header line.
 */
export function parseCsv(text: string): Array<Record<string, string>> {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  const nonEmpty = rows.filter((r) => r.some((c) => c.trim().length > 0));
  const [header, ...body] = nonEmpty;
  if (!header) return [];
  const columns = header.map((h) => h.trim());
  return body.map((cells) => {
    const obj: Record<string, string> = {};
    columns.forEach((col, idx) => {
      obj[col] = cells[idx] ?? '';
    });
    return obj;
  });
}

export function parseRecordRows(rows: readonly unknown[]): { records: ReviewRecord[]; skipped: number } {
  const records: ReviewRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  for (const row of rows) {
    const parsed = rowSchema.safeParse(row);
    if (!parsed.success || seen.has(parsed.data.id)) {
      skipped++;
      continue;
    }
    seen.add(parsed.data.id);
    records.push(parsed.data);
  }
  return { records, skipped };
}

export async function loadRecordsFromFile(filePath: string): Promise<LoadRecordsResult> {
  log.info('records:loading', { filePath });
  const buf = await fs.readFile(filePath);
  const { text, encoding } = decodeText(buf);

  let rows: unknown[];
  if (path.extname(filePath).toLowerCase() === '.json') {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error(`Expected a JSON array of records in ${filePath}`);
    }
    rows = parsed;
  } else {
    rows = parseCsv(text);
  }

  const { records, skipped } = parseRecordRows(rows);
  log.info('records:loaded', { count: records.length, skipped, encoding });
  return { records, skipped, encoding };
}
