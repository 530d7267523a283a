// node/src/services/retrieval/lexical-scorer.ts: token-overlap relevance with an exact-phrase boost
import { tokenize } from './vector-utils';

export const DEFAULT_PHRASE_BOOST = 1.5;

/**
 * Share of distinct query tokens present in the text, multiplied by `phraseBoost`
 * when the whole query occurs verbatim (case-insensitive). Range [0, phraseBoost].
 */
export function lexicalScore(query: string, text: string, phraseBoost = DEFAULT_PHRASE_BOOST): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) return 0;

  const textTokens = new Set(tokenize(text));
  let overlap = 0;
  for (const t of queryTokens) {
    if (textTokens.has(t)) overlap++;
  }

  const base = overlap / queryTokens.size;
  const phrase = query.trim().toLowerCase();
  if (phrase && text.toLowerCase().includes(phrase)) {
    return base * phraseBoost;
  }
  return base;
}
