// node/src/services/query-complexity.ts: rough complexity estimate reported alongside answers

export type ComplexityLevel = 'simple' | 'medium' | 'complex';

export interface QueryComplexity {
  score: number;
  level: ComplexityLevel;
}

const COMPARATIVE_WORDS = ['compare', 'versus', 'vs', 'better', 'worse', 'difference', 'similar'];
const ANALYTICAL_WORDS = ['why', 'how', 'analyze', 'trend', 'pattern', 'correlation'];
const PARKS = ['california', 'hong kong', 'paris'];

export function estimateQueryComplexity(question: string): QueryComplexity {
  let score = 0;
  const q = question.toLowerCase();

  const wordCount = question.split(/\s+/).filter(Boolean).length;
  if (wordCount > 20) score += 0.2;
  else if (wordCount > 10) score += 0.1;

  if (COMPARATIVE_WORDS.some((w) => q.includes(w))) score += 0.2;
  if (ANALYTICAL_WORDS.some((w) => q.includes(w))) score += 0.3;

  const parks = PARKS.filter((p) => q.includes(p)).length;
  if (parks > 1) score += 0.3;
  else if (parks === 1) score += 0.1;

  if ((question.match(/\?/g) ?? []).length > 1) score += 0.2;

  // round away float drift (0.1 + 0.2 etc.)
  const rounded = Math.round(Math.min(score, 1) * 100) / 100;
  const level: ComplexityLevel = rounded < 0.3 ? 'simple' : rounded < 0.7 ? 'medium' : 'complex';
  return { score: rounded, level };
}
