// node/src/services/answer/answer-generator.ts: grounded answer generation over ranked reviews

import OpenAI from 'openai';
import type { ReviewRecord } from '@/types/records';
import { logger } from '@/services/logger';

const log = logger.getSubLogger({ name: 'answer' });

/** Review text is truncated to this many characters in the prompt. */
export const MAX_CONTEXT_TEXT_CHARS = 500;

export interface AnswerGenerator {
  generate(question: string, context: readonly ReviewRecord[]): Promise<string>;
}

export function buildReviewContext(records: readonly ReviewRecord[]): string {
  if (records.length === 0) return 'No relevant reviews found.';
  return records
    .map((r, i) => {
      const header = `Review ${i + 1} (Branch: ${r.branch}, Rating: ${r.rating}/5, Location: ${r.reviewerLocation || 'unknown'}, Date: ${r.yearMonth}):`;
      return `${header}\n${r.text.slice(0, MAX_CONTEXT_TEXT_CHARS)}`;
    })
    .join('\n\n');
}

const SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions about theme parks based on customer reviews. ' +
  'Use only the provided reviews to answer. If the reviews do not contain enough information, say so.';

export function buildUserPrompt(question: string, records: readonly ReviewRecord[]): string {
  return `Based on these customer reviews:

${buildReviewContext(records)}

Question: ${question}

Please provide a concise answer based on the reviews above.`;
}

export interface OpenAIAnswerGeneratorConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly client: OpenAI;

  constructor(
    private readonly config: OpenAIAnswerGeneratorConfig,
    client?: OpenAI,
  ) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey });
  }

  async generate(question: string, context: readonly ReviewRecord[]): Promise<string> {
    log.info('answer:generate', { reviews: context.length, model: this.config.model ?? 'gpt-4o-mini' });
    const res = await this.client.chat.completions.create({
      model: this.config.model ?? 'gpt-4o-mini',
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(question, context) },
      ],
      temperature: this.config.temperature ?? 0.7,
      max_tokens: this.config.maxTokens ?? 500,
    });
    return res.choices[0]?.message?.content ?? '';
  }
}
