import { z } from 'zod';
import { JobSearchHit } from '../../interfaces/domain/JobPosting';
import { LlmClient } from '../../utils/llmClient';
import { LlmError } from '../../utils/errorHandler';
import { clampScore, roundScore } from '../../utils/similarity';
import { truncate } from '../../utils/textCleaner';
import { RESCORE_SYSTEM_PROMPT, buildRescorePrompt } from './prompts';

const MAX_JUSTIFICATION_CHARS = 280;

const rescoreResponseSchema = z.object({
  scores: z.array(z.object({
    job_id: z.union([z.string(), z.number()]).transform(String),
    score: z.coerce.number(),
    justification: z.string().optional().default('')
  }))
});

export interface Rescore {
  score: number;
  justification: string;
}

export interface RescorerOptions {
  maxCvChars: number;
  maxTokens: number;
}

/** Pulls the JSON object out of a reply that may be wrapped in prose or code fences. */
export function extractJsonObject(content: string): string {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new LlmError('Rescoring response contained no JSON object');
  }
  return content.slice(start, end + 1);
}

export function parseRescoreResponse(content: string, candidateIds: string[]): Map<string, Rescore> {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonObject(content));
  } catch (error) {
    if (error instanceof LlmError) {
      throw error;
    }
    throw new LlmError('Rescoring response was not valid JSON');
  }

  const parsed = rescoreResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new LlmError('Rescoring response did not match the expected schema');
  }

  const expected = new Set(candidateIds);
  const rescores = new Map<string, Rescore>();
  for (const entry of parsed.data.scores) {
    if (!expected.has(entry.job_id) || rescores.has(entry.job_id)) {
      continue;
    }
    rescores.set(entry.job_id, {
      score: roundScore(clampScore(entry.score)),
      justification: entry.justification.trim().slice(0, MAX_JUSTIFICATION_CHARS)
    });
  }

  const missing = candidateIds.filter(id => !rescores.has(id));
  if (missing.length > 0) {
    throw new LlmError(`Rescoring response left ${missing.length} of ${candidateIds.length} candidates unscored`);
  }

  return rescores;
}

/**
 * Asks the LLM for a qualification-fit score per candidate. Throws on any
 * failure; callers decide how to fall back.
 */
export class Rescorer {
  constructor(
    private readonly llm: LlmClient,
    private readonly options: RescorerOptions
  ) {}

  async rescore(cvText: string, candidates: JobSearchHit[]): Promise<Map<string, Rescore>> {
    if (candidates.length === 0) {
      return new Map();
    }

    const content = await this.llm.complete({
      purpose: 'rescore',
      messages: [
        { role: 'system', content: RESCORE_SYSTEM_PROMPT },
        { role: 'user', content: buildRescorePrompt(truncate(cvText, this.options.maxCvChars), candidates) }
      ],
      maxTokens: this.options.maxTokens,
      temperature: 0,
      json: true
    });

    return parseRescoreResponse(content, candidates.map(({ job }) => job.id));
  }
}
