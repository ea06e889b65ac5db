import { CvSummary } from '../../interfaces/domain/CvSummary';
import { JobSearchHit } from '../../interfaces/domain/JobPosting';
import { MatchOutcome, MatchResult, MatchWithAnalysis } from '../../interfaces/domain/MatchResult';
import { buildCvProfile } from '../../utils/cvProfile';
import { EmbeddingService } from '../../utils/embedding';
import { ValidationError, describeError } from '../../utils/errorHandler';
import { LlmClient } from '../../utils/llmClient';
import { logger } from '../../utils/logger';
import { cleanText, truncate } from '../../utils/textCleaner';
import { JobStore } from '../jobs/jobStore';
import {
  ANALYSIS_SYSTEM_PROMPT,
  NO_MATCHES_ANALYSIS,
  buildAnalysisPrompt,
  fallbackAnalysis
} from './prompts';
import { Rescore, Rescorer } from './rescorer';

export interface MatcherOptions {
  defaultTopK: number;
  maxTopK: number;
  rescoringEnabled: boolean;
  analysisMaxCvChars: number;
  analysisMaxTokens: number;
}

export interface MatchRequest {
  topK?: number;
}

/** Extracted documents carry text that is already cleaned; plain text gets cleaned here. */
export interface CvInput {
  rawText: string;
  cleanedText?: string;
}

export function compareRescored(a: MatchResult, b: MatchResult): number {
  return (b.rescoredScore ?? 0) - (a.rescoredScore ?? 0)
    || b.similarityScore - a.similarityScore
    || a.job.id.localeCompare(b.job.id);
}

export function applyRescores(candidates: JobSearchHit[], rescores: Map<string, Rescore>): MatchResult[] {
  return candidates
    .map(({ job, similarityScore }): MatchResult => {
      const rescore = rescores.get(job.id);
      return rescore
        ? { job, similarityScore, rescoredScore: rescore.score, justification: rescore.justification }
        : { job, similarityScore };
    })
    .sort(compareRescored);
}

/**
 * CV to job pipeline: clean, embed, vector search, best-effort LLM rescoring,
 * then (for uploads) a free-text analysis of the final ranking.
 */
export class MatcherService {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly store: JobStore,
    private readonly rescorer: Rescorer,
    private readonly llm: LlmClient,
    private readonly options: MatcherOptions
  ) {}

  resolveTopK(requested?: number): number {
    if (requested === undefined) {
      return this.options.defaultTopK;
    }
    return Math.min(Math.max(Math.floor(requested), 1), this.options.maxTopK);
  }

  async matchCv(cvText: string, request: MatchRequest = {}): Promise<MatchOutcome> {
    const cleanedText = cleanText(cvText);
    if (cleanedText.length === 0) {
      throw new ValidationError('CV text is empty after cleaning');
    }
    const embedding = await this.embeddings.embed(cleanedText);
    return this.rank(cleanedText, embedding, this.resolveTopK(request.topK));
  }

  /** Builds the per-request CV view. Never stored. */
  async summarizeCv({ rawText, cleanedText = cleanText(rawText) }: CvInput): Promise<CvSummary> {
    if (cleanedText.length === 0) {
      throw new ValidationError('CV text is empty after cleaning');
    }
    const embedding = await this.embeddings.embed(cleanedText);
    return { rawText, cleanedText, embedding, profile: buildCvProfile(rawText, cleanedText) };
  }

  /** Full upload flow: summary, ranking and analysis of the ranking. */
  async analyzeCv(input: CvInput, request: MatchRequest = {}): Promise<MatchWithAnalysis> {
    const summary = await this.summarizeCv(input);
    const outcome = await this.rank(summary.cleanedText, summary.embedding, this.resolveTopK(request.topK));
    const analysis = await this.analyze(summary, outcome.matches);
    return { ...outcome, analysis, summary };
  }

  private async rank(cleanedText: string, embedding: number[], topK: number): Promise<MatchOutcome> {
    const candidates = await this.store.search(embedding, topK);
    const vectorRanking: MatchResult[] = candidates.map(({ job, similarityScore }) => ({ job, similarityScore }));

    if (!this.options.rescoringEnabled || candidates.length === 0) {
      logger.info('Matched CV by vector similarity', { topK, candidates: candidates.length, rescored: false });
      return { matches: vectorRanking, rescored: false };
    }

    try {
      const rescores = await this.rescorer.rescore(cleanedText, candidates);
      const matches = applyRescores(candidates, rescores);
      logger.info('Matched CV with LLM rescoring', { topK, candidates: candidates.length, rescored: true });
      return { matches, rescored: true };
    } catch (error) {
      logger.warn('Rescoring failed, keeping vector similarity ranking', {
        candidates: candidates.length,
        error: describeError(error)
      });
      return { matches: vectorRanking, rescored: false };
    }
  }

  private async analyze(summary: CvSummary, matches: MatchResult[]): Promise<string> {
    if (matches.length === 0) {
      return NO_MATCHES_ANALYSIS;
    }

    try {
      return await this.llm.complete({
        purpose: 'analysis',
        messages: [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          {
            role: 'user',
            content: buildAnalysisPrompt(
              truncate(summary.cleanedText, this.options.analysisMaxCvChars),
              summary.profile,
              matches
            )
          }
        ],
        maxTokens: this.options.analysisMaxTokens,
        temperature: 0.3
      });
    } catch (error) {
      logger.warn('Analysis generation failed, returning summary of matches', { error: describeError(error) });
      return fallbackAnalysis(summary.profile, matches);
    }
  }
}
