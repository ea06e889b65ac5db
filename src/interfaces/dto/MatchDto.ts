import { z } from 'zod';
import { CvExperience, CvSummary, DegreeLevel } from '../domain/CvSummary';
import { MatchResult } from '../domain/MatchResult';
import { JobPostingView, toJobPostingView } from './JobRecordDto';

/** `top_k` arrives as a number in JSON bodies and as a string in multipart fields or the query. */
export const topKSchema = (maxTopK: number) =>
  z.preprocess(
    value => (value === '' || value === null ? undefined : value),
    z.coerce.number().int().min(1).max(maxTopK).optional()
  );

export const matchJobsSchema = (maxTopK: number) =>
  z.object({
    cv_text: z.string({ required_error: 'cv_text is required' }).trim().min(1, 'cv_text cannot be empty'),
    top_k: topKSchema(maxTopK)
  });

export interface MatchResultView extends JobPostingView {
  similarity_score: number;
  rescored_score?: number;
  rescore_justification?: string;
  match_score: number;
}

export function toMatchResultView(match: MatchResult): MatchResultView {
  return {
    ...toJobPostingView(match.job),
    similarity_score: match.similarityScore,
    ...(match.rescoredScore !== undefined
      ? { rescored_score: match.rescoredScore, rescore_justification: match.justification ?? '' }
      : {}),
    match_score: match.rescoredScore ?? match.similarityScore
  };
}

export interface CvSummaryView {
  raw_text: string;
  cleaned_text: string;
  embedding: number[];
  name: string | null;
  skills: string[];
  education: DegreeLevel[];
  experience: CvExperience[];
  contact: { email: string | null; phone: string | null };
  summary: string;
  word_count: number;
}

export function toCvSummaryView(summary: CvSummary): CvSummaryView {
  const { profile } = summary;
  return {
    raw_text: summary.rawText,
    cleaned_text: summary.cleanedText,
    embedding: summary.embedding,
    name: profile.name,
    skills: profile.skills,
    education: profile.education,
    experience: profile.experience,
    contact: { email: profile.contact.email, phone: profile.contact.phone },
    summary: profile.summary,
    word_count: profile.wordCount
  };
}
