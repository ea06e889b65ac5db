import { JobPosting } from './JobPosting';
import { CvSummary } from './CvSummary';

export interface MatchResult {
  job: JobPosting;
  similarityScore: number;
  rescoredScore?: number;
  justification?: string;
}

export interface MatchOutcome {
  matches: MatchResult[];
  /** False when the LLM refinement was skipped or failed and vector order was kept. */
  rescored: boolean;
}

export interface MatchWithAnalysis extends MatchOutcome {
  analysis: string;
  summary: CvSummary;
}
