import { JobPosting, JobSearchHit } from '../../interfaces/domain/JobPosting';
import { MatchResult } from '../../interfaces/domain/MatchResult';
import { CvProfile } from '../../interfaces/domain/CvSummary';

const DESCRIPTION_PREVIEW_CHARS = 400;
const ANALYSIS_JOB_LIMIT = 5;

export const RESCORE_SYSTEM_PROMPT = `You are an experienced technical recruiter scoring how well a candidate fits job postings.
- You receive a candidate CV and a list of job postings that were pre-selected by vector similarity.
- For EVERY posting, estimate how well the candidate is qualified for it on a 0-100 scale.
- Weigh required skills, experience level and education requirements against what the CV actually shows.
- Penalise seniority mismatches and missing must-have skills even when the wording looks similar.
- Do not reward keyword overlap alone.
- Return STRICT JSON only, no commentary, using the schema from the user prompt.`;

export const ANALYSIS_SYSTEM_PROMPT = `You are an AI career advisor helping job seekers find suitable employment based on their CV and the available positions.

Guidelines:
- Analyse the candidate's CV against the ranked job matches you are given
- Explain why the top matches fit, citing specific skills and experience
- Mention the match percentages you were given; do not invent new ones
- Point out gaps the candidate could close to improve their prospects
- Be encouraging, professional and concise`;

function preview(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length > maxChars ? `${trimmed.slice(0, maxChars)}...` : trimmed;
}

function orNa(value: string): string {
  return value.trim() || 'N/A';
}

export function describeJob(job: JobPosting): string {
  return [
    `Title: ${orNa(job.title)}`,
    `Company: ${orNa(job.company)}`,
    `Required skills: ${orNa(job.requiredSkills)}`,
    `Experience level: ${orNa(job.experienceLevel)}`,
    `Education: ${orNa(job.educationRequirements)}`,
    `Location: ${orNa(job.location)}`,
    `Description: ${preview(job.description, DESCRIPTION_PREVIEW_CHARS)}`
  ].join('\n');
}

export function buildRescorePrompt(cvText: string, candidates: JobSearchHit[]): string {
  const jobs = candidates
    .map(({ job, similarityScore }) => `job_id: ${job.id}\nVector similarity: ${similarityScore}\n${describeJob(job)}`)
    .join('\n\n---\n\n');

  return `Score the candidate against each of the ${candidates.length} job postings below.

Output ONLY valid JSON with this schema:
{
  "scores": [
    {
      "job_id": string,          // exactly as given
      "score": number,           // 0-100, how well the candidate is qualified
      "justification": string    // one or two sentences
    }
  ]
}
Rules:
- Include every job_id exactly once.
- Keep each justification under 280 characters.

CANDIDATE CV:
"""
${cvText}
"""

JOB POSTINGS:
${jobs}`;
}

export function matchScore(match: MatchResult): number {
  return match.rescoredScore ?? match.similarityScore;
}

export function buildAnalysisPrompt(cvText: string, profile: CvProfile, matches: MatchResult[]): string {
  const ranked = matches
    .slice(0, ANALYSIS_JOB_LIMIT)
    .map((match, i) => {
      const reason = match.justification ? `\nRecruiter note: ${match.justification}` : '';
      return `Job ${i + 1} (match ${matchScore(match)}%)\n${describeJob(match.job)}${reason}`;
    })
    .join('\n\n');

  const skills = profile.skills.length > 0 ? profile.skills.join(', ') : 'none detected';

  return `Please analyse this candidate's CV and explain the job matches below.

DETECTED SKILLS: ${skills}

CANDIDATE CV:
"""
${cvText}
"""

RANKED JOB MATCHES:
${ranked}

Please provide:
1. A brief summary of the candidate's profile
2. Why the top matches fit, with specific reasons
3. Gaps and suggestions for improving job prospects`;
}

export const NO_MATCHES_ANALYSIS =
  'No job postings are available to match against yet. Add job postings and try again.';

export function fallbackAnalysis(profile: CvProfile, matches: MatchResult[]): string {
  const lines = matches
    .slice(0, ANALYSIS_JOB_LIMIT)
    .map((match, i) => `${i + 1}. ${match.job.title}${match.job.company ? ` at ${match.job.company}` : ''} (${matchScore(match)}% match)`);
  const skills = profile.skills.length > 0 ? `Detected skills: ${profile.skills.join(', ')}.` : 'No common skills were detected in the CV.';

  return [
    'A detailed analysis is not available right now. Your top matches are:',
    ...lines,
    skills
  ].join('\n');
}
