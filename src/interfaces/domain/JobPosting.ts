export interface JobPostingFields {
  title: string;
  company: string;
  description: string;
  /** Comma-separated list, as entered by the publisher. */
  requiredSkills: string;
  location: string;
  salaryRange: string;
  experienceLevel: string;
  educationRequirements: string;
}

export interface JobPosting extends JobPostingFields {
  id: string;
}

export interface NewJobPosting extends JobPostingFields {
  id?: string;
}

export interface JobSearchHit {
  job: JobPosting;
  /** Cosine similarity mapped to 0-100. */
  similarityScore: number;
}

export interface InsertResult {
  id: string;
  created: boolean;
}

export interface BulkInsertItem {
  job: NewJobPosting;
  embedding: number[];
}

export type BulkInsertOutcome =
  | { index: number; status: 'inserted'; id: string; created: boolean }
  | { index: number; status: 'failed'; error: string; id?: string };

export interface StoreStats {
  collectionName: string;
  rowCount: number;
}

export function jobEmbeddingText(job: Pick<JobPostingFields, 'title' | 'description' | 'requiredSkills'>): string {
  return [job.title, job.description, job.requiredSkills]
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .join(' ');
}
