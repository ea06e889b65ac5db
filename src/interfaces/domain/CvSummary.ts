export type DegreeLevel = 'PhD' | 'Master' | 'Bachelor' | 'Diploma' | 'Certificate';

export interface CvContact {
  email: string | null;
  phone: string | null;
}

/** A dated role found in the CV. Title and company come from the lines around the date range. */
export interface CvExperience {
  period: string;
  title: string | null;
  company: string | null;
}

export interface CvProfile {
  name: string | null;
  skills: string[];
  education: DegreeLevel[];
  experience: CvExperience[];
  contact: CvContact;
  summary: string;
  wordCount: number;
}

/**
 * Per-request view of an uploaded CV. Never persisted and never logged.
 */
export interface CvSummary {
  rawText: string;
  cleanedText: string;
  embedding: number[];
  profile: CvProfile;
}
