export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface JobContextItem {
  title: string;
  company?: string;
  matchScore?: number;
  requiredSkills?: string;
  experienceLevel?: string;
  location?: string;
}
