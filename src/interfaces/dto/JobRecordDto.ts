import { z } from 'zod';
import { JobPosting, NewJobPosting } from '../domain/JobPosting';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requiredText = (max: number) =>
  z.union([z.string(), z.number()])
    .transform(value => String(value).trim())
    .pipe(z.string().min(1, 'Required').max(max));

const optionalText = (max: number) =>
  z.union([z.string(), z.number(), z.null()])
    .optional()
    .transform(value => (value === undefined || value === null ? '' : String(value).trim()))
    .pipe(z.string().max(max));

const jobRecordObject = z.object({
  id: z.union([z.string(), z.number()])
    .transform(value => String(value).trim())
    .pipe(z.string().min(1).max(100).regex(/^[A-Za-z0-9._:-]+$/, 'Only letters, digits and . _ : - are allowed'))
    .optional(),
  job_title: requiredText(300),
  company: optionalText(300),
  description: requiredText(20000),
  required_skills: optionalText(2000),
  location: optionalText(300),
  salary_range: optionalText(100),
  experience_level: optionalText(100),
  education_requirements: optionalText(1000)
});

/** Job record as sent by clients; `title` is accepted as an alias of `job_title`. */
export const jobRecordSchema = z.preprocess(
  value => (isRecord(value) && value.job_title === undefined && value.title !== undefined
    ? { ...value, job_title: value.title }
    : value),
  jobRecordObject
);

export type JobRecordDto = z.infer<typeof jobRecordObject>;

export const addJobsBodySchema = z.union([
  z.array(z.unknown()),
  z.object({ jobs: z.array(z.unknown()) })
]).transform(body => (Array.isArray(body) ? body : body.jobs))
  .pipe(z.array(z.unknown()).min(1, 'At least one job is required').max(500, 'At most 500 jobs per request'));

export function toNewJobPosting(dto: JobRecordDto): NewJobPosting {
  return {
    ...(dto.id ? { id: dto.id } : {}),
    title: dto.job_title,
    company: dto.company,
    description: dto.description,
    requiredSkills: dto.required_skills,
    location: dto.location,
    salaryRange: dto.salary_range,
    experienceLevel: dto.experience_level,
    educationRequirements: dto.education_requirements
  };
}

export interface JobPostingView {
  id: string;
  job_title: string;
  company: string;
  description: string;
  required_skills: string;
  location: string;
  salary_range: string;
  experience_level: string;
  education_requirements: string;
}

export function toJobPostingView(job: JobPosting): JobPostingView {
  return {
    id: job.id,
    job_title: job.title,
    company: job.company,
    description: job.description,
    required_skills: job.requiredSkills,
    location: job.location,
    salary_range: job.salaryRange,
    experience_level: job.experienceLevel,
    education_requirements: job.educationRequirements
  };
}
