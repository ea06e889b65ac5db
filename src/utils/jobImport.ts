import path from 'path';
import * as XLSX from 'xlsx';
import { UnsupportedFormatError, ValidationError } from './errorHandler';
import { decodePlainText, UploadedDocument } from './textParser';

type JobField =
  | 'job_title'
  | 'company'
  | 'description'
  | 'required_skills'
  | 'experience_level'
  | 'education_requirements'
  | 'location'
  | 'salary_range';

// First matching column wins; comparison is case-insensitive.
const COLUMN_ALIASES: Record<JobField, string[]> = {
  job_title: ['job_title', 'title', 'position', 'role', 'job_name'],
  company: ['company', 'employer', 'organization', 'firm'],
  description: ['description', 'job_description', 'summary', 'details'],
  required_skills: ['required_skills', 'skills', 'qualifications', 'requirements'],
  experience_level: ['experience_level', 'level', 'seniority', 'experience'],
  education_requirements: ['education_requirements', 'education', 'degree', 'qualification'],
  location: ['location', 'city', 'address', 'place'],
  salary_range: ['salary_range', 'salary', 'compensation', 'pay']
};

function pickColumn(row: Record<string, unknown>, aliases: string[]): string {
  const entries = Object.entries(row).map(([key, value]) => [key.trim().toLowerCase(), value] as const);
  for (const alias of aliases) {
    const match = entries.find(([key, value]) => key === alias && value !== undefined && String(value).trim() !== '');
    if (match) {
      return String(match[1]).trim();
    }
  }
  return '';
}

export function mapCsvRow(row: Record<string, unknown>): Record<string, string> {
  const mapped: Record<string, string> = {};
  for (const [field, aliases] of Object.entries(COLUMN_ALIASES)) {
    mapped[field] = pickColumn(row, aliases);
  }
  const id = pickColumn(row, ['id', 'job_id']);
  if (id) {
    mapped.id = id;
  }
  return mapped;
}

// Control characters mean a binary container (zip, OLE); a leading `<` means markup.
const BINARY_CONTENT = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/;

/** Reads delimited text only; the workbook formats xlsx would otherwise sniff are refused. */
export function parseCsvJobs(text: string): Record<string, string>[] {
  const body = text.replace(/^\uFEFF/, '');
  if (BINARY_CONTENT.test(body) || body.trimStart().startsWith('<')) {
    throw new ValidationError('Job file is not a CSV text file');
  }

  const workbook = XLSX.read(body, { type: 'string', raw: true });
  const [sheetName] = workbook.SheetNames;
  if (!sheetName) {
    return [];
  }
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: false
  });
  return rows.map(mapCsvRow);
}

export function parseJsonJobs(text: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new ValidationError('Job file is not valid JSON');
  }

  if (Array.isArray(data)) {
    return data;
  }
  if (typeof data === 'object' && data !== null) {
    if ('jobs' in data && Array.isArray(data.jobs)) {
      return data.jobs;
    }
    return [data];
  }
  throw new ValidationError('Job file must contain an object or an array of objects');
}

/** Reads job records from an uploaded `.csv` or `.json` file. Records are not validated here. */
export function parseJobFile(file: UploadedDocument): unknown[] {
  const extension = path.extname(file.originalname || '').toLowerCase();
  const text = decodePlainText(file.buffer);

  if (extension === '.csv' || file.mimetype === 'text/csv') {
    return parseCsvJobs(text);
  }
  if (extension === '.json' || file.mimetype === 'application/json') {
    return parseJsonJobs(text);
  }
  throw new UnsupportedFormatError('Unsupported job file format. Use CSV or JSON.');
}
