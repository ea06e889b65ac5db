import skillKeywords from '../data/skillKeywords.json';
import { CvContact, CvExperience, CvProfile, DegreeLevel } from '../interfaces/domain/CvSummary';
import { cleanText } from './textCleaner';

const SUMMARY_CHARS = 200;
const MAX_NAME_LENGTH = 50;
const NAME_SEARCH_LINES = 5;
const MAX_EXPERIENCE_ENTRIES = 10;
const EXPERIENCE_CONTEXT_LINES = 2;
const MAX_CONTEXT_LINE_LENGTH = 100;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /(?:\+\d{1,3}[\s.-]?)?\(?\d{2,4}\)?[\s.-]?\d{3}[\s.-]?\d{3,4}\b/;

// "2019 - 2023", "2019 \u2013 present", "2015 to current"
const DATE_RANGE_PATTERN = /\b((?:19|20)\d{2})\s*(?:-|\u2013|\u2014|to)\s*((?:19|20)\d{2}|present|current)\b/i;
const RANGE_SEPARATORS = /^[\s|,;:()\-\u2013]+|[\s|,;:()\-\u2013]+$/g;

// Highest level first.
const DEGREE_PATTERNS: Array<[DegreeLevel, RegExp]> = [
  ['PhD', /\b(ph\.?\s?d|doctorate)\b/i],
  ['Master', /\b(master'?s?|msc|m\.sc|mba)\b/i],
  ['Bachelor', /\b(bachelor'?s?|bsc|b\.sc|b\.s\.)/i],
  ['Diploma', /\bdiploma\b/i],
  ['Certificate', /\b(certificate|certification|certified)\b/i]
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const SKILL_MATCHERS: Array<{ name: string; pattern: RegExp }> = skillKeywords.map(name => ({
  name,
  pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(name)}(?![\\p{L}\\p{N}+#])`, 'iu')
}));

export function extractSkills(text: string): string[] {
  return SKILL_MATCHERS
    .filter(({ pattern }) => pattern.test(text))
    .map(({ name }) => name);
}

export function extractEducation(text: string): DegreeLevel[] {
  return DEGREE_PATTERNS
    .filter(([, pattern]) => pattern.test(text))
    .map(([level]) => level);
}

export function extractContact(text: string): CvContact {
  const email = text.match(EMAIL_PATTERN)?.[0] ?? null;
  const withoutEmail = email ? text.replace(email, ' ') : text;
  const phone = withoutEmail.match(PHONE_PATTERN)?.[0].trim() ?? null;
  return { email, phone };
}

/**
 * The name is usually the first short line of a CV that has no digits or email.
 * Only meaningful on text that still has its line breaks.
 */
export function extractName(rawText: string): string | null {
  const lines = rawText
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .slice(0, NAME_SEARCH_LINES);

  for (const line of lines) {
    if (line.length > 2 && line.length < MAX_NAME_LENGTH && !/\d/.test(line) && !line.includes('@')) {
      return cleanText(line) || null;
    }
  }
  return null;
}

function isContextLine(line: string): boolean {
  return line.length >= 3 && line.length <= MAX_CONTEXT_LINE_LENGTH && !DATE_RANGE_PATTERN.test(line);
}

function formatPeriod(start: string, end: string): string {
  const until = /^\d/.test(end) ? end : `${end.charAt(0).toUpperCase()}${end.slice(1).toLowerCase()}`;
  return `${start} - ${until}`;
}

/**
 * Dated roles, one per line holding a year range. Text left on that line is the
 * title; otherwise the two lines above give title and company.
 */
export function extractExperience(rawText: string): CvExperience[] {
  const lines = rawText.split(/\r?\n/).map(line => line.trim());
  const experience: CvExperience[] = [];

  for (const [index, line] of lines.entries()) {
    if (experience.length >= MAX_EXPERIENCE_ENTRIES) {
      break;
    }
    const match = line.match(DATE_RANGE_PATTERN);
    if (!match) {
      continue;
    }

    const rest = line.replace(match[0], ' ').replace(RANGE_SEPARATORS, '');
    const context = isContextLine(rest)
      ? [rest]
      : lines.slice(Math.max(0, index - EXPERIENCE_CONTEXT_LINES), index).filter(isContextLine);

    experience.push({
      period: formatPeriod(match[1], match[2]),
      title: context[0] ?? null,
      company: context[1] ?? null
    });
  }
  return experience;
}

export function summarize(cleanedText: string): string {
  if (cleanedText.length <= SUMMARY_CHARS) {
    return cleanedText;
  }
  return `${cleanedText.slice(0, SUMMARY_CHARS).trim()}...`;
}

export function buildCvProfile(rawText: string, cleanedText: string): CvProfile {
  return {
    name: rawText.includes('\n') ? extractName(rawText) : null,
    skills: extractSkills(cleanedText),
    education: extractEducation(cleanedText),
    experience: rawText.includes('\n') ? extractExperience(rawText) : [],
    contact: extractContact(rawText),
    summary: summarize(cleanedText),
    wordCount: cleanedText.length === 0 ? 0 : cleanedText.split(' ').length
  };
}
