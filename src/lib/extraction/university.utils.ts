/**
 * University detection from award text
 */

import universityEmailFormats from '../../config/university-email-formats.json';

export const UNIVERSITY_EMAIL_FORMATS: Record<string, string[]> = universityEmailFormats;

const KNOWN_UNIVERSITIES = Object.keys(UNIVERSITY_EMAIL_FORMATS);

const INSTITUTION_PATTERNS = [
  /(?:[A-Z][a-z]+ )*University(?: of [A-Z][a-z]+(?: [A-Z][a-z]+)*)?/,
  /(?:[A-Z][a-z]+ )+Institute(?: of [A-Z][a-z]+(?: [A-Z][a-z]+)*)?/,
  /(?:[A-Z][a-z]+ )+College/,
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A known university mentioned in the text, else the first institution-looking phrase
 */
export function findUniversity(text: string): string | null {
  for (const name of KNOWN_UNIVERSITIES) {
    if (new RegExp(`\\b${escapeRegex(name)}\\b`, 'i').test(text)) {
      return name;
    }
  }

  for (const pattern of INSTITUTION_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[0].replace(/^(The|A) /, '').trim();
    }
  }

  return null;
}

/**
 * Scan awards in order. With `scholarshipOnly`, only scholarship and tuition
 * awards are considered, since those name the school the student is attending.
 */
export function extractUniversityFromAwards(awards: string[], options: { scholarshipOnly?: boolean } = {}): string | null {
  for (const award of awards) {
    const lower = award.toLowerCase();
    if (options.scholarshipOnly && !lower.includes('scholarship') && !lower.includes('tuition')) {
      continue;
    }
    const university = findUniversity(award);
    if (university) return university;
  }
  return null;
}
