/**
 * Email Guesser
 * Candidate addresses from a university's known address formats
 */

import type { ContactCandidate } from '../../lib/dataset/dataset.types';
import { PersonName, UNIVERSITY_EMAIL_FORMATS, extractUniversityFromAwards, isAcceptableEmail } from '../../lib/extraction';

export const GUESS_QUERY_PREFIX = 'guess:';

function namePart(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z]/g, '');
}

/**
 * Every format of the university filled in with the name. Unknown
 * universities and incomplete names give no guesses.
 */
export function generateEmailGuesses(name: PersonName, university: string): string[] {
  const formats = UNIVERSITY_EMAIL_FORMATS[university];
  const first = namePart(name.first);
  const last = namePart(name.last);
  if (!formats || !first || !last) {
    return [];
  }

  const guesses = formats.map((format) => format.replace('{first}', first).replace('{last}', last));
  return [...new Set(guesses)].filter(isAcceptableEmail);
}

/**
 * Scholarship awards name the school first; any award mentioning one is the fallback
 */
export function universityForAwards(awards: string[]): string | null {
  return extractUniversityFromAwards(awards, { scholarshipOnly: true }) ?? extractUniversityFromAwards(awards);
}

export function guessCandidates(ownerId: number, displayName: string, name: PersonName, awards: string[]): ContactCandidate[] {
  const university = universityForAwards(awards);
  if (university === null) {
    return [];
  }

  return generateEmailGuesses(name, university).map((email) => ({
    ownerId,
    name: displayName,
    email,
    sourceQuery: `${GUESS_QUERY_PREFIX}${university}`,
  }));
}
