/**
 * Winners Table
 * Flattens stored winners into the rows the search page renders
 */

import { normalizeEmail } from '../extraction/email.utils';
import { displayName, parsePersonName } from '../extraction/name.utils';
import { extractUniversityFromAwards } from '../extraction/university.utils';
import { ContactCandidate, Dataset, ListingRecord, WinnerEmailJson, WinnerTableRow } from './dataset.types';

function uniqueBy<T>(values: T[], keyOf: (value: T) => string): T[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = keyOf(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function winnerName(listing: ListingRecord, candidates: ContactCandidate[]): string {
  return listing.studentName ? displayName(listing.studentName) : candidates[0]?.name ?? '';
}

/**
 * One record per listing that has contact candidates, sorted by id
 */
export function buildWinnerEmails(dataset: Dataset): WinnerEmailJson[] {
  const ownerIds = [...dataset.contacts.keys()].sort((a, b) => a - b);
  const records: WinnerEmailJson[] = [];

  for (const ownerId of ownerIds) {
    const listing = dataset.listings.get(ownerId);
    const candidates = dataset.contacts.get(ownerId) ?? [];
    if (!listing || candidates.length === 0) continue;

    const emails = uniqueBy(
      candidates.flatMap((candidate) => (candidate.email ? [candidate.email] : [])),
      normalizeEmail
    );
    const linkedin = uniqueBy(
      candidates.flatMap((candidate) => (candidate.linkedinUrl ? [candidate.linkedinUrl] : [])),
      (url) => url
    );
    const queries = uniqueBy(
      candidates.map((candidate) => candidate.sourceQuery),
      (query) => query
    );

    records.push({
      id: ownerId,
      name: winnerName(listing, candidates),
      title: listing.title,
      year: listing.year,
      awards: [...listing.awards],
      emails,
      linkedin,
      queries,
    });
  }

  return records;
}

/**
 * The stored "Last, First" name is split on its comma; the display name is
 * only a fallback, since multi-word surnames cannot be recovered from it
 */
export function toWinnerTableRow(winner: WinnerEmailJson, listing?: ListingRecord): WinnerTableRow {
  const { first, last } = parsePersonName(listing?.studentName || winner.name);

  return {
    uni: extractUniversityFromAwards(winner.awards) ?? '',
    year: winner.year ?? '',
    first,
    last,
    major: listing?.category ?? '',
    email: winner.emails[0] ?? '',
    notes: winner.awards.join('; '),
    project_title: winner.title,
    linkedin: [...winner.linkedin],
    skills: (listing?.skills ?? []).join(', '),
  };
}

export function buildWinnersTable(dataset: Dataset): WinnerTableRow[] {
  return buildWinnerEmails(dataset).map((winner) => toWinnerTableRow(winner, dataset.listings.get(winner.id)));
}
