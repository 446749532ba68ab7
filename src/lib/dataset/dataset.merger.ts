/**
 * Dataset Merger
 * Combines extractor output with stored records: listings keyed by id,
 * contacts deduplicated by owner and address
 */

import { isAcceptableEmail, normalizeEmail } from '../extraction/email.utils';
import {
  ContactCandidate,
  Dataset,
  ENRICHABLE_LISTING_FIELDS,
  EnrichableListingField,
  IncomingItem,
  ListingRecord,
} from './dataset.types';

function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Candidates with an address are keyed by (owner, address); email-less ones by
 * (owner, name, query) so distinct attempts stay apart
 */
export function contactKey(candidate: ContactCandidate): string {
  if (hasText(candidate.email)) {
    return `${candidate.ownerId}|email|${normalizeEmail(candidate.email)}`;
  }
  return `${candidate.ownerId}|attempt|${candidate.name}|${candidate.sourceQuery}`;
}

function isPopulated(value: string | string[] | null | undefined): boolean {
  return Array.isArray(value) ? value.length > 0 : hasText(value);
}

function copyIfPopulated<K extends EnrichableListingField>(target: ListingRecord, source: ListingRecord, field: K): void {
  const value = source[field];
  if (isPopulated(value)) {
    target[field] = value;
  }
}

/**
 * Copy with its own arrays, so stored records never share them with callers
 */
export function cloneListing(record: ListingRecord): ListingRecord {
  const copy: ListingRecord = { ...record, awards: [...record.awards] };
  if (record.categories) copy.categories = [...record.categories];
  if (record.skills) copy.skills = [...record.skills];
  return copy;
}

/**
 * Apply the enrichable fields of `incoming` to a stored listing. Other fields
 * are left as stored and a populated field is never emptied.
 */
export function enrichListing(current: ListingRecord, incoming: ListingRecord): ListingRecord {
  const next: ListingRecord = { ...current };
  for (const field of ENRICHABLE_LISTING_FIELDS) {
    copyIfPopulated(next, incoming, field);
  }
  return cloneListing(next);
}

/**
 * Merge incoming items into a copy of `existing`; the input dataset is not modified
 */
export function mergeDataset(existing: Dataset, incoming: readonly IncomingItem[]): Dataset {
  const listings = new Map(existing.listings);
  const contacts = new Map<number, ContactCandidate[]>();
  const seen = new Set<string>();

  for (const [ownerId, candidates] of existing.contacts) {
    contacts.set(ownerId, [...candidates]);
    for (const candidate of candidates) {
      seen.add(contactKey(candidate));
    }
  }

  for (const item of incoming) {
    if (item.kind === 'listing') {
      const current = listings.get(item.record.id);
      listings.set(
        item.record.id,
        current ? enrichListing(current, item.record) : cloneListing(item.record)
      );
      continue;
    }

    const candidate = item.candidate;
    if (candidate.email !== undefined && !isAcceptableEmail(candidate.email)) {
      continue;
    }

    const key = contactKey(candidate);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    const ownerCandidates = contacts.get(candidate.ownerId) ?? [];
    ownerCandidates.push({ ...candidate });
    contacts.set(candidate.ownerId, ownerCandidates);
  }

  return { listings, contacts };
}
