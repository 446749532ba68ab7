/**
 * Extraction Types
 * Capability interfaces implemented once per external source
 */

import type { ContactCandidate, ListingRecord } from '../dataset/dataset.types';
import type { ParseError } from '../scraping/errors';

export type ListingParseResult = { ok: true; record: ListingRecord } | { ok: false; error: ParseError };

/**
 * Turns one listing page into a record
 */
export interface ListingPageParser {
  name: string;

  /**
   * Missing optional fields come back as null or []; a page that carries no
   * listing, or lacks a required field, yields a ParseError
   */
  parse(body: string, id: number, sourceUrl: string): ListingParseResult;
}

/**
 * Who a search was run for
 */
export interface ContactTarget {
  ownerId: number;
  name: string;
  query: string;
}

export type SearchParseResult = { ok: true; candidates: ContactCandidate[] } | { ok: false; error: ParseError };

/**
 * Turns one search result page into contact candidates. Candidacy only:
 * nothing here decides whether an address really belongs to the person.
 * A challenge page instead of results yields a BLOCKED ParseError.
 */
export interface SearchResultParser {
  name: string;

  parse(body: string, target: ContactTarget): SearchParseResult;
}
