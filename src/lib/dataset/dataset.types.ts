/**
 * Dataset Types
 * Listing records, contact candidates and their persisted JSON shapes
 */

export interface ListingRecord {
  id: number;
  year: string | null;
  title: string;
  category: string | null;
  awards: string[];
  abstractUrl: string;
  booth?: string | null;
  country?: string | null;
  studentName?: string | null;
  abstract?: string | null;
  /** Primary category first, then keyword cross-listings */
  categories?: string[];
  skills?: string[];
}

/**
 * Fields an enrichment pass may change on a stored listing
 */
export const ENRICHABLE_LISTING_FIELDS = ['category', 'categories', 'awards', 'studentName', 'skills'] as const;
export type EnrichableListingField = (typeof ENRICHABLE_LISTING_FIELDS)[number];

export interface ContactCandidate {
  ownerId: number;
  name: string;
  email?: string;
  linkedinUrl?: string;
  sourceQuery: string;
}

export interface Dataset {
  listings: Map<number, ListingRecord>;
  contacts: Map<number, ContactCandidate[]>;
}

export type IncomingItem =
  | { kind: 'listing'; record: ListingRecord }
  | { kind: 'contact'; candidate: ContactCandidate };

export function emptyDataset(): Dataset {
  return { listings: new Map(), contacts: new Map() };
}

// ============================================================================
// Persisted shapes (read directly by the search page)
// ============================================================================

export interface ProjectJson {
  id: number;
  year: string | null;
  title: string;
  category: string | null;
  awards: string[];
  abstract_url: string;
  booth?: string | null;
  country?: string | null;
  student_name?: string | null;
  abstract?: string | null;
  categories?: string[];
  skills?: string[];
}

export interface ContactJson {
  owner_id: number;
  name: string;
  email?: string;
  linkedin_url?: string;
  source_query: string;
}

export interface WinnerEmailJson {
  id: number;
  name: string;
  title: string;
  year: string | null;
  awards: string[];
  emails: string[];
  linkedin: string[];
  queries: string[];
}

export interface WinnerTableRow {
  uni: string;
  year: string;
  first: string;
  last: string;
  major: string;
  email: string;
  notes: string;
  project_title: string;
  linkedin: string[];
  skills: string;
}
