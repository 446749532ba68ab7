/**
 * Dataset Merger Tests
 */

import { contactKey, enrichListing, mergeDataset } from '../dataset.merger';
import { ContactCandidate, IncomingItem, ListingRecord, emptyDataset } from '../dataset.types';

function listing(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    id: 7,
    year: '2021',
    title: 'Moss Recovery After Wildfire',
    category: 'Plant Sciences',
    awards: ['First Award of $5,000'],
    abstractUrl: 'https://abstracts.test/Home/FullAbstract?projectId=7',
    ...overrides,
  };
}

function contact(overrides: Partial<ContactCandidate> = {}): ContactCandidate {
  return { ownerId: 7, name: 'Jane Doe', sourceQuery: '"Jane Doe" email', ...overrides };
}

describe('contactKey', () => {
  it('should key emails case-insensitively per owner', () => {
    expect(contactKey(contact({ email: 'A@B.com' }))).toBe('7|email|a@b.com');
  });

  it('should key email-less candidates by name and query', () => {
    expect(contactKey(contact())).toBe('7|attempt|Jane Doe|"Jane Doe" email');
  });
});

describe('enrichListing', () => {
  it('should only replace enrichable fields', () => {
    const current = listing();
    const incoming = listing({ title: 'Changed Title', year: '1999', category: 'Botany', awards: ['Best of Category'] });

    expect(enrichListing(current, incoming)).toEqual(
      listing({ category: 'Botany', awards: ['Best of Category'] })
    );
  });

  it('should apply categories and skills from an enrichment pass', () => {
    const incoming = listing({ categories: ['Plant Sciences', 'Chemistry'], skills: ['Chemistry', 'Plant Sciences'] });

    const enriched = enrichListing(listing(), incoming);

    expect(enriched.categories).toEqual(['Plant Sciences', 'Chemistry']);
    expect(enriched.skills).toEqual(['Chemistry', 'Plant Sciences']);
    expect(enriched.categories).not.toBe(incoming.categories);
  });

  it('should keep stored categories when the update has none', () => {
    const current = listing({ categories: ['Plant Sciences'] });

    expect(enrichListing(current, listing({ categories: [] })).categories).toEqual(['Plant Sciences']);
  });

  it('should never empty a populated field', () => {
    const current = listing({ studentName: 'Doe, Jane' });
    const incoming = listing({ category: null, awards: [], studentName: '  ' });

    expect(enrichListing(current, incoming)).toEqual(current);
  });
});

describe('mergeDataset', () => {
  it('should insert new listings and enrich existing ones', () => {
    const existing = mergeDataset(emptyDataset(), [{ kind: 'listing', record: listing({ category: null }) }]);

    const merged = mergeDataset(existing, [
      { kind: 'listing', record: listing({ category: 'Plant Sciences' }) },
      { kind: 'listing', record: listing({ id: 8, title: 'Second Project' }) },
    ]);

    expect(merged.listings.get(7)?.category).toBe('Plant Sciences');
    expect(merged.listings.get(8)?.title).toBe('Second Project');
  });

  it('should not modify the input dataset', () => {
    const existing = mergeDataset(emptyDataset(), [{ kind: 'contact', candidate: contact({ email: 'a@b.com' }) }]);

    mergeDataset(existing, [{ kind: 'contact', candidate: contact({ email: 'c@d.com' }) }]);

    expect(existing.contacts.get(7)).toHaveLength(1);
  });

  it('should store an owner and address pair once', () => {
    const merged = mergeDataset(emptyDataset(), [
      { kind: 'contact', candidate: contact({ email: 'a@b.com', sourceQuery: 'q1' }) },
      { kind: 'contact', candidate: contact({ email: 'A@B.com', sourceQuery: 'q2' }) },
    ]);

    expect(merged.contacts.get(7)).toEqual([contact({ email: 'a@b.com', sourceQuery: 'q1' })]);
  });

  it('should keep the same address for different owners', () => {
    const merged = mergeDataset(emptyDataset(), [
      { kind: 'contact', candidate: contact({ email: 'a@b.com' }) },
      { kind: 'contact', candidate: contact({ ownerId: 9, email: 'a@b.com' }) },
    ]);

    expect(merged.contacts.get(7)).toHaveLength(1);
    expect(merged.contacts.get(9)).toHaveLength(1);
  });

  it('should drop candidates with unacceptable addresses', () => {
    const merged = mergeDataset(emptyDataset(), [
      { kind: 'contact', candidate: contact({ email: 'noreply@example.com' }) },
      { kind: 'contact', candidate: contact({ email: 'not-an-email' }) },
    ]);

    expect(merged.contacts.has(7)).toBe(false);
  });

  it('should be idempotent', () => {
    const incoming: IncomingItem[] = [
      { kind: 'listing', record: listing() },
      { kind: 'contact', candidate: contact({ email: 'jane.doe@stanford.edu' }) },
      { kind: 'contact', candidate: contact({ linkedinUrl: 'https://www.linkedin.com/in/jane-doe' }) },
    ];

    const once = mergeDataset(emptyDataset(), incoming);
    const twice = mergeDataset(once, incoming);

    expect(twice).toEqual(once);
  });
});
